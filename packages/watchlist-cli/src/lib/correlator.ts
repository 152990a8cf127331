import { ALERT_TYPE, prepareNotification, toToastRecord } from "./alerts.js";
import { jobFailed } from "./errors/catalog.js";
import type { JobRegistry } from "./job-registry.js";
import type { Logger } from "./logger.js";
import type { NotificationDispatcher } from "./notifications.js";
import type { ToastDisplay } from "./ports/toast.js";
import type { NotificationRecord, PollBatch } from "./wire.js";

export interface ResponseCorrelatorOptions {
  registry: JobRegistry;
  notifications: NotificationDispatcher;
  rootPath: string;
  toast?: ToastDisplay;
  logger: Logger;
}

export interface CorrelationSummary {
  resolved: number;
  rejected: number;
  /** Completed ids that were not pending on this client */
  ignored: number;
  notifications: number;
}

export interface ResponseCorrelator {
  correlate(batch: PollBatch): CorrelationSummary;
}

/**
 * Settle pending handles from a batch of completed jobs, then hand the
 * batch's notifications to their subscribers. Jobs always go first.
 */
export function createResponseCorrelator(options: ResponseCorrelatorOptions): ResponseCorrelator {
  const { registry, notifications, rootPath, toast, logger } = options;

  function showToast(record: NotificationRecord): void {
    if (!toast) return;
    try {
      toast.show(toToastRecord(record));
    } catch (error) {
      logger.warn("Toast display failed", {
        nid: record._nid,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return {
    correlate(batch) {
      const summary: CorrelationSummary = { resolved: 0, rejected: 0, ignored: 0, notifications: 0 };

      for (const job of batch.jobs) {
        const entry = registry.take(job.id);
        if (!entry) {
          // Already settled by an earlier batch, or never tracked here
          logger.debug("Ignoring completion for unknown job", { jobId: String(job.id) });
          summary.ignored++;
          continue;
        }

        if (job.error) {
          entry.handle.reject(jobFailed(entry.id, job.error, entry.origin));
          summary.rejected++;
        } else {
          entry.handle.resolve(job.result);
          summary.resolved++;
        }
      }

      for (const record of batch.notifications) {
        const prepared = prepareNotification(record, rootPath);
        if (prepared._ntype === ALERT_TYPE) showToast(prepared);
        notifications.dispatch(prepared._ntype, prepared);
        summary.notifications++;
      }

      return summary;
    },
  };
}
