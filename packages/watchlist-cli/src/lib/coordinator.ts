import { realTimerService } from "./adapters/real-timers.js";
import { createResponseCorrelator } from "./correlator.js";
import { duplicateJob, invalidConfig, jobCancelled, networkError } from "./errors/catalog.js";
import { WatchlistError } from "./errors/types.js";
import { createJobRegistry, JobHandle } from "./job-registry.js";
import type { Logger } from "./logger.js";
import { createNoopLogger } from "./logger.js";
import {
  createNotificationDispatcher,
  type NotificationHandler,
} from "./notifications.js";
import { createPollScheduler, POLL_DEFAULTS } from "./poll-scheduler.js";
import type { TimerService } from "./ports/timer.js";
import type { ToastDisplay } from "./ports/toast.js";
import type {
  HttpMethod,
  RequestParams,
  Transport,
  TransportRequest,
  TransportResponse,
} from "./ports/transport.js";
import { jobKey, parseDeferral, parsePollBatch } from "./wire.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CoordinatorOptions {
  transport: Transport;
  /** Substituted for `{{root}}` in notification strings */
  rootPath?: string;
  minIntervalMs?: number;
  maxIntervalMs?: number;
  pollPath?: string;
  /** Timeout for requests issued through `submit` */
  requestTimeoutMs?: number;
  timers?: TimerService;
  /** Receives every "alert" notification under the `pnotify_` prefix */
  toast?: ToastDisplay;
  logger?: Logger;
}

export interface Coordinator {
  /**
   * Issue a request. The handle resolves with the response body, or with the
   * job result once a later batch reports it.
   */
  submit<T = unknown>(path: string, params?: RequestParams, method?: HttpMethod): JobHandle<T>;
  subscribe(type: string, handler: NotificationHandler): () => void;
  unsubscribe(type: string, handler: NotificationHandler): boolean;
  pendingJobIds(): string[];
  isPolling(): boolean;
  readonly currentIntervalMs: number;
  /**
   * Stop polling and cancel every handle still pending. Deferrals that arrive
   * afterwards are cancelled too; final responses still resolve.
   */
  stop(reason?: string): void;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** New deferred work pulls polling at least this tight */
export const FAST_ACTIVITY_INTERVAL_MS = 1000;

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create the job/notification coordinator. Polling starts right away at the
 * floor interval, so notifications arrive even before the first `submit`.
 */
export function createCoordinator(options: CoordinatorOptions): Coordinator {
  const {
    transport,
    rootPath = "",
    minIntervalMs = POLL_DEFAULTS.minIntervalMs,
    maxIntervalMs = POLL_DEFAULTS.maxIntervalMs,
    pollPath = POLL_DEFAULTS.pollPath,
    requestTimeoutMs = DEFAULT_REQUEST_TIMEOUT_MS,
    timers = realTimerService,
    toast,
    logger = createNoopLogger(),
  } = options;

  if (minIntervalMs > maxIntervalMs) {
    throw invalidConfig("(coordinator options)", [
      `polling.minIntervalMs (${minIntervalMs}) exceeds polling.maxIntervalMs (${maxIntervalMs})`,
    ]);
  }

  let stopped = false;
  let stopReason = "";

  const registry = createJobRegistry();
  const notifications = createNotificationDispatcher({ logger });
  const correlator = createResponseCorrelator({
    registry,
    notifications,
    rootPath,
    toast,
    logger,
  });
  const scheduler = createPollScheduler({
    transport,
    pendingIds: () => registry.ids(),
    onBatch: (batch) => {
      if (stopped) return;
      const summary = correlator.correlate(batch);
      if (summary.resolved + summary.rejected + summary.notifications > 0) {
        logger.debug("Poll batch correlated", { ...summary });
      }
    },
    timers,
    minIntervalMs,
    maxIntervalMs,
    pollPath,
    logger,
  });

  function handleResponse<T>(handle: JobHandle<T>, response: TransportResponse): void {
    handle.origin = response;
    const deferral = parseDeferral(response.body);

    if (!deferral) {
      // Final answer; the caller decides what shape T has
      handle.resolve(response.body as T);
      return;
    }

    const id = jobKey(deferral.jobid);
    if (stopped) {
      handle.reject(jobCancelled(id, stopReason, response));
      return;
    }

    if (!registry.register(id, handle, response)) {
      handle.reject(duplicateJob(id, response));
      return;
    }

    if (deferral.pending) {
      try {
        handle.progress(id);
      } catch (error) {
        logger.warn("Progress listener failed", {
          jobId: id,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const hint = deferral.interval;
    if (deferral.pending && hint !== undefined && hint > 0 && hint < scheduler.currentIntervalMs) {
      scheduler.start(hint);
    } else if (scheduler.currentIntervalMs > FAST_ACTIVITY_INTERVAL_MS) {
      scheduler.start(FAST_ACTIVITY_INTERVAL_MS);
    }

    // The response may carry this job's own result and other piggybacked work
    const decoded = parsePollBatch(response.body);
    if (decoded.ok) {
      correlator.correlate(decoded.batch);
    } else {
      logger.warn("Ignoring malformed jobs/notifications on response", {
        path: response.request.path,
        error: decoded.error,
      });
    }
  }

  function submit<T = unknown>(
    path: string,
    params: RequestParams = {},
    method: HttpMethod = "GET"
  ): JobHandle<T> {
    const handle = new JobHandle<T>();
    const pending = registry.ids();
    const requestParams =
      pending.length > 0 && params.jobs === undefined ? { ...params, jobs: pending.join(",") } : params;

    const request: TransportRequest = { method, path, params: requestParams, timeoutMs: requestTimeoutMs };

    void transport
      .request(request)
      .then(
        (response) => handleResponse(handle, response),
        (error: unknown) => {
          handle.reject(
            error instanceof WatchlistError
              ? error
              : networkError({ request }, error instanceof Error ? error : undefined)
          );
        }
      )
      .catch((error: unknown) => {
        // handleResponse itself threw; never leave the caller hanging
        handle.reject(error);
      });

    return handle;
  }

  function stop(reason = "coordinator stopped"): void {
    stopped = true;
    stopReason = reason;
    scheduler.stop();
    for (const entry of registry.drain()) {
      entry.handle.reject(jobCancelled(entry.id, reason, entry.origin));
    }
  }

  scheduler.start(minIntervalMs);

  return {
    submit,
    subscribe: notifications.subscribe,
    unsubscribe: notifications.unsubscribe,
    pendingJobIds: () => registry.ids(),
    isPolling: () => scheduler.isRunning(),
    get currentIntervalMs() {
      return scheduler.currentIntervalMs;
    },
    stop,
  };
}
