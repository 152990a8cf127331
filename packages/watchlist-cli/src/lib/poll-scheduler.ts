import { realTimerService } from "./adapters/real-timers.js";
import { invalidResponse } from "./errors/catalog.js";
import type { Logger } from "./logger.js";
import { createNoopLogger } from "./logger.js";
import type { TimerHandle, TimerService } from "./ports/timer.js";
import type { RequestParams, Transport, TransportRequest } from "./ports/transport.js";
import { parsePollBatch, type PollBatch } from "./wire.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PollSchedulerOptions {
  transport: Transport;
  /** Ids to ask the server about on each tick */
  pendingIds: () => string[];
  /** Receives every decoded batch before the backoff decision is made */
  onBatch: (batch: PollBatch) => void;
  timers?: TimerService;
  /** Floor the interval snaps back to on activity */
  minIntervalMs?: number;
  /** Ceiling for idle backoff and failures */
  maxIntervalMs?: number;
  /** Shared polling endpoint */
  pollPath?: string;
  logger?: Logger;
}

export interface PollScheduler {
  /** (Re)start the repeating timer; no-op if already running at that interval */
  start(intervalMs: number): void;
  /** Cancel the timer. In-flight polls finish but no longer reschedule. */
  stop(): void;
  /** Run one poll immediately */
  pollNow(): Promise<void>;
  isRunning(): boolean;
  readonly currentIntervalMs: number;
  readonly minIntervalMs: number;
  readonly maxIntervalMs: number;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const POLL_DEFAULTS = {
  minIntervalMs: 5000,
  maxIntervalMs: 10000,
  pollPath: "/api/jobs",
} as const;

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create the adaptive poll loop.
 *
 * Idle batches (nothing pending, no notifications) double the interval up to
 * the ceiling; any activity snaps it back to the floor; a failed poll jumps
 * straight to the ceiling. Server hints passed to `start` may go below the
 * floor, only the ceiling is enforced there.
 */
export function createPollScheduler(options: PollSchedulerOptions): PollScheduler {
  const {
    transport,
    pendingIds,
    onBatch,
    timers = realTimerService,
    minIntervalMs = POLL_DEFAULTS.minIntervalMs,
    maxIntervalMs = POLL_DEFAULTS.maxIntervalMs,
    pollPath = POLL_DEFAULTS.pollPath,
    logger = createNoopLogger(),
  } = options;

  let currentIntervalMs = minIntervalMs;
  let timer: TimerHandle | undefined;
  let inFlight = false;

  function start(intervalMs: number): void {
    const next = Math.min(intervalMs, maxIntervalMs);
    if (timer && next === currentIntervalMs) return;

    timer?.cancel();
    if (next !== currentIntervalMs) {
      logger.debug("Polling interval changed", { fromMs: currentIntervalMs, toMs: next });
    }
    currentIntervalMs = next;
    timer = timers.setInterval(() => {
      void pollNow();
    }, next);
  }

  function stop(): void {
    timer?.cancel();
    timer = undefined;
  }

  function applyBackoff(batch: PollBatch): void {
    // Stopped while the poll was in flight
    if (!timer) return;

    const idle = pendingIds().length === 0 && batch.notifications.length === 0;
    if (idle) {
      if (currentIntervalMs < maxIntervalMs) {
        start(Math.min(currentIntervalMs * 2, maxIntervalMs));
      }
    } else if (currentIntervalMs > minIntervalMs) {
      start(minIntervalMs);
    }
  }

  async function pollNow(): Promise<void> {
    if (inFlight) {
      logger.debug("Skipping poll tick, previous poll still in flight");
      return;
    }
    inFlight = true;

    const ids = pendingIds();
    const params: RequestParams = ids.length > 0 ? { jobs: ids.join(",") } : {};
    const request: TransportRequest = {
      method: "GET",
      path: pollPath,
      params,
      timeoutMs: currentIntervalMs,
    };

    try {
      const response = await transport.request(request);
      const decoded = parsePollBatch(response.body);
      if (!decoded.ok) {
        throw invalidResponse(response, decoded.error);
      }
      onBatch(decoded.batch);
      applyBackoff(decoded.batch);
    } catch (error) {
      logger.warn("Poll failed, backing off", {
        pendingJobs: ids.length,
        error: error instanceof Error ? error.message : String(error),
      });
      if (timer) start(maxIntervalMs);
    } finally {
      inFlight = false;
    }
  }

  return {
    start,
    stop,
    pollNow,
    isRunning: () => timer !== undefined,
    get currentIntervalMs() {
      return currentIntervalMs;
    },
    minIntervalMs,
    maxIntervalMs,
  };
}
