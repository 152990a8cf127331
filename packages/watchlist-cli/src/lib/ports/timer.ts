/**
 * Handle to a scheduled timer. Cancelling twice is harmless.
 */
export interface TimerHandle {
  cancel(): void;
}

/**
 * Abstraction for timer operations.
 * Allows injecting manual timers for testing.
 */
export interface TimerService {
  /** Run `fn` every `ms` milliseconds until cancelled */
  setInterval(fn: () => void, ms: number): TimerHandle;
}
