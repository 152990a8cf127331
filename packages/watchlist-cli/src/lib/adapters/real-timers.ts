import type { TimerService } from "../ports/timer.js";

/**
 * Real timer service using global setInterval/clearInterval.
 */
export const realTimerService: TimerService = {
  setInterval: (fn, ms) => {
    const id = globalThis.setInterval(fn, ms);
    return { cancel: () => globalThis.clearInterval(id) };
  },
};
