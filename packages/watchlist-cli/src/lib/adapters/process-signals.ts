import type { ShutdownCallback, SignalHandler } from "../ports/signal-handler.js";

/**
 * Signal handler bound to the real process. Callbacks run once, in parallel;
 * the process then exits with 1 if any of them failed, 0 otherwise.
 */
export function createProcessSignalHandler(
  signals: NodeJS.Signals[] = ["SIGTERM", "SIGINT"],
  exit: (code: number) => void = (code) => process.exit(code)
): SignalHandler {
  const callbacks: ShutdownCallback[] = [];
  let handling = false;

  const handleSignal = (signal: NodeJS.Signals) => {
    if (handling) return;
    handling = true;
    void Promise.allSettled(callbacks.map(async (callback) => callback(signal))).then((results) => {
      exit(results.some((r) => r.status === "rejected") ? 1 : 0);
    });
  };

  return {
    onShutdown(callback) {
      callbacks.push(callback);
      if (callbacks.length === 1) {
        for (const signal of signals) process.on(signal, handleSignal);
      }
    },
    dispose() {
      callbacks.length = 0;
      for (const signal of signals) process.off(signal, handleSignal);
    },
  };
}
