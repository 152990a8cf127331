export type ShutdownCallback = (signal: NodeJS.Signals) => void | Promise<void>;

/**
 * Process shutdown hook. `listen` runs until one of these fires.
 */
export interface SignalHandler {
  /** Run `callback` once when the first shutdown signal arrives */
  onShutdown(callback: ShutdownCallback): void;
  /** Detach from the process and forget every callback */
  dispose(): void;
}
