import type { TransportExchange } from "./ports/transport.js";
import { jobKey, type JobId } from "./wire.js";

// ---------------------------------------------------------------------------
// Completion handle
// ---------------------------------------------------------------------------

export type ProgressListener = (jobId: string) => void;

/**
 * Single-assignment completion handle returned by `submit`.
 *
 * Awaitable like a promise. Settles exactly once; before that it may emit
 * progress signals carrying the server's job id.
 */
export class JobHandle<T = unknown> implements PromiseLike<T> {
  readonly promise: Promise<T>;
  /** Exchange of the originating request, once the server has answered */
  origin?: TransportExchange;

  private readonly resolvePromise: (value: T) => void;
  private readonly rejectPromise: (reason: unknown) => void;
  private readonly listeners: ProgressListener[] = [];
  private settled = false;

  constructor() {
    let resolvePromise: (value: T) => void = () => {};
    let rejectPromise: (reason: unknown) => void = () => {};
    this.promise = new Promise<T>((resolve, reject) => {
      resolvePromise = resolve;
      rejectPromise = reject;
    });
    this.resolvePromise = resolvePromise;
    this.rejectPromise = rejectPromise;
  }

  get isSettled(): boolean {
    return this.settled;
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.promise.then(onfulfilled, onrejected);
  }

  /** Listen for "acknowledged but not complete" signals */
  onProgress(listener: ProgressListener): this {
    this.listeners.push(listener);
    return this;
  }

  progress(jobId: string): void {
    if (this.settled) return;
    for (const listener of this.listeners) listener(jobId);
  }

  /** Returns false when the handle had already settled */
  resolve(value: T): boolean {
    if (this.settled) return false;
    this.settled = true;
    this.resolvePromise(value);
    return true;
  }

  /** Returns false when the handle had already settled */
  reject(reason: unknown): boolean {
    if (this.settled) return false;
    this.settled = true;
    this.rejectPromise(reason);
    return true;
  }
}

/**
 * What the registry needs from a handle, independent of its result type.
 */
export interface PendingCompletion {
  readonly isSettled: boolean;
  resolve(value: unknown): boolean;
  reject(reason: unknown): boolean;
  progress(jobId: string): void;
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export interface PendingOperation {
  id: string;
  handle: PendingCompletion;
  origin?: TransportExchange;
}

export interface JobRegistry {
  /** Track a deferred job. Returns false if the id is already pending. */
  register(id: JobId, handle: PendingCompletion, origin?: TransportExchange): boolean;
  /** Remove and return the entry for `id`, if pending */
  take(id: JobId): PendingOperation | undefined;
  has(id: JobId): boolean;
  /** Pending ids in registration order */
  ids(): string[];
  size(): number;
  /** Remove and return every entry */
  drain(): PendingOperation[];
}

export function createJobRegistry(): JobRegistry {
  const entries = new Map<string, PendingOperation>();

  return {
    register(id, handle, origin) {
      const key = jobKey(id);
      if (entries.has(key)) return false;
      entries.set(key, { id: key, handle, origin });
      return true;
    },
    take(id) {
      const key = jobKey(id);
      const entry = entries.get(key);
      if (entry) entries.delete(key);
      return entry;
    },
    has: (id) => entries.has(jobKey(id)),
    ids: () => [...entries.keys()],
    size: () => entries.size,
    drain() {
      const all = [...entries.values()];
      entries.clear();
      return all;
    },
  };
}
