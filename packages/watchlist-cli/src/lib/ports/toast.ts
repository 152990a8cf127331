/**
 * Toast record as understood by the display subsystem: every field of the
 * originating alert, with each key under the `pnotify_` prefix.
 */
export type ToastRecord = Record<`pnotify_${string}`, unknown>;

/**
 * Abstraction for the user-visible toast/alert display.
 */
export interface ToastDisplay {
  show(toast: ToastRecord): void;
}
