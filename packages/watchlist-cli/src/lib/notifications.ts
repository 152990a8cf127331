import type { Logger } from "./logger.js";
import { createNoopLogger } from "./logger.js";
import type { NotificationRecord } from "./wire.js";

export type NotificationHandler<N extends NotificationRecord = NotificationRecord> = (
  record: N
) => void | Promise<void>;

export interface NotificationDispatcher {
  /** Append a handler for `type`. Returns a function that removes it again. */
  subscribe(type: string, handler: NotificationHandler): () => void;
  /** Remove the first registration of `handler` for `type` */
  unsubscribe(type: string, handler: NotificationHandler): boolean;
  /** Invoke every handler for `type` in registration order */
  dispatch(type: string, record: NotificationRecord): void;
  count(type: string): number;
}

export interface NotificationDispatcherOptions {
  logger?: Logger;
}

/**
 * Create the notification-type → handlers table.
 * A throwing (or rejecting) handler is logged and skipped; the remaining
 * handlers still run.
 */
export function createNotificationDispatcher(
  options: NotificationDispatcherOptions = {}
): NotificationDispatcher {
  const logger = options.logger ?? createNoopLogger();
  const handlers = new Map<string, NotificationHandler[]>();

  function reportFailure(type: string, record: NotificationRecord, error: unknown): void {
    logger.warn("Notification handler failed", {
      ntype: type,
      nid: record._nid,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  function unsubscribe(type: string, handler: NotificationHandler): boolean {
    const list = handlers.get(type);
    if (!list) return false;
    const index = list.indexOf(handler);
    if (index === -1) return false;
    list.splice(index, 1);
    if (list.length === 0) handlers.delete(type);
    return true;
  }

  return {
    subscribe(type, handler) {
      const list = handlers.get(type);
      if (list) {
        list.push(handler);
      } else {
        handlers.set(type, [handler]);
      }
      return () => {
        unsubscribe(type, handler);
      };
    },

    unsubscribe,

    dispatch(type, record) {
      // Copy so a handler that unsubscribes mid-dispatch doesn't shift the list
      const list = [...(handlers.get(type) ?? [])];
      for (const handler of list) {
        try {
          const outcome = handler(record);
          if (outcome instanceof Promise) {
            void outcome.catch((error: unknown) => reportFailure(type, record, error));
          }
        } catch (error) {
          reportFailure(type, record, error);
        }
      }
    },

    count: (type) => handlers.get(type)?.length ?? 0,
  };
}
