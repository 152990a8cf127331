import type { ToastRecord } from "./ports/toast.js";
import type { NotificationRecord } from "./wire.js";

export const ALERT_TYPE = "alert";

/** Placeholder producers embed in links; replaced with the configured root path */
export const ROOT_PLACEHOLDER = "{{root}}";

/** Filled in on "alert" notifications that lack them */
export const ALERT_DEFAULTS = {
  type: "info",
  nonblock: true,
  animation: "fade",
  closer: true,
  delay: 5000,
} as const;

export type AlertField = keyof typeof ALERT_DEFAULTS;

/**
 * An "alert" notification after defaults were applied. Producers may still
 * have sent any value for a defaulted field; only its presence is guaranteed.
 */
export type AlertNotification = NotificationRecord & Record<AlertField, unknown>;

export function applyAlertDefaults(record: NotificationRecord): AlertNotification {
  return {
    ...record,
    type: record.type ?? ALERT_DEFAULTS.type,
    nonblock: record.nonblock ?? ALERT_DEFAULTS.nonblock,
    animation: record.animation ?? ALERT_DEFAULTS.animation,
    closer: record.closer ?? ALERT_DEFAULTS.closer,
    delay: record.delay ?? ALERT_DEFAULTS.delay,
  };
}

function substitute(value: unknown, rootPath: string): unknown {
  if (typeof value === "string") {
    return value.split(ROOT_PLACEHOLDER).join(rootPath);
  }
  if (Array.isArray(value)) {
    return value.map((item) => substitute(item, rootPath));
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, substitute(item, rootPath)])
    );
  }
  return value;
}

/**
 * Replace the root placeholder in every string of the record, nested values
 * included. The `_ntype`/`_nid` tags are left alone.
 */
export function substituteRootPath<N extends NotificationRecord>(record: N, rootPath: string): N {
  const out = { ...record };
  for (const [key, value] of Object.entries(record)) {
    if (key === "_ntype" || key === "_nid") continue;
    Object.assign(out, { [key]: substitute(value, rootPath) });
  }
  return out;
}

/**
 * Rename every field under the toast display's `pnotify_` namespace.
 */
export function toToastRecord(record: NotificationRecord): ToastRecord {
  const toast: ToastRecord = {};
  for (const [key, value] of Object.entries(record)) {
    const name = `pnotify_${key}` as const;
    toast[name] = value;
  }
  return toast;
}

/**
 * Prepare a notification for handlers: alert defaults first, then root-path
 * substitution.
 */
export function prepareNotification(record: NotificationRecord, rootPath: string): NotificationRecord {
  const withDefaults = record._ntype === ALERT_TYPE ? applyAlertDefaults(record) : record;
  return substituteRootPath(withDefaults, rootPath);
}
