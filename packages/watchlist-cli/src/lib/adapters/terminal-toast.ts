import chalk, { type ChalkInstance } from "chalk";
import type { ToastDisplay, ToastRecord } from "../ports/toast.js";

const SEVERITY_STYLE: Record<string, { symbol: string; color: (c: ChalkInstance) => ChalkInstance }> = {
  info: { symbol: "ℹ", color: (c) => c.cyan },
  notice: { symbol: "!", color: (c) => c.yellow },
  success: { symbol: "✓", color: (c) => c.green },
  error: { symbol: "✗", color: (c) => c.red },
};

function stripTags(text: string): string {
  return text.replace(/<[^>]*>/g, "");
}

function field(toast: ToastRecord, name: string): string | undefined {
  const key = `pnotify_${name}` as const;
  const value = toast[key];
  if (value === undefined || value === null) return undefined;
  return stripTags(String(value));
}

/**
 * Render a toast as one terminal line: `<symbol> <title>: <text>`.
 */
export function formatToast(toast: ToastRecord, c: ChalkInstance = chalk): string {
  const severity = field(toast, "type") ?? "info";
  const style = SEVERITY_STYLE[severity] ?? SEVERITY_STYLE.info;
  const title = field(toast, "title");
  const text = field(toast, "text");
  const body = title && text ? `${c.bold(title)}: ${text}` : title ? c.bold(title) : text ?? "";
  return `${style.color(c)(style.symbol)} ${body}`;
}

/**
 * Toast display that writes alerts to stderr.
 */
export function createTerminalToast(
  write: (line: string) => void = (line) => console.error(line),
  c: ChalkInstance = chalk
): ToastDisplay {
  return {
    show(toast) {
      write(formatToast(toast, c));
    },
  };
}
