import chalk, { Chalk, type ChalkInstance } from "chalk";
import { JobError, TransportError, WatchlistError, isWatchlistError } from "./types.js";
import { getOutputMode, type OutputMode } from "../output/mode.js";
import type { TransportExchange } from "../ports/transport.js";

/**
 * Symbols for error display.
 */
const SYM = {
  error: "✗",
  arrow: "→",
};

const plain = new Chalk({ level: 0 });

function describeExchange(exchange: TransportExchange): string {
  const { method, path } = exchange.request;
  return exchange.status !== undefined ? `${method} ${path} → ${exchange.status}` : `${method} ${path}`;
}

/**
 * Format an error as terminal lines.
 */
export function formatError(error: WatchlistError, c: ChalkInstance = chalk): string[] {
  const output = [`${c.red(SYM.error)} ${c.red.bold(error.message)}`];

  if (error.details) {
    for (const line of error.details.split("\n")) {
      output.push(`  ${c.dim(line)}`);
    }
  }

  if (error instanceof JobError) {
    output.push(`  ${c.dim(`job ${error.jobId}${error.exchange ? ` (${describeExchange(error.exchange)})` : ""}`)}`);
  } else if (error instanceof TransportError) {
    output.push(`  ${c.dim(describeExchange(error.exchange))}`);
  }

  if (error.suggestion) {
    output.push(`  ${c.yellow(SYM.arrow)} ${error.suggestion}`);
  }

  return output;
}

/**
 * Shape written to stderr in JSON mode.
 */
export function errorToJson(error: WatchlistError): Record<string, unknown> {
  const output: Record<string, unknown> = {
    code: error.code,
    message: error.message,
    suggestion: error.suggestion,
    details: error.details,
  };
  if (error instanceof JobError) {
    output.jobId = error.jobId;
    output.payload = error.payload;
  }
  if (error instanceof TransportError) {
    output.status = error.status;
    output.request = error.exchange.request;
  }

  // Remove undefined values
  return Object.fromEntries(Object.entries(output).filter(([, v]) => v !== undefined));
}

/**
 * Render an error based on the current output mode.
 */
export function renderError(error: WatchlistError, mode?: OutputMode): void {
  const outputMode = mode ?? getOutputMode();

  switch (outputMode) {
    case "json":
      console.error(JSON.stringify({ success: false, error: errorToJson(error) }, null, 2));
      break;
    case "plain":
    case "color":
      for (const line of formatError(error, outputMode === "plain" ? plain : chalk)) {
        console.error(line);
      }
      break;
  }
}

/**
 * Convert an unknown error to a WatchlistError and render it.
 */
export function renderUnknownError(error: unknown, mode?: OutputMode): void {
  if (isWatchlistError(error)) {
    renderError(error, mode);
  } else {
    const message = error instanceof Error ? error.message : String(error);
    renderError(
      new WatchlistError("UNKNOWN_ERROR", message, {
        cause: error instanceof Error ? error : undefined,
      }),
      mode
    );
  }
}
