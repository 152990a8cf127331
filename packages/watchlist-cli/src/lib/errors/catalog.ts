import type { TransportExchange } from "../ports/transport.js";
import { JobError, TransportError, WatchlistError } from "./types.js";

/**
 * Error catalog - factory functions for creating errors with consistent
 * messages and hints.
 */

// ============================================================================
// Transport Errors
// ============================================================================

export function httpStatusError(exchange: TransportExchange): TransportError {
  const status = exchange.status ?? 0;
  const label = exchange.statusText ? `${status} ${exchange.statusText}` : String(status);
  const suggestion =
    status === 404
      ? "Check the show or episode id"
      : status >= 500
        ? "The server failed to handle the request; check its log"
        : undefined;

  return new TransportError(
    "TRANSPORT_HTTP_STATUS",
    `Request failed (${label})`,
    exchange,
    {
      suggestion,
      details: typeof exchange.body === "string" ? exchange.body : undefined,
    }
  );
}

export function networkError(exchange: TransportExchange, cause?: Error): TransportError {
  return new TransportError(
    "TRANSPORT_NETWORK",
    `Can't reach the server (${cause?.message ?? "network error"})`,
    exchange,
    {
      suggestion: "Check that the server is running and server.url is correct",
      cause,
    }
  );
}

export function requestTimeout(exchange: TransportExchange, timeoutMs: number): TransportError {
  return new TransportError(
    "TRANSPORT_TIMEOUT",
    `Request to ${exchange.request.path} timed out after ${timeoutMs}ms`,
    exchange
  );
}

export function invalidResponse(exchange: TransportExchange, reason: string): TransportError {
  return new TransportError("RESPONSE_INVALID", `Server sent an invalid response: ${reason}`, exchange);
}

// ============================================================================
// Job Errors
// ============================================================================

export function jobFailed(
  jobId: string,
  payload: Record<string, unknown>,
  exchange?: TransportExchange
): JobError {
  const message = typeof payload.message === "string" ? payload.message : "Job failed";
  return new JobError("JOB_FAILED", message, jobId, { payload, exchange });
}

export function duplicateJob(jobId: string, exchange?: TransportExchange): JobError {
  return new JobError("JOB_DUPLICATE", `Job ${jobId} is already pending`, jobId, { exchange });
}

export function jobCancelled(jobId: string, reason: string, exchange?: TransportExchange): JobError {
  return new JobError("JOB_CANCELLED", `Job ${jobId} cancelled: ${reason}`, jobId, { exchange });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidConfig(path: string, issues: string[]): WatchlistError {
  return new WatchlistError("CONFIG_INVALID", `Config file has errors: ${path}`, {
    suggestion: "Fix the issues below, then run `watchlist config validate`",
    details: issues.join("\n"),
  });
}

export function invalidOption(optionName: string, reason: string, validValues?: string[]): WatchlistError {
  return new WatchlistError("VALIDATION_INVALID_OPTION", `Invalid ${optionName}: ${reason}`, {
    suggestion: validValues?.length ? `Choose from: ${validValues.join(", ")}` : undefined,
  });
}

export function confirmationRequired(action: string): WatchlistError {
  return new WatchlistError("VALIDATION_INVALID_OPTION", `Refusing to ${action} without confirmation`, {
    suggestion: "Pass --yes to confirm non-interactively",
  });
}

export function unexpectedResult(what: string, issues: string): WatchlistError {
  return new WatchlistError("RESPONSE_INVALID", `Unexpected ${what} result from server`, {
    details: issues,
    suggestion: "The server may be a different version than this client",
  });
}
