import type { TransportExchange } from "../ports/transport.js";

/**
 * Error codes for every failure the client can report.
 */
export type ErrorCode =
  // Transport errors
  | "TRANSPORT_NETWORK"
  | "TRANSPORT_TIMEOUT"
  | "TRANSPORT_HTTP_STATUS"
  | "RESPONSE_INVALID"
  // Job errors
  | "JOB_FAILED"
  | "JOB_DUPLICATE"
  | "JOB_CANCELLED"
  // Validation errors
  | "CONFIG_INVALID"
  | "VALIDATION_INVALID_OPTION"
  // Generic
  | "UNKNOWN_ERROR";

export interface WatchlistErrorOptions {
  suggestion?: string;
  details?: string;
  cause?: Error;
}

/**
 * Base error class carrying a stable code and optional hints for the user.
 */
export class WatchlistError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly details?: string;

  constructor(code: ErrorCode, message: string, options?: WatchlistErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "WatchlistError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.details = options?.details;
  }
}

/**
 * A request that never produced a usable 2xx JSON response.
 */
export class TransportError extends WatchlistError {
  readonly status?: number;
  readonly statusText?: string;
  readonly exchange: TransportExchange;

  constructor(
    code: Extract<ErrorCode, `TRANSPORT_${string}` | "RESPONSE_INVALID">,
    message: string,
    exchange: TransportExchange,
    options?: WatchlistErrorOptions
  ) {
    super(code, message, options);
    this.name = "TransportError";
    this.status = exchange.status;
    this.statusText = exchange.statusText;
    this.exchange = exchange;
  }
}

/**
 * A deferred job that ended without a result: the server reported an error
 * for it, or the client gave up on it.
 */
export class JobError extends WatchlistError {
  readonly jobId: string;
  /** Error object as reported by the server, if any */
  readonly payload?: Record<string, unknown>;
  /** Exchange of the request that started the job */
  readonly exchange?: TransportExchange;

  constructor(
    code: Extract<ErrorCode, `JOB_${string}`>,
    message: string,
    jobId: string,
    options?: WatchlistErrorOptions & {
      payload?: Record<string, unknown>;
      exchange?: TransportExchange;
    }
  ) {
    super(code, message, options);
    this.name = "JobError";
    this.jobId = jobId;
    this.payload = options?.payload;
    this.exchange = options?.exchange;
  }
}

/**
 * Type guard to check if an error is a WatchlistError.
 */
export function isWatchlistError(error: unknown): error is WatchlistError {
  return error instanceof WatchlistError;
}
