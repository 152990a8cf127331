/**
 * JSON output utilities for machine-readable CLI output.
 * Provides consistent schemas and output helpers.
 */

import { isJsonMode } from "./cli-context.js";
import type { NotificationRecord } from "./wire.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    jobId?: string;
    durationMs?: number;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface SearchResultJson {
  query: string;
  results: Array<{
    id: string | number;
    name: string;
    year?: string | number | null;
    provider?: string;
    overview?: string;
  }>;
}

export interface CheckResultJson {
  show?: string;
  need: number;
  found: number;
}

export interface ShowActionJson {
  show: string;
  action: "add" | "remove" | "refresh" | "provider" | "settings";
  result: unknown;
}

export interface OverviewJson {
  show: string;
  episode?: string;
  overview: string;
}

export interface EpisodeStatusJson {
  show: string;
  status: string;
  statuses: Record<string, unknown>;
}

export interface NotificationEventJson {
  type: "start" | "notification" | "stop";
  timestamp: string;
  notification?: NotificationRecord;
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Output an NDJSON event (for streaming, like listen).
 */
export function outputNdjson(event: NotificationEventJson): void {
  console.log(JSON.stringify(event));
}

/**
 * Conditionally output JSON or return false for human output.
 * Use this to check if JSON mode is enabled before outputting.
 */
export function maybeOutputJson<T>(data: T, meta?: JsonSuccess<T>["meta"]): boolean {
  if (isJsonMode()) {
    outputSuccess(data, meta);
    return true;
  }
  return false;
}
