import type { RequestInit, Response } from "node-fetch";
import fetch from "node-fetch";
import Conf from "conf";
import { randomUUID } from "crypto";
import {
  httpStatusError,
  invalidResponse,
  networkError,
  requestTimeout,
} from "./errors/catalog.js";
import type {
  Transport,
  TransportExchange,
  TransportRequest,
  TransportResponse,
} from "./ports/transport.js";

// ---------------------------------------------------------------------------
// Session storage
// ---------------------------------------------------------------------------

/**
 * The server queues jobs and notifications per session cookie, so the id has
 * to survive between CLI invocations.
 */
export interface SessionStore {
  getSessionId(): string;
}

export class ConfSessionStore implements SessionStore {
  private readonly conf = new Conf<{ sessionId?: string }>({ projectName: "watchlist-cli" });

  getSessionId(): string {
    const existing = this.conf.get("sessionId");
    if (existing) return existing;

    const created = randomUUID();
    this.conf.set("sessionId", created);
    return created;
  }
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export type FetchResponse = Pick<Response, "ok" | "status" | "statusText" | "text">;
export type FetchImpl = (url: URL, init: RequestInit) => Promise<FetchResponse>;

export interface ApiClientOptions {
  baseUrl?: string;
  sessionStore?: SessionStore;
  cookieName?: string;
  fetchImpl?: FetchImpl;
}

export interface ApiClient extends Transport {
  readonly baseUrl: string;
}

export const DEFAULT_BASE_URL = "http://localhost:8088";
export const DEFAULT_COOKIE_NAME = "watchlist.session";

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

/**
 * Build the request URL. Paths are appended to the base URL so a server
 * mounted below a proxy prefix keeps that prefix.
 */
export function buildUrl(baseUrl: string, path: string): URL {
  const base = baseUrl.replace(/\/+$/, "");
  return new URL(`${base}${path.startsWith("/") ? path : `/${path}`}`);
}

export function createApiClient({
  baseUrl = DEFAULT_BASE_URL,
  sessionStore = new ConfSessionStore(),
  cookieName = DEFAULT_COOKIE_NAME,
  fetchImpl = fetch,
}: ApiClientOptions = {}): ApiClient {
  async function request(req: TransportRequest): Promise<TransportResponse> {
    const url = buildUrl(baseUrl, req.path);
    const headers: Record<string, string> = {
      Accept: "application/json",
      Cookie: `${cookieName}=${sessionStore.getSessionId()}`,
    };
    const init: RequestInit = { method: req.method, headers };

    if (req.method === "GET" || req.method === "DELETE") {
      for (const [key, value] of Object.entries(req.params)) {
        url.searchParams.set(key, value);
      }
    } else {
      // The server reads pending job ids from the query string only
      if (req.params.jobs !== undefined) url.searchParams.set("jobs", req.params.jobs);
      headers["Content-Type"] = "application/x-www-form-urlencoded";
      init.body = new URLSearchParams(req.params).toString();
    }

    if (req.timeoutMs !== undefined) {
      init.signal = AbortSignal.timeout(req.timeoutMs);
    }

    const exchange: TransportExchange = { request: req };
    let status: number;
    let statusText: string;
    let ok: boolean;
    let text: string;
    try {
      const response = await fetchImpl(url, init);
      ({ status, statusText, ok } = response);
      text = await response.text();
    } catch (error) {
      if (isAbortError(error)) throw requestTimeout(exchange, req.timeoutMs ?? 0);
      throw networkError(exchange, error instanceof Error ? error : undefined);
    }

    let body: unknown = text;
    let parsed = true;
    if (text) {
      try {
        body = JSON.parse(text);
      } catch {
        parsed = false;
      }
    } else {
      body = {};
    }

    const completed: TransportResponse = { request: req, status, statusText, body };
    if (!ok) throw httpStatusError(completed);
    if (!parsed) throw invalidResponse(completed, "body is not JSON");
    return completed;
  }

  return { baseUrl, request };
}
