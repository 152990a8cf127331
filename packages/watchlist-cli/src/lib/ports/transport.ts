export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type RequestParams = Record<string, string>;

export interface TransportRequest {
  method: HttpMethod;
  path: string;
  params: RequestParams;
  /** Abort the request after this many milliseconds */
  timeoutMs?: number;
}

/**
 * A completed request/response pair. Kept on job handles and errors so a
 * failure can be traced back to the call that started it.
 */
export interface TransportExchange {
  request: TransportRequest;
  status?: number;
  statusText?: string;
  /** Decoded JSON body, or the raw text when it was not JSON */
  body?: unknown;
}

export interface TransportResponse extends TransportExchange {
  status: number;
  statusText: string;
  body: unknown;
}

/**
 * Abstraction for the JSON-over-HTTP transport.
 * Resolves on 2xx responses; rejects with a TransportError otherwise.
 */
export interface Transport {
  request(request: TransportRequest): Promise<TransportResponse>;
}
