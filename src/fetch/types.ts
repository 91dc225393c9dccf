/**
 * Shared types for the fetch module
 */

export type FetchErrorCode =
  | 'network_error'
  | 'dns_error'
  | 'timeout'
  | 'http_status_error'
  | 'wrong_content_type'
  | 'response_too_large'
  | 'malformed_response';

export interface FetchSuccess {
  ok: true;
  url: string;
  html: string;
  statusCode: number;
  contentType: string | null;
  latencyMs: number;
}

export interface FetchFailure {
  ok: false;
  url: string;
  error: FetchErrorCode;
  message: string;
  statusCode?: number;
  latencyMs: number;
}

export type FetchOutcome = FetchSuccess | FetchFailure;

/** Turns a URL into page markup or a failure. Implementations resolve, they do not throw. */
export interface Fetcher {
  fetch(url: string): Promise<FetchOutcome>;
}

export interface HttpFetcherOptions {
  /** Per-request deadline in milliseconds */
  timeout?: number;
  userAgent?: string;
  /** Body size cap in bytes */
  maxResponseSize?: number;
}
