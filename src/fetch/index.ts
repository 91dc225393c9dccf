/**
 * Public API exports for the fetch module
 */
export {
  HttpFetcher,
  classifyFetchError,
  isHtmlContentType,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  MAX_RESPONSE_SIZE,
} from './http-fetch.js';
export type {
  Fetcher,
  FetchErrorCode,
  FetchFailure,
  FetchOutcome,
  FetchSuccess,
  HttpFetcherOptions,
} from './types.js';
