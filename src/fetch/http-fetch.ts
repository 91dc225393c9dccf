/**
 * HTTP fetcher built on Node's global fetch: one request per URL, bounded by a deadline and a
 * body size cap. Redirects are reported, not followed.
 */
import { logger } from '../logger.js';
import type { FetchErrorCode, FetchOutcome, Fetcher, HttpFetcherOptions } from './types.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 20000;
export const DEFAULT_USER_AGENT = 'webtrawl/1.0 (+breadth-first crawler)';
export const MAX_RESPONSE_SIZE = 10 * 1024 * 1024; // 10MB

const HTML_CONTENT_TYPES = new Set(['text/html', 'application/xhtml+xml']);

const DNS_ERROR_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_FAIL', 'EAI_NODATA']);

type BodyResult =
  | { ok: true; text: string }
  | { ok: false; error: FetchErrorCode; message: string };

function mimeType(contentType: string | null): string {
  return (contentType ?? '').split(';')[0].trim().toLowerCase();
}

/** A missing Content-Type counts as HTML. */
export function isHtmlContentType(contentType: string | null): boolean {
  if (!contentType) return true;
  return HTML_CONTENT_TYPES.has(mimeType(contentType));
}

function errorName(error: unknown): string | undefined {
  if (error instanceof Error || error instanceof DOMException) return error.name;
  return undefined;
}

function causeCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined;
  const cause = error.cause;
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}

/** Map a rejected fetch() to an error code. */
export function classifyFetchError(error: unknown): FetchErrorCode {
  const name = errorName(error);
  if (name === 'TimeoutError' || name === 'AbortError') return 'timeout';
  const code = causeCode(error);
  if (code && DNS_ERROR_CODES.has(code)) return 'dns_error';
  return 'network_error';
}

/** Decoder for the charset named in Content-Type; utf-8 when absent or unknown. */
function createDecoder(contentType: string | null): TextDecoder {
  const charset = /charset\s*=\s*"?([^";\s]+)/i.exec(contentType ?? '')?.[1];
  if (charset) {
    try {
      return new TextDecoder(charset);
    } catch (e) {
      logger.debug({ charset, error: String(e) }, 'Unknown charset, decoding as utf-8');
    }
  }
  return new TextDecoder('utf-8');
}

/** Cancel an unread body so the connection is released. */
async function discardBody(response: Response): Promise<void> {
  if (!response.body || response.bodyUsed) return;
  try {
    await response.body.cancel();
  } catch (e) {
    logger.debug({ url: response.url, error: String(e) }, 'Failed to cancel response body');
  }
}

async function readBodyWithLimit(response: Response, maxBytes: number): Promise<BodyResult> {
  const declared = parseInt(response.headers.get('content-length') ?? '', 10);
  if (!isNaN(declared) && declared > maxBytes) {
    await discardBody(response);
    return {
      ok: false,
      error: 'response_too_large',
      message: `Content-Length ${declared} exceeds ${maxBytes} bytes`,
    };
  }
  if (!response.body) return { ok: true, text: '' };

  const reader = response.body.getReader();
  const decoder = createDecoder(response.headers.get('content-type'));
  const chunks: string[] = [];
  let totalBytes = 0;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        await reader.cancel();
        return {
          ok: false,
          error: 'response_too_large',
          message: `Body exceeds ${maxBytes} bytes`,
        };
      }
      chunks.push(decoder.decode(value, { stream: true }));
    }
    chunks.push(decoder.decode());
  } catch (e) {
    return {
      ok: false,
      error: classifyFetchError(e) === 'timeout' ? 'timeout' : 'malformed_response',
      message: `Failed to read body: ${e instanceof Error ? e.message : String(e)}`,
    };
  }

  return { ok: true, text: chunks.join('') };
}

export class HttpFetcher implements Fetcher {
  private readonly timeout: number;
  private readonly userAgent: string;
  private readonly maxResponseSize: number;

  constructor(options: HttpFetcherOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.maxResponseSize = options.maxResponseSize ?? MAX_RESPONSE_SIZE;
  }

  async fetch(url: string): Promise<FetchOutcome> {
    const startTime = Date.now();
    const fail = (error: FetchErrorCode, message: string, statusCode?: number): FetchOutcome => ({
      ok: false,
      url,
      error,
      message,
      statusCode,
      latencyMs: Date.now() - startTime,
    });

    let response: Response;
    try {
      response = await fetch(url, {
        signal: AbortSignal.timeout(this.timeout),
        redirect: 'manual',
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
        },
      });
    } catch (e) {
      const code = classifyFetchError(e);
      const message =
        code === 'timeout'
          ? `Request timed out after ${this.timeout}ms`
          : e instanceof Error
            ? e.message
            : String(e);
      logger.debug({ url, error: code, message }, 'Request failed');
      return fail(code, message);
    }

    if (response.status >= 300 && response.status < 400) {
      await discardBody(response);
      const location = response.headers.get('location');
      return fail(
        'http_status_error',
        `HTTP ${response.status} redirect${location ? ` to ${location}` : ''} not followed`,
        response.status
      );
    }

    if (!response.ok) {
      await discardBody(response);
      return fail('http_status_error', `HTTP ${response.status}`, response.status);
    }

    const contentType = response.headers.get('content-type');
    if (!isHtmlContentType(contentType)) {
      await discardBody(response);
      return fail(
        'wrong_content_type',
        `Unsupported content type: ${mimeType(contentType)}`,
        response.status
      );
    }

    const body = await readBodyWithLimit(response, this.maxResponseSize);
    if (!body.ok) return fail(body.error, body.message, response.status);

    return {
      ok: true,
      url,
      html: body.text,
      statusCode: response.status,
      contentType,
      latencyMs: Date.now() - startTime,
    };
  }
}
