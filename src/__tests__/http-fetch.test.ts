import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import {
  DEFAULT_USER_AGENT,
  HttpFetcher,
  classifyFetchError,
  isHtmlContentType,
} from '../fetch/http-fetch.js';

function htmlResponse(
  body: string,
  init: { status?: number; headers?: Record<string, string> } = {}
): Response {
  return new Response(body, {
    status: init.status ?? 200,
    headers: { 'content-type': 'text/html; charset=utf-8', ...init.headers },
  });
}

function spyOnBodyCancel(response: Response) {
  const body = response.body;
  if (!body) throw new Error('expected a response body');
  return vi.spyOn(body, 'cancel');
}

function dnsError(): TypeError {
  const cause = Object.assign(new Error('getaddrinfo ENOTFOUND missing.test'), {
    code: 'ENOTFOUND',
  });
  return new TypeError('fetch failed', { cause });
}

describe('isHtmlContentType', () => {
  it('accepts HTML types with parameters and a missing header', () => {
    expect(isHtmlContentType('text/html; charset=utf-8')).toBe(true);
    expect(isHtmlContentType('Application/XHTML+XML')).toBe(true);
    expect(isHtmlContentType(null)).toBe(true);
  });

  it('rejects other types', () => {
    expect(isHtmlContentType('application/json')).toBe(false);
    expect(isHtmlContentType('image/png')).toBe(false);
  });
});

describe('classifyFetchError', () => {
  it('maps timeouts and aborts', () => {
    expect(classifyFetchError(new DOMException('timed out', 'TimeoutError'))).toBe('timeout');
    expect(classifyFetchError(new DOMException('aborted', 'AbortError'))).toBe('timeout');
  });

  it('maps resolver failures to dns_error', () => {
    expect(classifyFetchError(dnsError())).toBe('dns_error');
  });

  it('maps everything else to network_error', () => {
    expect(classifyFetchError(new TypeError('fetch failed'))).toBe('network_error');
    expect(classifyFetchError('boom')).toBe('network_error');
  });
});

describe('HttpFetcher', () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the body of an HTML response', async () => {
    fetchMock.mockResolvedValue(htmlResponse('<p>Hello</p>'));

    const outcome = await new HttpFetcher().fetch('http://example.com/');

    expect(outcome).toMatchObject({
      ok: true,
      url: 'http://example.com/',
      html: '<p>Hello</p>',
      statusCode: 200,
      contentType: 'text/html; charset=utf-8',
    });
  });

  it('sends the user agent and does not follow redirects', async () => {
    fetchMock.mockResolvedValue(htmlResponse(''));

    await new HttpFetcher().fetch('http://example.com/');

    expect(fetchMock).toHaveBeenCalledWith(
      'http://example.com/',
      expect.objectContaining({
        redirect: 'manual',
        headers: expect.objectContaining({ 'User-Agent': DEFAULT_USER_AGENT }),
      })
    );
  });

  it('uses a custom user agent', async () => {
    fetchMock.mockResolvedValue(htmlResponse(''));

    await new HttpFetcher({ userAgent: 'test-agent' }).fetch('http://example.com/');

    expect(fetchMock).toHaveBeenCalledWith(
      'http://example.com/',
      expect.objectContaining({
        headers: expect.objectContaining({ 'User-Agent': 'test-agent' }),
      })
    );
  });

  it('accepts a response without content type', async () => {
    fetchMock.mockResolvedValue(
      new Response(new TextEncoder().encode('<p>x</p>'), { status: 200 })
    );

    const outcome = await new HttpFetcher().fetch('http://example.com/');

    expect(outcome).toMatchObject({ ok: true, html: '<p>x</p>', contentType: null });
  });

  it('reports non-success statuses', async () => {
    fetchMock.mockResolvedValue(htmlResponse('missing', { status: 404 }));

    const outcome = await new HttpFetcher().fetch('http://example.com/gone');

    expect(outcome).toMatchObject({
      ok: false,
      url: 'http://example.com/gone',
      error: 'http_status_error',
      message: 'HTTP 404',
      statusCode: 404,
    });
  });

  it('reports redirects without following them', async () => {
    fetchMock.mockResolvedValue(
      new Response(null, { status: 301, headers: { location: 'http://example.com/new' } })
    );

    const outcome = await new HttpFetcher().fetch('http://example.com/old');

    expect(outcome).toMatchObject({
      ok: false,
      error: 'http_status_error',
      message: 'HTTP 301 redirect to http://example.com/new not followed',
      statusCode: 301,
    });
  });

  it('rejects non-HTML content', async () => {
    fetchMock.mockResolvedValue(
      new Response('{}', { status: 200, headers: { 'content-type': 'application/json' } })
    );

    const outcome = await new HttpFetcher().fetch('http://example.com/api');

    expect(outcome).toMatchObject({
      ok: false,
      error: 'wrong_content_type',
      message: 'Unsupported content type: application/json',
    });
  });

  it('rejects bodies over the size cap', async () => {
    fetchMock.mockResolvedValue(htmlResponse('x'.repeat(50)));

    const outcome = await new HttpFetcher({ maxResponseSize: 10 }).fetch('http://example.com/');

    expect(outcome).toMatchObject({
      ok: false,
      error: 'response_too_large',
      message: 'Body exceeds 10 bytes',
    });
  });

  it('rejects a declared length over the size cap', async () => {
    fetchMock.mockResolvedValue(htmlResponse('x', { headers: { 'content-length': '999' } }));

    const outcome = await new HttpFetcher({ maxResponseSize: 10 }).fetch('http://example.com/');

    expect(outcome).toMatchObject({
      ok: false,
      error: 'response_too_large',
      message: 'Content-Length 999 exceeds 10 bytes',
    });
  });

  it('decodes the body with the charset from Content-Type', async () => {
    fetchMock.mockResolvedValue(
      new Response(new Uint8Array([0x63, 0x61, 0x66, 0xe9]), {
        status: 200,
        headers: { 'content-type': 'text/html; charset=ISO-8859-1' },
      })
    );

    const outcome = await new HttpFetcher().fetch('http://example.com/');

    expect(outcome).toMatchObject({ ok: true, html: 'caf\u00e9' });
  });

  it('falls back to utf-8 for an unknown charset', async () => {
    fetchMock.mockResolvedValue(
      new Response(new TextEncoder().encode('caf\u00e9'), {
        status: 200,
        headers: { 'content-type': 'text/html; charset=x-unknown' },
      })
    );

    const outcome = await new HttpFetcher().fetch('http://example.com/');

    expect(outcome).toMatchObject({ ok: true, html: 'caf\u00e9' });
  });

  it('cancels the body of a non-success response', async () => {
    const response = htmlResponse('missing', { status: 404 });
    const cancel = spyOnBodyCancel(response);
    fetchMock.mockResolvedValue(response);

    const outcome = await new HttpFetcher().fetch('http://example.com/gone');

    expect(outcome).toMatchObject({ ok: false, statusCode: 404 });
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('cancels the body of a redirect', async () => {
    const response = new Response('moved', {
      status: 302,
      headers: { location: 'http://example.com/new' },
    });
    const cancel = spyOnBodyCancel(response);
    fetchMock.mockResolvedValue(response);

    await new HttpFetcher().fetch('http://example.com/old');

    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('cancels the body of non-HTML content', async () => {
    const response = new Response('%PDF', {
      status: 200,
      headers: { 'content-type': 'application/pdf' },
    });
    const cancel = spyOnBodyCancel(response);
    fetchMock.mockResolvedValue(response);

    const outcome = await new HttpFetcher().fetch('http://example.com/doc.pdf');

    expect(outcome).toMatchObject({ ok: false, error: 'wrong_content_type' });
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('cancels the body when the declared length is over the cap', async () => {
    const response = htmlResponse('x', { headers: { 'content-length': '999' } });
    const cancel = spyOnBodyCancel(response);
    fetchMock.mockResolvedValue(response);

    await new HttpFetcher({ maxResponseSize: 10 }).fetch('http://example.com/');

    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('reports timeouts', async () => {
    fetchMock.mockRejectedValue(new DOMException('timed out', 'TimeoutError'));

    const outcome = await new HttpFetcher({ timeout: 500 }).fetch('http://example.com/');

    expect(outcome).toMatchObject({
      ok: false,
      error: 'timeout',
      message: 'Request timed out after 500ms',
    });
  });

  it('reports DNS failures', async () => {
    fetchMock.mockRejectedValue(dnsError());

    const outcome = await new HttpFetcher().fetch('http://missing.test/');

    expect(outcome).toMatchObject({ ok: false, error: 'dns_error', message: 'fetch failed' });
  });

  it('reports other network failures', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    const outcome = await new HttpFetcher().fetch('http://example.com/');

    expect(outcome).toMatchObject({ ok: false, error: 'network_error', message: 'fetch failed' });
  });
});
