/**
 * Link discovery: href extraction, validity filtering, and resolution of references against the
 * page they were found on. Pure string work, no network and no frontier state.
 */
import { parseHTML } from 'linkedom';
import type { LinkResolver } from './types.js';

export interface BaseUrlParts {
  scheme: string;
  /** Host including any explicit port */
  host: string;
  /** Path without query or fragment, always starting with `/` */
  path: string;
}

const NON_NAVIGABLE_SCHEMES = ['javascript:', 'mailto:', 'tel:', 'data:'];

const HTTP_SCHEME = /^https?:\/\//i;
const ANY_SCHEME = /^[a-z][a-z0-9+.-]*:/i;
const BASE_URL = /^([a-z][a-z0-9+.-]*):\/\/([^/?#]*)([^?#]*)/i;

/** Strip everything from the first `#` and trim surrounding whitespace. */
export function cleanReference(reference: string): string {
  const hashIdx = reference.indexOf('#');
  return (hashIdx === -1 ? reference : reference.slice(0, hashIdx)).trim();
}

/**
 * Whether an href is worth resolving. Empty values, same-page fragments and
 * non-navigable schemes are rejected.
 */
export function isCrawlableReference(reference: string): boolean {
  const value = reference.trim();
  if (!value) return false;
  if (value.startsWith('#')) return false;

  const lower = value.toLowerCase();
  return !NON_NAVIGABLE_SCHEMES.some((scheme) => lower.startsWith(scheme));
}

/** Split a base URL into scheme, host[:port] and path. Returns undefined without `scheme://`. */
export function parseBaseUrl(base: string): BaseUrlParts | undefined {
  const match = BASE_URL.exec(base.trim());
  if (!match) return undefined;
  const [, scheme, host, path] = match;
  return { scheme, host, path: path || '/' };
}

/**
 * Resolve `.` and `..` segments. Empty segments collapse, and `..` never climbs above the root.
 * A path that resolves to nothing becomes `/`.
 */
export function resolveDotSegments(path: string): string {
  const resolved: string[] = [];

  for (const segment of path.split('/')) {
    if (segment === '.' || segment === '') {
      if (resolved.length === 0) resolved.push('');
    } else if (segment === '..') {
      if (resolved.length > 1) resolved.pop();
    } else {
      resolved.push(segment);
    }
  }

  return resolved.length > 1 ? resolved.join('/') : '/';
}

function directoryOf(path: string): string {
  return path.endsWith('/') ? path : path.slice(0, path.lastIndexOf('/') + 1);
}

/**
 * Resolve a reference found on `base` into an absolute, fragment-free URL.
 * Returns undefined when the base cannot be parsed or the reference uses a scheme other than
 * http(s).
 */
export function resolveReference(reference: string, base: string): string | undefined {
  const ref = reference.trim();

  if (HTTP_SCHEME.test(ref)) return cleanReference(ref);

  if (ref.startsWith('//')) {
    const scheme = /^https:\/\//i.test(base.trim()) ? 'https:' : 'http:';
    return cleanReference(`${scheme}${ref}`);
  }

  if (ANY_SCHEME.test(ref)) return undefined;

  const parts = parseBaseUrl(base);
  if (!parts) return undefined;

  const origin = `${parts.scheme}://${parts.host}`;
  if (ref.startsWith('/')) return cleanReference(`${origin}${ref}`);

  const combined = `${directoryOf(parts.path)}${ref}`;
  const queryIdx = combined.indexOf('?');
  const path = queryIdx === -1 ? combined : combined.slice(0, queryIdx);
  const query = queryIdx === -1 ? '' : combined.slice(queryIdx);

  return cleanReference(`${origin}${resolveDotSegments(path)}${query}`);
}

/**
 * Extract absolute URLs from `<a href>` tags. Invalid and unresolvable references are dropped;
 * duplicates collapse to their first occurrence.
 */
export function extractLinks(html: string, baseUrl: string): string[] {
  if (!html.trim()) return [];

  const { document } = parseHTML(html);
  const links = new Set<string>();

  for (const anchor of document.querySelectorAll('a[href]')) {
    const href = anchor.getAttribute('href');
    if (href === null || !isCrawlableReference(href)) continue;

    const resolved = resolveReference(href, baseUrl);
    if (resolved) links.add(resolved);
  }

  return [...links];
}

export const defaultLinkResolver: LinkResolver = {
  extract: extractLinks,
};
