/**
 * BFS URL frontier with canonicalization, dedup, domain allow-list, depth and page-cap policy
 */
import picomatch from 'picomatch';

export interface FrontierEntry {
  url: string;
  depth: number;
}

export interface FrontierOptions {
  maxPages?: number;
  maxDepth?: number;
  /** Exact hosts (case-insensitive, port ignored) that links may point at */
  allowedDomains?: readonly string[];
  /** Path globs; when set, a link's path must match one */
  include?: readonly string[];
  /** Path globs that reject a link */
  exclude?: readonly string[];
}

export interface FrontierStats {
  totalSeen: number;
  queued: number;
  processed: number;
}

const DEFAULT_PORTS: Record<string, string> = {
  http: ':80',
  https: ':443',
};

/**
 * Canonical form used as the dedup key: lowercased, fragment cut, trimmed, default port
 * removed, trailing slashes dropped from the path, and an empty path written as `/`.
 * Strings without `://` are only lowercased, cut at `#` and trimmed.
 * `normalizeUrl(normalizeUrl(x)) === normalizeUrl(x)` for every string.
 */
export function normalizeUrl(url: string): string {
  let value = url.toLowerCase();
  const hashIdx = value.indexOf('#');
  if (hashIdx !== -1) value = value.slice(0, hashIdx);
  value = value.trim();

  const sepIdx = value.indexOf('://');
  if (sepIdx === -1) return value;

  const scheme = value.slice(0, sepIdx);
  const rest = value.slice(sepIdx + 3);
  const authorityEnd = rest.search(/[/?]/);
  let authority = authorityEnd === -1 ? rest : rest.slice(0, authorityEnd);
  const remainder = authorityEnd === -1 ? '' : rest.slice(authorityEnd);

  const queryIdx = remainder.indexOf('?');
  const rawPath = queryIdx === -1 ? remainder : remainder.slice(0, queryIdx);
  const query = queryIdx === -1 ? '' : remainder.slice(queryIdx);

  const defaultPort = DEFAULT_PORTS[scheme];
  while (defaultPort && authority.endsWith(defaultPort)) {
    authority = authority.slice(0, -defaultPort.length);
  }

  const path = rawPath.replace(/[\s/]+$/, '') || '/';
  return `${scheme}://${authority}${path}${query}`;
}

function authorityOf(url: string): string {
  const sepIdx = url.indexOf('://');
  const rest = sepIdx === -1 ? url : url.slice(sepIdx + 3);
  const end = rest.search(/[/?#]/);
  return end === -1 ? rest : rest.slice(0, end);
}

/** Host of a URL without scheme or port. Bracketed IPv6 hosts are kept whole. */
export function extractHost(url: string): string {
  const authority = authorityOf(url);
  if (authority.startsWith('[')) {
    const close = authority.indexOf(']');
    return close === -1 ? authority : authority.slice(0, close + 1);
  }
  const colonIdx = authority.indexOf(':');
  return colonIdx === -1 ? authority : authority.slice(0, colonIdx);
}

/** Path of a URL, without query or fragment. */
export function extractPath(url: string): string {
  const sepIdx = url.indexOf('://');
  if (sepIdx === -1) return url;
  const rest = url.slice(sepIdx + 3);
  const start = rest.search(/[/?#]/);
  if (start === -1 || rest[start] !== '/') return '/';
  const path = rest.slice(start);
  const end = path.search(/[?#]/);
  return end === -1 ? path : path.slice(0, end);
}

export class UrlFrontier {
  private queue: FrontierEntry[] = [];
  private seen = new Set<string>();
  private maxPages: number | undefined;
  private maxDepth: number | undefined;
  private allowedDomains: Set<string> | null;
  private includeMatcher: ((path: string) => boolean) | null;
  private excludeMatcher: ((path: string) => boolean) | null;
  private capRejections = 0;

  constructor(seedUrl: string, options: FrontierOptions = {}) {
    this.maxPages = options.maxPages;
    this.maxDepth = options.maxDepth;

    this.allowedDomains = options.allowedDomains
      ? new Set(options.allowedDomains.map((d) => d.toLowerCase()))
      : null;

    this.includeMatcher =
      options.include && options.include.length > 0
        ? picomatch([...options.include], { dot: true })
        : null;

    this.excludeMatcher =
      options.exclude && options.exclude.length > 0
        ? picomatch([...options.exclude], { dot: true })
        : null;

    // The seed is admitted before any policy applies
    const seed = normalizeUrl(seedUrl);
    this.seen.add(seed);
    this.queue.push({ url: seed, depth: 0 });
  }

  /**
   * Admit a URL. Checks run in a fixed order: dedup, domain, path patterns, depth, page cap.
   * The cap counts every admitted URL, queued or already processed.
   */
  add(url: string, depth = 0): boolean {
    const normalized = normalizeUrl(url);
    if (!normalized) return false;
    if (this.seen.has(normalized)) return false;

    if (this.allowedDomains && !this.allowedDomains.has(extractHost(normalized))) return false;

    const path = extractPath(normalized);
    if (this.includeMatcher && !this.includeMatcher(path)) return false;
    if (this.excludeMatcher && this.excludeMatcher(path)) return false;

    if (this.maxDepth !== undefined && depth > this.maxDepth) return false;
    if (this.maxPages !== undefined && this.seen.size >= this.maxPages) {
      this.capRejections++;
      return false;
    }

    this.seen.add(normalized);
    this.queue.push({ url: normalized, depth });
    return true;
  }

  /** Add multiple URLs at the same depth; returns how many were newly admitted. */
  addAll(urls: Iterable<string>, depth: number): number {
    let added = 0;
    for (const url of urls) {
      if (this.add(url, depth)) added++;
    }
    return added;
  }

  /** Next URL in discovery order, or null when the queue is empty or the cap is reached. */
  next(): FrontierEntry | null {
    if (this.maxPages !== undefined) {
      const processed = this.seen.size - this.queue.length;
      if (processed >= this.maxPages) return null;
    }
    return this.queue.shift() ?? null;
  }

  /** True once the page cap has turned away a URL that would otherwise have been admitted. */
  limitReached(): boolean {
    return this.capRejections > 0;
  }

  hasPending(): boolean {
    return this.queue.length > 0;
  }

  isSeen(url: string): boolean {
    return this.seen.has(normalizeUrl(url));
  }

  stats(): FrontierStats {
    const totalSeen = this.seen.size;
    const queued = this.queue.length;
    return { totalSeen, queued, processed: totalSeen - queued };
  }
}
