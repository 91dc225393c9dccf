/**
 * Types for the crawl module
 */
import type { Fetcher, FetchErrorCode } from '../fetch/types.js';
import type { PageMetadata } from '../extract/metadata-extractors.js';
import type { PageRecord } from '../export/page-record.js';
import type { Exporter } from '../export/types.js';

export interface LinkResolver {
  extract(html: string, base: string): string[];
}

export interface ContentConverter {
  convert(html: string): string;
}

export interface MetadataExtractor {
  extract(html: string): PageMetadata;
}

export interface CrawlDependencies {
  fetcher: Fetcher;
  converter?: ContentConverter;
  metadataExtractor?: MetadataExtractor;
  linkResolver?: LinkResolver;
  /** Records are kept in memory only when omitted */
  exporter?: Exporter;
  /** Clock used for record timestamps */
  now?: () => Date;
}

export type CrawlState = 'idle' | 'fetching' | 'linking' | 'recording' | 'done';

export type StopReason = 'frontier_exhausted' | 'page_limit' | 'aborted';

export type CrawlStep =
  | { kind: 'crawled'; record: PageRecord; linksFound: number; linksAdmitted: number }
  | { kind: 'failed'; url: string; error: FetchErrorCode; message: string }
  | { kind: 'done'; reason: StopReason };

export interface CrawlStats {
  pagesCrawled: number;
  pagesFailed: number;
  /** Every URL ever admitted to the frontier, seed included */
  urlsDiscovered: number;
  documents: PageRecord[];
}

export interface CrawlSummary {
  type: 'summary';
  pagesCrawled: number;
  pagesFailed: number;
  urlsDiscovered: number;
  durationMs: number;
  seedUrl: string;
  stoppedReason: StopReason;
}
