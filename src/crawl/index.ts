/**
 * Crawl module barrel exports
 */
export { Crawler, crawl } from './crawler.js';
export { UrlFrontier, normalizeUrl, extractHost, extractPath } from './url-frontier.js';
export {
  extractLinks,
  resolveReference,
  resolveDotSegments,
  isCrawlableReference,
  cleanReference,
  parseBaseUrl,
  defaultLinkResolver,
} from './link-resolver.js';
export { createCrawlConfig, CrawlConfigSchema, CrawlConfigError } from './config.js';
export type { CrawlConfig, CrawlConfigInput, OutputFormat } from './config.js';
export type { FrontierEntry, FrontierOptions, FrontierStats } from './url-frontier.js';
export type { BaseUrlParts } from './link-resolver.js';
export type {
  ContentConverter,
  CrawlDependencies,
  CrawlState,
  CrawlStats,
  CrawlStep,
  CrawlSummary,
  LinkResolver,
  MetadataExtractor,
  StopReason,
} from './types.js';
