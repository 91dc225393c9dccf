/**
 * Crawl orchestrator: one URL in flight, fetch → link → record per step, breadth-first
 */
import { UrlFrontier, type FrontierStats } from './url-frontier.js';
import { defaultLinkResolver } from './link-resolver.js';
import { createCrawlConfig, type CrawlConfig, type CrawlConfigInput } from './config.js';
import type {
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
import type { Fetcher, FetchOutcome } from '../fetch/types.js';
import { defaultContentConverter } from '../extract/markdown.js';
import { defaultMetadataExtractor, type PageMetadata } from '../extract/metadata-extractors.js';
import { createPageRecord, type PageRecord } from '../export/page-record.js';
import type { Exporter } from '../export/types.js';
import { logger } from '../logger.js';

function recordMetadata(meta: PageMetadata, depth: number): Record<string, string> {
  const metadata: Record<string, string> = { ...meta.other };
  if (meta.keywords !== undefined) metadata.keywords = meta.keywords;
  if (meta.author !== undefined) metadata.author = meta.author;
  metadata.depth = String(depth);
  return metadata;
}

export class Crawler {
  readonly config: CrawlConfig;
  private readonly frontier: UrlFrontier;
  private readonly fetcher: Fetcher;
  private readonly converter: ContentConverter;
  private readonly metadataExtractor: MetadataExtractor;
  private readonly linkResolver: LinkResolver;
  private readonly exporter: Exporter | undefined;
  private readonly now: () => Date;

  private currentState: CrawlState = 'idle';
  private stopReason: StopReason | null = null;
  private started = false;
  private pagesCrawled = 0;
  private pagesFailed = 0;
  private readonly documents: PageRecord[] = [];

  /** Throws CrawlConfigError on an invalid configuration, before anything is fetched. */
  constructor(config: CrawlConfigInput, dependencies: CrawlDependencies) {
    this.config = createCrawlConfig(config);
    this.fetcher = dependencies.fetcher;
    this.converter = dependencies.converter ?? defaultContentConverter;
    this.metadataExtractor = dependencies.metadataExtractor ?? defaultMetadataExtractor;
    this.linkResolver = dependencies.linkResolver ?? defaultLinkResolver;
    this.exporter = dependencies.exporter;
    this.now = dependencies.now ?? (() => new Date());

    const { seedUrl, maxPages, maxDepth, allowedDomains, include, exclude } = this.config;
    this.frontier = new UrlFrontier(seedUrl, {
      maxPages,
      maxDepth,
      allowedDomains,
      include,
      exclude,
    });
  }

  get state(): CrawlState {
    return this.currentState;
  }

  /** Run one iteration of the loop. Once done, every further call returns the same `done` step. */
  async step(): Promise<CrawlStep> {
    if (this.stopReason !== null) return { kind: 'done', reason: this.stopReason };

    if (!this.started) {
      this.started = true;
      logger.info(
        {
          seedUrl: this.config.seedUrl,
          maxPages: this.config.maxPages,
          maxDepth: this.config.maxDepth,
        },
        'Crawl started'
      );
    }

    const entry = this.frontier.next();
    if (!entry) {
      return this.finish(this.frontier.limitReached() ? 'page_limit' : 'frontier_exhausted');
    }

    this.currentState = 'fetching';
    const outcome = await this.fetchPage(entry.url);

    if (!outcome.ok) {
      this.pagesFailed++;
      logger.warn(
        { url: entry.url, error: outcome.error, statusCode: outcome.statusCode },
        `Fetch failed: ${outcome.message}`
      );
      this.settle();
      return { kind: 'failed', url: entry.url, error: outcome.error, message: outcome.message };
    }

    this.currentState = 'linking';
    const links = this.linkResolver.extract(outcome.html, entry.url);
    const linksAdmitted = this.frontier.addAll(links, entry.depth + 1);

    this.currentState = 'recording';
    const meta = this.metadataExtractor.extract(outcome.html);
    const record = createPageRecord({
      url: entry.url,
      title: meta.title,
      description: meta.description,
      content: this.converter.convert(outcome.html),
      rawHtml: this.config.includeRawHtml ? outcome.html : undefined,
      links,
      crawledAt: this.now(),
      metadata: recordMetadata(meta, entry.depth),
    });

    await this.export(record);
    this.pagesCrawled++;
    this.documents.push(record);

    logger.debug(
      { url: entry.url, depth: entry.depth, linksFound: links.length, linksAdmitted },
      'Page crawled'
    );

    this.settle();
    return { kind: 'crawled', record, linksFound: links.length, linksAdmitted };
  }

  /** End the crawl before the next iteration starts. */
  stop(): void {
    if (this.stopReason === null) this.finish('aborted');
  }

  async run(signal?: AbortSignal): Promise<CrawlStats> {
    for (;;) {
      if (signal?.aborted) this.stop();
      const result = await this.step();
      if (result.kind === 'done') break;
    }
    return this.stats();
  }

  stats(): CrawlStats {
    return {
      pagesCrawled: this.pagesCrawled,
      pagesFailed: this.pagesFailed,
      urlsDiscovered: this.frontier.stats().totalSeen,
      documents: [...this.documents],
    };
  }

  frontierStats(): FrontierStats {
    return this.frontier.stats();
  }

  private async fetchPage(url: string): Promise<FetchOutcome> {
    try {
      return await this.fetcher.fetch(url);
    } catch (error) {
      return {
        ok: false,
        url,
        error: 'network_error',
        message: error instanceof Error ? error.message : String(error),
        latencyMs: 0,
      };
    }
  }

  private async export(record: PageRecord): Promise<void> {
    if (!this.exporter) return;
    try {
      await this.exporter.append(record);
    } catch (error) {
      logger.warn({ url: record.url, error: String(error) }, 'Failed to export page record');
    }
  }

  /** Back to idle, unless stop() ended the crawl while this step was in flight. */
  private settle(): void {
    if (this.stopReason === null) this.currentState = 'idle';
  }

  private finish(reason: StopReason): CrawlStep {
    this.stopReason = reason;
    this.currentState = 'done';
    logger.info(
      {
        reason,
        pagesCrawled: this.pagesCrawled,
        pagesFailed: this.pagesFailed,
        urlsDiscovered: this.frontier.stats().totalSeen,
      },
      'Crawl finished'
    );
    return { kind: 'done', reason };
  }
}

/**
 * Crawl from the configured seed. Yields each page record as it is produced, then a summary.
 * Aborting the signal ends the crawl after the page in flight.
 */
export async function* crawl(
  config: CrawlConfigInput,
  dependencies: CrawlDependencies,
  signal?: AbortSignal
): AsyncGenerator<PageRecord | CrawlSummary> {
  const crawlStartTime = Date.now();
  const crawler = new Crawler(config, dependencies);

  for (;;) {
    if (signal?.aborted) crawler.stop();
    const result = await crawler.step();

    if (result.kind === 'crawled') {
      yield result.record;
    } else if (result.kind === 'done') {
      const stats = crawler.stats();
      yield {
        type: 'summary',
        pagesCrawled: stats.pagesCrawled,
        pagesFailed: stats.pagesFailed,
        urlsDiscovered: stats.urlsDiscovered,
        durationMs: Date.now() - crawlStartTime,
        seedUrl: crawler.config.seedUrl,
        stoppedReason: result.reason,
      };
      return;
    }
  }
}
