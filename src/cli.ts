#!/usr/bin/env node
/**
 * CLI entry point for webtrawl
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { HttpFetcher } from './fetch/http-fetch.js';
import { JsonlExporter } from './export/jsonl-exporter.js';
import { serializePageRecord, type PageRecord } from './export/page-record.js';
import { crawl } from './crawl/crawler.js';
import {
  CrawlConfigError,
  OUTPUT_FORMATS,
  createCrawlConfig,
  type CrawlConfig,
  type OutputFormat,
} from './crawl/config.js';
import type { CrawlSummary } from './crawl/types.js';
import { logger } from './logger.js';

const MAX_LIMIT = 100_000;

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return 'unknown';
  } catch (error) {
    // Fall back to 'unknown'
    console.debug('Failed to read version from package.json:', error);
    return 'unknown';
  }
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

export interface CliOptions {
  url: string;
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  rawHtml: boolean;
  format: OutputFormat;
  limit?: number;
  depth?: number;
  allowDomains?: string[];
  include?: string[];
  exclude?: string[];
  output?: string;
  file?: string;
  timeout?: number;
  userAgent?: string;
}

type ParseResult =
  | { kind: 'ok'; opts: CliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

export function parseArgs(args: string[]): ParseResult {
  const positional: string[] = [];
  const warnings: string[] = [];
  const opts: Omit<CliOptions, 'url'> = {
    json: false,
    quiet: false,
    verbose: false,
    rawHtml: false,
    format: 'jsonl',
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--json':
        opts.json = true;
        break;
      case '-q':
      case '--quiet':
        opts.quiet = true;
        break;
      case '--verbose':
        opts.verbose = true;
        break;
      case '--raw-html':
        opts.rawHtml = true;
        break;
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      case '--limit': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--limit requires a value' };
        const v = parseInt(args[++i], 10);
        if (isNaN(v) || v <= 0)
          return { kind: 'error', message: '--limit must be a positive integer' };
        if (v > MAX_LIMIT)
          return { kind: 'error', message: `--limit must not exceed ${MAX_LIMIT}` };
        opts.limit = v;
        break;
      }
      case '--depth': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--depth requires a value' };
        const v = parseInt(args[++i], 10);
        if (isNaN(v) || v < 0)
          return { kind: 'error', message: '--depth must be a non-negative integer' };
        opts.depth = v;
        break;
      }
      case '--allow-domain':
        if (i + 1 >= args.length)
          return { kind: 'error', message: '--allow-domain requires a value' };
        opts.allowDomains = [...(opts.allowDomains ?? []), ...splitList(args[++i])];
        break;
      case '--include':
        if (i + 1 >= args.length) return { kind: 'error', message: '--include requires a value' };
        opts.include = splitList(args[++i]);
        break;
      case '--exclude':
        if (i + 1 >= args.length) return { kind: 'error', message: '--exclude requires a value' };
        opts.exclude = splitList(args[++i]);
        break;
      case '--output':
        if (i + 1 >= args.length) return { kind: 'error', message: '--output requires a value' };
        opts.output = args[++i];
        break;
      case '--file':
        if (i + 1 >= args.length) return { kind: 'error', message: '--file requires a value' };
        opts.file = args[++i];
        break;
      case '--format': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--format requires a value' };
        const v = args[++i].toLowerCase();
        if (!isOutputFormat(v))
          return {
            kind: 'error',
            message: `--format must be one of: ${OUTPUT_FORMATS.join(', ')}`,
          };
        opts.format = v;
        break;
      }
      case '--timeout': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--timeout requires a value' };
        const v = parseInt(args[++i], 10);
        if (isNaN(v) || v <= 0)
          return { kind: 'error', message: '--timeout must be a positive integer (milliseconds)' };
        opts.timeout = v;
        break;
      }
      case '--user-agent':
        if (i + 1 >= args.length)
          return { kind: 'error', message: '--user-agent requires a value' };
        opts.userAgent = args[++i];
        break;
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  if (positional.length === 0) {
    return { kind: 'error', message: 'Missing required <url> argument' };
  }

  return { kind: 'ok', opts: { url: positional[0], ...opts }, warnings };
}

/** Build the crawl configuration from parsed flags. JSON output defaults to crawl.json. */
export function toCrawlConfig(opts: CliOptions): CrawlConfig {
  return createCrawlConfig({
    seedUrl: opts.url,
    maxPages: opts.limit,
    maxDepth: opts.depth,
    allowedDomains: opts.allowDomains,
    include: opts.include,
    exclude: opts.exclude,
    includeRawHtml: opts.rawHtml,
    outputDir: opts.output,
    outputFile: opts.file ?? (opts.format === 'json' ? 'crawl.json' : undefined),
    format: opts.format,
    verbose: opts.verbose,
  });
}

export function formatSummary(summary: CrawlSummary): string {
  return (
    `Crawl complete: ${summary.pagesCrawled} crawled, ${summary.pagesFailed} failed, ` +
    `${summary.urlsDiscovered} discovered, ${summary.durationMs}ms (${summary.stoppedReason})`
  );
}

function printUsage(): void {
  console.log(`Usage: webtrawl <url> [options]

Crawls breadth-first from <url>, writing one record per page to the output file.

Crawl options:
  --limit <n>          Max pages to admit, seed included (1-${MAX_LIMIT})
  --depth <n>          Max link-following depth from the seed
  --allow-domain <h>   Hosts links may point at (comma-separated, repeatable)
  --include <globs>    Path glob patterns to include (comma-separated)
  --exclude <globs>    Path glob patterns to exclude (comma-separated)

Output options:
  --output <dir>       Output directory (default: output)
  --file <name>        Output file name (default: crawl.jsonl, or crawl.json with --format json)
  --format <fmt>       jsonl (append per page) or json (one array at the end)
  --raw-html           Keep each page's raw HTML in its record

Fetch options:
  --timeout <ms>       Request timeout in milliseconds (default: 20000)
  --user-agent <ua>    User-Agent header

Display options:
  --json               Stream records as JSON lines to stdout
  -q, --quiet          Print crawled URLs only
  --verbose            Debug logging on stderr
  -v, --version        Show version number
  -h, --help           Show this help message`);
}

export async function main(): Promise<void> {
  const result = parseArgs(process.argv.slice(2));

  switch (result.kind) {
    case 'version':
      console.log(`webtrawl ${getVersion()}`);
      process.exit(0);
      return;
    case 'help':
      printUsage();
      process.exit(0);
      return;
    case 'error':
      console.error(`Error: ${result.message}`);
      printUsage();
      process.exit(1);
      return;
  }

  const { opts, warnings } = result;

  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  let config: CrawlConfig;
  try {
    config = toCrawlConfig(opts);
  } catch (error) {
    if (!(error instanceof CrawlConfigError)) throw error;
    console.error(`Error: ${error.message}`);
    process.exit(1);
    return;
  }

  if (config.verbose) logger.level = 'debug';

  const fetcher = new HttpFetcher({ timeout: opts.timeout, userAgent: opts.userAgent });
  const exporter = new JsonlExporter(config.outputDir, config.outputFile);
  const streamToFile = config.format === 'jsonl';
  const collected: PageRecord[] = [];
  let recordCount = 0;

  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    const items = crawl(
      config,
      { fetcher, exporter: streamToFile ? exporter : undefined },
      controller.signal
    );

    for await (const item of items) {
      if ('type' in item) {
        console.error(`\n${formatSummary(item)}`);
        continue;
      }

      recordCount++;
      if (!streamToFile) collected.push(item);

      if (opts.json) {
        console.log(serializePageRecord(item));
      } else if (opts.quiet) {
        console.log(item.url);
      } else {
        console.log(item.title ? `${item.url}  ${item.title}` : item.url);
      }
    }
  } finally {
    process.removeListener('SIGINT', onSigint);
  }

  if (!streamToFile) {
    const written = await exporter.writeJsonArray(collected, config.outputFile);
    console.error(`Records written to ${written}`);
  } else if (recordCount > 0) {
    console.error(`Records written to ${exporter.filePath}`);
  } else {
    console.error('No records written');
  }
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main().catch((err) => {
    console.error(`Fatal: ${err}`);
    process.exit(1);
  });
}
