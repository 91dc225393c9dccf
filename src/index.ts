/**
 * webtrawl - breadth-first web crawler emitting one structured record per page.
 *
 * @module webtrawl
 */
export * from './crawl/index.js';
export * from './fetch/index.js';
export {
  htmlToMarkdown,
  cleanMarkdown,
  convertHtml,
  defaultContentConverter,
} from './extract/markdown.js';
export { extractMetadata, defaultMetadataExtractor } from './extract/metadata-extractors.js';
export {
  createPageRecord,
  serializePageRecord,
  parsePageRecord,
  PageRecordSchema,
} from './export/page-record.js';
export { JsonlExporter } from './export/jsonl-exporter.js';
export { ExportError } from './export/types.js';
export type { PageMetadata } from './extract/metadata-extractors.js';
export type { PageRecord, PageRecordFields } from './export/page-record.js';
export type { Exporter } from './export/types.js';
