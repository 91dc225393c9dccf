/**
 * Metadata extraction: title and <meta> tags from the document head.
 */
import { parseHTML } from 'linkedom';
import type { MetadataExtractor } from '../crawl/types.js';

export interface PageMetadata {
  title?: string;
  description?: string;
  keywords?: string;
  author?: string;
  /** Remaining named meta tags, keyed by their name (or property) as written */
  other: Record<string, string>;
}

/**
 * Extract title from document
 */
export function extractTitle(document: Document): string | undefined {
  const title = document.querySelector('title')?.textContent?.trim();
  return title || undefined;
}

/**
 * Read every `<meta name|property content>` pair. Entity decoding comes from the parser.
 */
export function extractMetaTags(document: Document, metadata: PageMetadata): void {
  for (const el of document.querySelectorAll('meta[content]')) {
    const key = el.getAttribute('name') ?? el.getAttribute('property');
    const content = el.getAttribute('content');
    if (!key || content === null) continue;

    switch (key.toLowerCase()) {
      case 'description':
        metadata.description = content;
        break;
      case 'keywords':
        metadata.keywords = content;
        break;
      case 'author':
        metadata.author = content;
        break;
      default:
        metadata.other[key] = content;
    }
  }
}

export function extractMetadata(html: string): PageMetadata {
  const metadata: PageMetadata = { other: {} };
  if (!html.trim()) return metadata;

  const { document } = parseHTML(html);
  const title = extractTitle(document);
  if (title !== undefined) metadata.title = title;
  extractMetaTags(document, metadata);

  return metadata;
}

export const defaultMetadataExtractor: MetadataExtractor = {
  extract: extractMetadata,
};
