import TurndownService from 'turndown';
import { gfm } from 'turndown-plugin-gfm';
import { logger } from '../logger.js';
import type { ContentConverter } from '../crawl/types.js';

const MAX_BLANK_LINES = 2;

function createTurndownService(): TurndownService {
  const td = new TurndownService({
    headingStyle: 'atx',
    hr: '---',
    bulletListMarker: '-',
    codeBlockStyle: 'fenced',
    emDelimiter: '*',
    strongDelimiter: '**',
    linkStyle: 'inlined',
  });
  td.use(gfm);
  td.remove(['script', 'style', 'noscript', 'title']);
  return td;
}

const turndown = createTurndownService();

export function htmlToMarkdown(html: string): string {
  if (!html || !html.trim()) return '';
  try {
    return turndown.turndown(html);
  } catch (e) {
    logger.debug({ error: String(e), htmlLength: html.length }, 'Turndown conversion failed');
    return '';
  }
}

/**
 * Collapse runs of blank lines to at most two and trim the result.
 * Lines holding only whitespace count as blank.
 */
export function cleanMarkdown(markdown: string): string {
  const out: string[] = [];
  let blankRun = 0;

  for (const line of markdown.split(/\r?\n/)) {
    if (line.trim() === '') {
      blankRun++;
      if (blankRun > MAX_BLANK_LINES) continue;
      out.push('');
    } else {
      blankRun = 0;
      out.push(line);
    }
  }

  return out.join('\n').trim();
}

export function convertHtml(html: string): string {
  return cleanMarkdown(htmlToMarkdown(html));
}

export const defaultContentConverter: ContentConverter = {
  convert: convertHtml,
};
