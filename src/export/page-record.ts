/**
 * Page record: one per successfully fetched page, frozen once built
 */
import { z } from 'zod';

export const PageRecordSchema = z.object({
  url: z.string().min(1),
  title: z.string(),
  description: z.string().optional(),
  content: z.string(),
  rawHtml: z.string().optional(),
  links: z.array(z.string()),
  crawledAt: z.string().datetime(),
  metadata: z.record(z.string()).default({}),
});

export interface PageRecord {
  readonly url: string;
  readonly title: string;
  readonly description?: string;
  readonly content: string;
  readonly rawHtml?: string;
  readonly links: readonly string[];
  /** ISO-8601 UTC timestamp */
  readonly crawledAt: string;
  readonly metadata: Readonly<Record<string, string>>;
}

export interface PageRecordFields {
  url: string;
  content: string;
  links: readonly string[];
  title?: string;
  description?: string;
  rawHtml?: string;
  crawledAt?: Date;
  metadata?: Record<string, string>;
}

export function createPageRecord(fields: PageRecordFields): PageRecord {
  const record: PageRecord = {
    url: fields.url,
    title: fields.title ?? '',
    content: fields.content,
    links: Object.freeze([...fields.links]),
    crawledAt: (fields.crawledAt ?? new Date()).toISOString(),
    metadata: Object.freeze({ ...fields.metadata }),
    ...(fields.description !== undefined && { description: fields.description }),
    ...(fields.rawHtml !== undefined && { rawHtml: fields.rawHtml }),
  };
  return Object.freeze(record);
}

/** JSON encoding; absent optionals and an empty metadata map are left out. */
export function serializePageRecord(record: PageRecord, pretty = false): string {
  const { metadata, ...rest } = record;
  const payload = Object.keys(metadata).length > 0 ? { ...rest, metadata } : rest;
  return pretty ? JSON.stringify(payload, null, 2) : JSON.stringify(payload);
}

/** Decode and validate one serialized record. Throws on malformed JSON or shape. */
export function parsePageRecord(json: string): PageRecord {
  const data = PageRecordSchema.parse(JSON.parse(json));
  return Object.freeze({
    ...data,
    links: Object.freeze(data.links),
    metadata: Object.freeze(data.metadata),
  });
}
