/**
 * Crawl configuration: validated once, frozen, never mutated during a crawl
 */
import { z } from 'zod';

export const OUTPUT_FORMATS = ['jsonl', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const CrawlConfigSchema = z.object({
  seedUrl: z
    .string()
    .trim()
    .min(1, 'Seed URL must not be empty')
    .regex(/^https?:\/\//i, 'Seed URL must start with http:// or https://'),
  maxPages: z.number().int().positive().optional(),
  maxDepth: z.number().int().nonnegative().optional(),
  allowedDomains: z
    .array(z.string().trim().min(1))
    .transform((domains) => domains.map((d) => d.toLowerCase()))
    .optional(),
  include: z.array(z.string().min(1)).optional(),
  exclude: z.array(z.string().min(1)).optional(),
  includeRawHtml: z.boolean().default(false),
  outputDir: z.string().min(1).default('output'),
  outputFile: z.string().min(1).default('crawl.jsonl'),
  format: z.enum(OUTPUT_FORMATS).default('jsonl'),
  verbose: z.boolean().default(false),
});

export type CrawlConfigInput = z.input<typeof CrawlConfigSchema>;

export type CrawlConfig = Readonly<z.output<typeof CrawlConfigSchema>>;

/** Invalid crawl configuration; raised before any fetch happens. */
export class CrawlConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid crawl configuration: ${issues.join('; ')}`);
    this.name = 'CrawlConfigError';
    this.issues = issues;
  }
}

export function createCrawlConfig(input: CrawlConfigInput): CrawlConfig {
  const result = CrawlConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new CrawlConfigError(issues);
  }
  return Object.freeze(result.data);
}
