/**
 * Export sink contract and its error type
 */
import type { PageRecord } from './page-record.js';

/** Append-only sink; one call per record is equivalent to one batch over the same records. */
export interface Exporter {
  append(record: PageRecord): Promise<void>;
}

/** I/O or serialization failure while persisting records. */
export class ExportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExportError';
  }
}
