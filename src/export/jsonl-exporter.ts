/**
 * Append-only JSON Lines sink for page records
 */
import { appendFile, mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ExportError, type Exporter } from './types.js';
import { parsePageRecord, serializePageRecord, type PageRecord } from './page-record.js';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class JsonlExporter implements Exporter {
  readonly filePath: string;

  constructor(
    private readonly outputDir: string,
    fileName = 'crawl.jsonl'
  ) {
    this.filePath = join(outputDir, fileName);
  }

  async append(record: PageRecord): Promise<void> {
    await this.appendLines([serializePageRecord(record)]);
  }

  /** Same file contents as calling append() once per record, in order. */
  async appendBatch(records: readonly PageRecord[]): Promise<void> {
    if (records.length === 0) return;
    await this.appendLines(records.map((record) => serializePageRecord(record)));
  }

  /** Write all records as one pretty-printed JSON array, replacing the file if present. */
  async writeJsonArray(records: readonly PageRecord[], fileName: string): Promise<string> {
    const target = join(this.outputDir, fileName);
    const body = `[\n${records.map((r) => serializePageRecord(r, true)).join(',\n')}\n]\n`;
    try {
      await mkdir(this.outputDir, { recursive: true });
      await writeFile(target, records.length === 0 ? '[]\n' : body, 'utf-8');
    } catch (error) {
      throw new ExportError(`Failed to write ${target}: ${describe(error)}`, { cause: error });
    }
    return target;
  }

  /** Parse every line of the JSONL file back into records. A missing file reads as empty. */
  async readAll(): Promise<PageRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
      throw new ExportError(`Failed to read ${this.filePath}: ${describe(error)}`, {
        cause: error,
      });
    }

    const records: PageRecord[] = [];
    for (const [index, line] of raw.split('\n').entries()) {
      if (!line.trim()) continue;
      try {
        records.push(parsePageRecord(line));
      } catch (error) {
        throw new ExportError(`Malformed record on line ${index + 1}: ${describe(error)}`, {
          cause: error,
        });
      }
    }
    return records;
  }

  private async appendLines(lines: string[]): Promise<void> {
    try {
      await mkdir(this.outputDir, { recursive: true });
      await appendFile(this.filePath, lines.map((line) => `${line}\n`).join(''), 'utf-8');
    } catch (error) {
      throw new ExportError(`Failed to append to ${this.filePath}: ${describe(error)}`, {
        cause: error,
      });
    }
  }
}
