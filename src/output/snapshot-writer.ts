/**
 * Snapshot Writer
 * Appends product records to the JSONL and CSV snapshot files.
 *
 * Appends are serialized through a promise chain so concurrent site crawls
 * never interleave partial writes.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { RECORD_FIELDS, type ProductRecord } from '../types/index.js';
import { getErrorMessage, SinkWriteError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const JSONL_FILE = 'snapshot.jsonl';
export const CSV_FILE = 'snapshot.csv';

export interface RecordSink {
  append(records: readonly ProductRecord[]): Promise<void>;
}

export function csvCell(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsvRow(record: ProductRecord): string {
  return RECORD_FIELDS.map((field) => csvCell(record[field])).join(',');
}

export class SnapshotWriter implements RecordSink {
  readonly jsonlPath: string;
  readonly csvPath: string;

  private chain: Promise<void> = Promise.resolve();
  private written = 0;

  constructor(private readonly outDir: string) {
    this.jsonlPath = path.join(outDir, JSONL_FILE);
    this.csvPath = path.join(outDir, CSV_FILE);
  }

  get recordsWritten(): number {
    return this.written;
  }

  /**
   * Start a fresh snapshot: create the output directory and delete previous files
   */
  async reset(): Promise<void> {
    await this.chain;
    await fs.mkdir(this.outDir, { recursive: true });
    await fs.rm(this.jsonlPath, { force: true });
    await fs.rm(this.csvPath, { force: true });
    this.written = 0;
  }

  append(records: readonly ProductRecord[]): Promise<void> {
    const next = this.chain.then(() => this.write(records));
    // The chain keeps going after a failure; the caller of append still sees it
    this.chain = next.catch(() => undefined);
    return next;
  }

  /**
   * Make sure both files exist at the end of a run, even when nothing was written
   */
  async finalize(): Promise<void> {
    await this.chain;
    await fs.mkdir(this.outDir, { recursive: true });
    await fs.appendFile(this.jsonlPath, '', 'utf8');
    await fs.appendFile(this.csvPath, '', 'utf8');
    logger.info('Snapshot written', {
      jsonl: this.jsonlPath,
      csv: this.csvPath,
      records: this.written,
    });
  }

  private async write(records: readonly ProductRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    try {
      await fs.mkdir(this.outDir, { recursive: true });

      const jsonl = records.map((record) => `${JSON.stringify(record)}\n`).join('');
      await fs.appendFile(this.jsonlPath, jsonl, 'utf8');

      const header = (await this.csvIsEmpty()) ? `${RECORD_FIELDS.join(',')}\n` : '';
      const rows = records.map((record) => `${toCsvRow(record)}\n`).join('');
      await fs.appendFile(this.csvPath, header + rows, 'utf8');

      this.written += records.length;
    } catch (error) {
      throw new SinkWriteError(`Failed to write snapshot records: ${getErrorMessage(error)}`, error);
    }
  }

  private async csvIsEmpty(): Promise<boolean> {
    try {
      const stat = await fs.stat(this.csvPath);
      return stat.size === 0;
    } catch {
      return true;
    }
  }
}
