import * as fs from 'fs';
import * as path from 'path';
import * as csvWriter from 'csv-writer';
import { RAW_COLUMNS, type ExclusionRecord } from '../core/types';

export interface ExclusionLogOptions {
  path: string;
  /** Truncate an existing log instead of appending to it. */
  overwrite: boolean;
  onWarning?: (message: string, error: unknown) => void;
}

export interface LogWriteOutcome {
  written: number;
  failed: number;
}

const HEADER = [
  { id: 'run_id', title: 'run_id' },
  { id: 'row_number', title: 'row_number' },
  { id: 'reason', title: 'reason' },
  { id: 'detail', title: 'detail' },
  ...RAW_COLUMNS.map((column) => ({ id: column, title: column })),
];

/**
 * Append-only CSV of rejected rows. Write failures never reach the caller's
 * control flow: they are reported through `onWarning` and counted.
 */
export class ExclusionLog {
  public readonly path: string;
  private readonly overwrite: boolean;
  private readonly onWarning: (message: string, error: unknown) => void;
  private writer: ReturnType<typeof csvWriter.createObjectCsvWriter>;
  private opened = false;

  public written = 0;
  public failedWrites = 0;

  constructor(options: ExclusionLogOptions) {
    this.path = path.resolve(options.path);
    this.overwrite = options.overwrite;
    this.onWarning = options.onWarning ?? (() => undefined);
    this.writer = csvWriter.createObjectCsvWriter({ path: this.path, header: HEADER, append: true });
  }

  private async open(): Promise<void> {
    this.opened = true;
    try {
      await fs.promises.mkdir(path.dirname(this.path), { recursive: true });
      const exists = fs.existsSync(this.path) && fs.statSync(this.path).size > 0;
      if (this.overwrite || !exists) {
        const stringifier = csvWriter.createObjectCsvStringifier({ header: HEADER });
        await fs.promises.writeFile(this.path, stringifier.getHeaderString() ?? '');
      }
    } catch (error) {
      this.onWarning(`Cannot prepare exclusion log ${this.path}`, error);
    }
  }

  public async log(records: readonly ExclusionRecord[]): Promise<LogWriteOutcome> {
    if (!this.opened) {
      await this.open();
    }
    if (records.length === 0) {
      return { written: 0, failed: 0 };
    }

    const rows = records.map((record) => ({
      run_id: record.runId,
      row_number: record.rowNumber,
      reason: record.reason,
      detail: record.detail,
      ...record.raw,
    }));

    try {
      await this.writer.writeRecords(rows);
      this.written += records.length;
      return { written: records.length, failed: 0 };
    } catch (error) {
      this.failedWrites += records.length;
      this.onWarning(`Failed to append ${records.length} exclusion(s) to ${this.path}`, error);
      return { written: 0, failed: records.length };
    }
  }
}
