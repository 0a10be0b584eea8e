import { SinkUnavailableError, describeError, isTransientSinkError } from '../core/errors';
import type { EtlLogger } from '../core/logger';
import type { CleanedTripRecord, LoadResult } from '../core/types';
import type { TripSink } from './trip-sink';

export interface BatchLoaderOptions {
  batchSize: number;
  /** Attempts per batch (and per row in fallback) before giving up on transient errors. */
  maxAttempts: number;
  baseBackoffMs: number;
  logger?: EtlLogger;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Commits cleaned records in batches of `batchSize`, one transaction each.
 * A batch that keeps failing is degraded to per-row inserts so one bad row
 * only costs itself; rows the sink rejects come back in `failed`.
 */
export class BatchLoader {
  private readonly sink: TripSink;
  private readonly options: BatchLoaderOptions;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(sink: TripSink, options: BatchLoaderOptions) {
    if (!Number.isInteger(options.batchSize) || options.batchSize <= 0) {
      throw new RangeError(`batchSize must be a positive integer, got ${options.batchSize}`);
    }
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts <= 0) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    this.sink = sink;
    this.options = options;
    this.sleep = options.sleep ?? defaultSleep;
  }

  public async load(records: readonly CleanedTripRecord[]): Promise<LoadResult> {
    const result: LoadResult = { inserted: 0, batches: 0, fallbackBatches: 0, failed: [] };

    for (let i = 0; i < records.length; i += this.options.batchSize) {
      const batch = records.slice(i, i + this.options.batchSize);
      result.batches++;

      const bulk = await this.tryBulk(batch);
      if (bulk.ok) {
        result.inserted += batch.length;
        continue;
      }

      result.fallbackBatches++;
      this.options.logger?.logWarning('Batch insert failed, falling back to row-by-row inserts', {
        batch_rows: batch.length,
        first_row: batch[0].row_number,
        message: describeError(bulk.error).message,
      });
      await this.insertRowByRow(batch, result);
    }

    return result;
  }

  /** Retries transient failures with exponential backoff; data errors end the attempt at once. */
  private async tryBulk(
    batch: readonly CleanedTripRecord[]
  ): Promise<{ ok: true } | { ok: false; error: unknown }> {
    const { maxAttempts, baseBackoffMs } = this.options;
    for (let attempt = 1; ; attempt++) {
      try {
        await this.sink.insertBatch(batch);
        return { ok: true };
      } catch (error) {
        if (!isTransientSinkError(error) || attempt >= maxAttempts) {
          return { ok: false, error };
        }
        const delay = baseBackoffMs * Math.pow(2, attempt - 1);
        this.options.logger?.logRetry(attempt, maxAttempts, delay, error);
        await this.sleep(delay);
      }
    }
  }

  private async insertRowByRow(batch: readonly CleanedTripRecord[], result: LoadResult): Promise<void> {
    const { maxAttempts, baseBackoffMs } = this.options;

    for (const record of batch) {
      for (let attempt = 1; ; attempt++) {
        try {
          await this.sink.insertOne(record);
          result.inserted++;
          break;
        } catch (error) {
          if (!isTransientSinkError(error)) {
            result.failed.push({ record, message: describeError(error).message });
            break;
          }
          if (attempt >= maxAttempts) {
            throw new SinkUnavailableError(
              `Sink unreachable after ${maxAttempts} attempt(s) at row ${record.row_number}: ${describeError(error).message}`,
              result,
              error
            );
          }
          await this.sleep(baseBackoffMs * Math.pow(2, attempt - 1));
        }
      }
    }
  }
}
