import * as crypto from 'crypto';
import type { CleaningRules } from '../config/cleaning-rules';
import { VENDOR_CODE_MAX_LENGTH } from '../config/database';
import { describeError, SinkUnavailableError } from '../core/errors';
import { deriveFeatures } from '../core/features';
import { ZoneLocator } from '../core/geo';
import { EtlLogger } from '../core/logger';
import {
  createRunCounters,
  type ChunkCounters,
  type CleanedTripRecord,
  type ExclusionRecord,
  type LoadResult,
  type RawChunk,
  type RunCounters,
  type RunState,
  type RunSummary,
} from '../core/types';
import { validateTrip } from '../core/validator';
import { BatchLoader } from './batch-loader';
import { readChunks, type ChunkSource } from './chunk-reader';
import { ExclusionLog } from './exclusion-log';
import type { TripSink } from './trip-sink';

export interface EtlRunnerOptions {
  source: ChunkSource;
  sink: TripSink;
  chunkSize: number;
  batchSize: number;
  exclusionLogPath: string;
  overwriteExclusionLog: boolean;
  rules: CleaningRules;
  maxAttempts: number;
  baseBackoffMs: number;
  startOffset?: number;
  runId?: string;
  logger?: EtlLogger;
  onProgress?: (chunk: ChunkCounters, totals: RunCounters) => void;
  sleep?: (ms: number) => Promise<void>;
}

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  Idle: ['Reading'],
  Reading: ['Processing', 'Complete', 'Failed'],
  Processing: ['Loading', 'Failed'],
  Loading: ['Reading', 'Stopped', 'Failed'],
  Complete: [],
  Failed: [],
  Stopped: [],
};

export function generateRunId(): string {
  return `run_${Date.now()}_${crypto.randomBytes(4).toString('hex')}`;
}

interface ProcessedChunk {
  cleaned: CleanedTripRecord[];
  excluded: ExclusionRecord[];
}

/**
 * Drives one ETL run: read a chunk, validate and derive every row in source
 * order, load the cleaned rows, account, repeat. Each instance runs once and
 * owns the counters of that run.
 */
export class EtlRunner {
  public readonly runId: string;
  private readonly options: EtlRunnerOptions;
  private readonly logger: EtlLogger;
  private readonly exclusionLog: ExclusionLog;
  private readonly loader: BatchLoader;
  private state: RunState = 'Idle';
  private started = false;
  private stopRequested = false;
  private counters: RunCounters = createRunCounters();

  constructor(options: EtlRunnerOptions) {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
      throw new RangeError(`chunkSize must be a positive integer, got ${options.chunkSize}`);
    }
    this.options = options;
    this.runId = options.runId ?? generateRunId();
    this.logger = options.logger ?? new EtlLogger({ runId: this.runId, logDir: null });
    this.exclusionLog = new ExclusionLog({
      path: options.exclusionLogPath,
      overwrite: options.overwriteExclusionLog,
      onWarning: (message, error) => this.logger.logWarning(message, { error: describeError(error).message }),
    });
    this.loader = new BatchLoader(options.sink, {
      batchSize: options.batchSize,
      maxAttempts: options.maxAttempts,
      baseBackoffMs: options.baseBackoffMs,
      logger: this.logger,
      sleep: options.sleep,
    });
  }

  get currentState(): RunState {
    return this.state;
  }

  /** Asks the run to stop once the chunk in flight has been loaded. */
  public requestStop(): void {
    this.stopRequested = true;
  }

  private transition(next: RunState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Illegal ETL state transition ${this.state} -> ${next}`);
    }
    this.logger.logStateChange(this.state, next);
    this.state = next;
  }

  public async run(): Promise<RunSummary> {
    if (this.started) {
      throw new Error(`ETL run ${this.runId} has already been started`);
    }
    this.started = true;
    const startedAt = new Date();
    this.counters = createRunCounters();
    let failure: unknown = null;

    this.transition('Reading');
    this.logger.logPhaseStart('ETL', { exclusion_log: this.exclusionLog.path });

    try {
      await this.options.sink.prepare();
      const zones = await this.loadZones();
      const chunks = readChunks(this.options.source, {
        chunkSize: this.options.chunkSize,
        startOffset: this.options.startOffset,
        optionalColumns: this.options.rules.estimateFareWhenAbsent ? ['fare_amount'] : [],
      });

      for await (const chunk of chunks) {
        const chunkStart = Date.now();
        this.transition('Processing');
        const processed = this.processChunk(chunk, zones);
        const chunkCounters: ChunkCounters = {
          index: chunk.index,
          startRow: chunk.startRow,
          read: chunk.rows.length,
          cleaned: processed.cleaned.length,
          excluded: processed.excluded.length,
          inserted: 0,
          insertFailed: 0,
          durationMs: 0,
        };
        this.countProcessed(chunkCounters, processed);

        this.transition('Loading');
        await this.assignVendors(processed.cleaned);
        const result = await this.loadChunk(chunk, processed);

        chunkCounters.inserted = result.inserted;
        chunkCounters.insertFailed = result.failed.length;
        chunkCounters.durationMs = Date.now() - chunkStart;
        this.counters.chunks.push(chunkCounters);
        this.logger.logChunk(chunkCounters, this.counters);
        this.options.onProgress?.(chunkCounters, this.counters);

        if (this.stopRequested) {
          this.transition('Stopped');
          break;
        }
        this.transition('Reading');
      }

      if (this.state === 'Reading') {
        this.transition('Complete');
      }
    } catch (error) {
      failure = error;
      this.logger.logError(error, { state: this.state });
      this.transition('Failed');
    }

    this.logger.logPhaseEnd('ETL', this.counters.rowsRead);
    const finishedAt = new Date();
    const summary: RunSummary = {
      runId: this.runId,
      status: this.state === 'Complete' || this.state === 'Stopped' ? this.state : 'Failed',
      counters: this.counters,
      successRate: this.counters.rowsRead > 0 ? (this.counters.rowsInserted / this.counters.rowsRead) * 100 : 0,
      exclusionLogPath: this.exclusionLog.path,
      startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      ...(failure !== null ? { error: describeError(failure) } : {}),
    };
    this.logger.logSummary(summary);
    return summary;
  }

  private async loadZones(): Promise<ZoneLocator | null> {
    try {
      const zones = await this.options.sink.loadZones();
      return zones.length > 0 ? new ZoneLocator(zones, this.options.rules.maxZoneDistanceKm) : null;
    } catch (error) {
      this.logger.logWarning('Zones unavailable, trips are loaded without zone references', {
        error: describeError(error).message,
      });
      return null;
    }
  }

  private processChunk(chunk: RawChunk, zones: ZoneLocator | null): ProcessedChunk {
    const cleaned: CleanedTripRecord[] = [];
    const excluded: ExclusionRecord[] = [];

    chunk.rows.forEach((raw, offset) => {
      const rowNumber = chunk.startRow + offset;
      const result = validateTrip(raw, this.options.rules);
      if (result.ok) {
        cleaned.push(deriveFeatures(result.value, { runId: this.runId, rowNumber, zones }));
      } else {
        excluded.push({ runId: this.runId, rowNumber, reason: result.reason, detail: result.detail, raw });
      }
    });

    return { cleaned, excluded };
  }

  private countProcessed(chunk: ChunkCounters, processed: ProcessedChunk): void {
    this.counters.rowsRead += chunk.read;
    this.counters.rowsCleaned += processed.cleaned.length;
    this.counters.rowsExcluded += processed.excluded.length;
    for (const exclusion of processed.excluded) {
      this.counters.excludedByReason[exclusion.reason]++;
    }
  }

  /** Over-long vendor codes do not fit the vendors table; their trips load without a vendor. */
  private async assignVendors(records: CleanedTripRecord[]): Promise<void> {
    const codes = [...new Set(records.flatMap((r) => (r.vendor_code === null ? [] : [r.vendor_code])))];
    const storable = codes.filter((code) => code.length <= VENDOR_CODE_MAX_LENGTH);
    if (storable.length < codes.length) {
      this.logger.logWarning('Vendor codes too long to store, trips are loaded without vendor references', {
        vendors: codes.length - storable.length,
        max_length: VENDOR_CODE_MAX_LENGTH,
      });
    }
    if (storable.length === 0) return;

    try {
      const ids = await this.options.sink.resolveVendorIds(storable);
      for (const record of records) {
        if (record.vendor_code !== null) {
          record.vendor_id = ids.get(record.vendor_code) ?? null;
        }
      }
    } catch (error) {
      this.logger.logWarning('Vendor lookup failed, trips are loaded without vendor references', {
        vendors: storable.length,
        error: describeError(error).message,
      });
    }
  }

  private async loadChunk(chunk: RawChunk, processed: ProcessedChunk): Promise<LoadResult> {
    let result: LoadResult;
    try {
      result = await this.loader.load(processed.cleaned);
    } catch (error) {
      if (error instanceof SinkUnavailableError) {
        this.countLoaded(error.partial);
        await this.writeExclusions([...processed.excluded, ...this.insertFailures(chunk, error.partial)]);
      } else {
        await this.writeExclusions(processed.excluded);
      }
      throw error;
    }

    this.countLoaded(result);
    await this.writeExclusions([...processed.excluded, ...this.insertFailures(chunk, result)]);
    return result;
  }

  private countLoaded(result: LoadResult): void {
    this.counters.rowsInserted += result.inserted;
    this.counters.rowsInsertFailed += result.failed.length;
    this.counters.excludedByReason.InsertFailed += result.failed.length;
  }

  private insertFailures(chunk: RawChunk, result: LoadResult): ExclusionRecord[] {
    return result.failed.map(({ record, message }): ExclusionRecord => ({
      runId: this.runId,
      rowNumber: record.row_number,
      reason: 'InsertFailed',
      detail: message,
      raw: chunk.rows[record.row_number - chunk.startRow] ?? {},
    }));
  }

  /** Appends exclusions in source-row order; a failed write only counts as a warning. */
  private async writeExclusions(records: ExclusionRecord[]): Promise<void> {
    records.sort((a, b) => a.rowNumber - b.rowNumber);
    const outcome = await this.exclusionLog.log(records);
    this.counters.exclusionLogFailures += outcome.failed;
  }
}
