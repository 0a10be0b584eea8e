import * as winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { describeError } from './errors';
import type { ChunkCounters, RunCounters, RunState, RunSummary } from './types';

export interface EtlLoggerOptions {
  runId: string;
  /** Directory for the per-run JSON log file; null keeps logging on the console only. */
  logDir: string | null;
  level?: string;
  silent?: boolean;
}

const heapMb = () => process.memoryUsage().heapUsed / 1024 / 1024;

export class EtlLogger {
  private logger: winston.Logger;
  private startTime: number;
  private peakMemory: number;
  public readonly logFile: string | null;

  constructor(options: EtlLoggerOptions) {
    const consoleTransport = new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    });

    this.logFile = null;
    if (options.logDir) {
      if (!fs.existsSync(options.logDir)) {
        fs.mkdirSync(options.logDir, { recursive: true });
      }
      const timestamp = new Date().toISOString().replace(/:/g, '-');
      this.logFile = path.join(options.logDir, `etl_${timestamp}_${options.runId}.log`);
    }

    this.logger = winston.createLogger({
      level: options.level ?? 'info',
      silent: options.silent ?? false,
      defaultMeta: { run_id: options.runId },
      format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      transports: this.logFile
        ? [consoleTransport, new winston.transports.File({ filename: this.logFile })]
        : [consoleTransport],
    });

    this.startTime = Date.now();
    this.peakMemory = heapMb();
  }

  private elapsed(): number {
    return Date.now() - this.startTime;
  }

  private sampleMemory(): number {
    const current = heapMb();
    if (current > this.peakMemory) {
      this.peakMemory = current;
    }
    return current;
  }

  public logStateChange(from: RunState, to: RunState): void {
    this.logger.debug(`State ${from} -> ${to}`, { from, to, timestamp: this.elapsed() });
  }

  public logPhaseStart(phase: string, meta: Record<string, unknown> = {}): void {
    this.logger.info(`Phase started: ${phase}`, {
      phase,
      ...meta,
      timestamp: this.elapsed(),
      memory_mb: this.sampleMemory(),
    });
  }

  public logPhaseEnd(phase: string, recordCount?: number): void {
    this.logger.info(`Phase completed: ${phase}`, {
      phase,
      duration_ms: this.elapsed(),
      records: recordCount,
      memory_mb: this.sampleMemory(),
    });
  }

  public logChunk(chunk: ChunkCounters, totals: RunCounters): void {
    const elapsedSeconds = this.elapsed() / 1000;
    this.logger.info(`[Chunk ${chunk.index}] read ${chunk.read} rows`, {
      chunk: chunk.index,
      start_row: chunk.startRow,
      cleaned: chunk.cleaned,
      excluded: chunk.excluded,
      inserted: chunk.inserted,
      insert_failed: chunk.insertFailed,
      chunk_ms: chunk.durationMs,
      rows_read_total: totals.rowsRead,
      rate_per_second: elapsedSeconds > 0 ? (totals.rowsRead / elapsedSeconds).toFixed(2) : null,
      memory_mb: this.sampleMemory(),
    });
  }

  public logRetry(attempt: number, maxAttempts: number, delayMs: number, error: unknown): void {
    this.logger.warn('Batch insert failed, retrying', {
      attempt,
      max_attempts: maxAttempts,
      delay_ms: delayMs,
      message: describeError(error).message,
    });
  }

  public logWarning(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(message, { ...context, timestamp: this.elapsed() });
  }

  public logError(error: unknown, context?: Record<string, unknown>): void {
    this.logger.error('Error occurred', {
      ...describeError(error),
      stack: error instanceof Error ? error.stack : undefined,
      context,
      timestamp: this.elapsed(),
    });
  }

  public logSummary(summary: RunSummary): void {
    const { counters } = summary;
    this.logger.log(summary.status === 'Failed' ? 'error' : 'info', `ETL ${summary.status}`, {
      total_duration_seconds: (summary.durationMs / 1000).toFixed(2),
      rows_read: counters.rowsRead,
      rows_cleaned: counters.rowsCleaned,
      rows_inserted: counters.rowsInserted,
      rows_excluded: counters.rowsExcluded,
      rows_insert_failed: counters.rowsInsertFailed,
      success_rate: summary.successRate.toFixed(1),
      memory_peak_mb: this.peakMemory.toFixed(2),
      exclusion_log: summary.exclusionLogPath,
      error: summary.error,
    });
  }

  /** Resolves once every transport has flushed; call before the process exits. */
  public close(): Promise<void> {
    return new Promise((resolve) => {
      this.logger.on('finish', () => resolve());
      this.logger.end();
    });
  }
}
