#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { createTargetPool } from './config/database';
import { loadEtlConfig, type EtlConfig } from './config/etl-config';
import { ConfigurationError } from './core/errors';
import { EtlLogger } from './core/logger';
import type { RunSummary } from './core/types';
import { EtlRunner, generateRunId } from './pipeline/etl-runner';
import { PgTripSink } from './pipeline/pg-trip-sink';

dotenv.config();

const EXIT_CODES: Record<RunSummary['status'], number> = {
  Complete: 0,
  Failed: 1,
  Stopped: 130,
};

function printSummary(summary: RunSummary): void {
  const { counters } = summary;
  console.log('\n===========================================');
  console.log(`ETL ${summary.status.toUpperCase()}`);
  console.log('===========================================');
  console.table({
    'Rows read': counters.rowsRead,
    'Rows cleaned': counters.rowsCleaned,
    'Rows inserted': counters.rowsInserted,
    'Rows excluded': counters.rowsExcluded,
    'Insert failures': counters.rowsInsertFailed,
    'Success rate (%)': summary.successRate.toFixed(1),
  });
  console.table(counters.excludedByReason);
  console.log(`Exclusion log: ${summary.exclusionLogPath}`);
  if (summary.error) {
    console.log(`Error (${summary.error.code}): ${summary.error.message}`);
  }
  console.log(
    JSON.stringify({
      run_id: summary.runId,
      status: summary.status,
      rows_read: counters.rowsRead,
      rows_cleaned: counters.rowsCleaned,
      rows_inserted: counters.rowsInserted,
      rows_excluded: counters.rowsExcluded,
      rows_insert_failed: counters.rowsInsertFailed,
      success_rate: Number(summary.successRate.toFixed(2)),
      exclusion_log: summary.exclusionLogPath,
    })
  );
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  let config: EtlConfig;
  try {
    config = loadEtlConfig(args, process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }

  const runId = generateRunId();
  const logger = new EtlLogger({ runId, logDir: config.logDir });
  const pool = createTargetPool(config.connection, logger);

  console.log('\n===========================================');
  console.log('Taxi Trip ETL');
  console.log('===========================================');
  console.log(`Input:      ${config.input}`);
  console.log(`Table:      ${config.table}`);
  console.log(`Chunk size: ${config.chunkSize}`);
  console.log(`Batch size: ${config.batchSize}`);
  console.log('===========================================\n');

  try {
    const runner = new EtlRunner({
      runId,
      logger,
      source: config.input,
      sink: new PgTripSink(pool, config.table, config.bulkMode),
      chunkSize: config.chunkSize,
      batchSize: config.batchSize,
      exclusionLogPath: config.exclusionLogPath,
      overwriteExclusionLog: config.overwriteExclusionLog,
      rules: config.rules,
      maxAttempts: config.maxAttempts,
      baseBackoffMs: config.baseBackoffMs,
      startOffset: config.startOffset,
    });

    process.once('SIGINT', () => {
      logger.logWarning('Stop requested, finishing the current chunk');
      runner.requestStop();
    });

    const summary = await runner.run();
    printSummary(summary);
    return EXIT_CODES[summary.status];
  } catch (error) {
    logger.logError(error);
    return 1;
  } finally {
    await pool.end();
    await logger.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error) => {
    console.error('Error in main execution:', error);
    process.exitCode = 1;
  }
);
