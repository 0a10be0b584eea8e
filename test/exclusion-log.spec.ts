import * as fs from 'fs';
import * as path from 'path';
import { describe, it, expect, vi } from 'vitest';
import type { ExclusionRecord } from '../src/core/types';
import { ExclusionLog } from '../src/pipeline/exclusion-log';
import { row, tempDir } from './helpers';

const HEADER_LINE =
  'run_id,row_number,reason,detail,vendor_id,pickup_datetime,dropoff_datetime,pickup_lat,pickup_lon,' +
  'dropoff_lat,dropoff_lon,passenger_count,trip_distance,trip_duration,fare_amount,tip_amount';

const exclusion = (rowNumber: number, overrides: Partial<ExclusionRecord> = {}): ExclusionRecord => ({
  runId: 'run-1',
  rowNumber,
  reason: 'InvalidPassengerCount',
  detail: 'passenger_count -1 not an integer in 0..8',
  raw: row({ passenger_count: '-1' }),
  ...overrides,
});

const EXCLUSION_LINE = (rowNumber: number) =>
  `run-1,${rowNumber},InvalidPassengerCount,passenger_count -1 not an integer in 0..8,1,` +
  '2024-01-15 08:30:00,2024-01-15 08:45:00,40.758,-73.9855,40.7484,-73.9857,-1,5.0,,20.00,3.00';

const lines = (file: string) => fs.readFileSync(file, 'utf8').split('\n').filter((line) => line.length > 0);

describe('ExclusionLog', () => {
  it('writes a header followed by one line per exclusion', async () => {
    const file = path.join(tempDir(), 'exclusions.csv');
    const log = new ExclusionLog({ path: file, overwrite: false });

    expect(await log.log([exclusion(3), exclusion(8)])).toEqual({ written: 2, failed: 0 });
    expect(lines(file)).toEqual([HEADER_LINE, EXCLUSION_LINE(3), EXCLUSION_LINE(8)]);
    expect(log.written).toBe(2);
  });

  it('creates the log with its header even when nothing is excluded', async () => {
    const file = path.join(tempDir(), 'nested', 'exclusions.csv');
    const log = new ExclusionLog({ path: file, overwrite: false });

    expect(await log.log([])).toEqual({ written: 0, failed: 0 });
    expect(lines(file)).toEqual([HEADER_LINE]);
  });

  it('appends to an existing log without repeating the header', async () => {
    const file = path.join(tempDir(), 'exclusions.csv');
    await new ExclusionLog({ path: file, overwrite: false }).log([exclusion(1)]);
    await new ExclusionLog({ path: file, overwrite: false }).log([exclusion(2)]);

    expect(lines(file)).toEqual([HEADER_LINE, EXCLUSION_LINE(1), EXCLUSION_LINE(2)]);
  });

  it('truncates an existing log when asked to overwrite', async () => {
    const file = path.join(tempDir(), 'exclusions.csv');
    await new ExclusionLog({ path: file, overwrite: false }).log([exclusion(1)]);
    await new ExclusionLog({ path: file, overwrite: true }).log([exclusion(2)]);

    expect(lines(file)).toEqual([HEADER_LINE, EXCLUSION_LINE(2)]);
  });

  it('quotes details that contain delimiters or quotes', async () => {
    const file = path.join(tempDir(), 'exclusions.csv');
    const log = new ExclusionLog({ path: file, overwrite: false });

    await log.log([exclusion(4, { reason: 'InsertFailed', detail: 'violates "trips_trip_key_key", row 4', raw: {} })]);

    expect(lines(file)[1]).toBe('run-1,4,InsertFailed,"violates ""trips_trip_key_key"", row 4",,,,,,,,,,,,');
  });

  it('reports a failed write as a warning instead of throwing', async () => {
    const directory = tempDir();
    const onWarning = vi.fn();
    const log = new ExclusionLog({ path: directory, overwrite: false, onWarning });

    expect(await log.log([exclusion(1)])).toEqual({ written: 0, failed: 1 });
    expect(log.failedWrites).toBe(1);
    expect(onWarning).toHaveBeenCalledWith(`Failed to append 1 exclusion(s) to ${directory}`, expect.any(Error));
  });
});
