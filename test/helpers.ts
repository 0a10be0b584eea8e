import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { DEFAULT_CLEANING_RULES } from '../src/config/cleaning-rules';
import { VENDOR_CODE_MAX_LENGTH } from '../src/config/database';
import { deriveFeatures } from '../src/core/features';
import { EtlLogger } from '../src/core/logger';
import { formatTimestamp } from '../src/core/parse';
import type { CleanedTripRecord, RawColumn, RawTripRecord, Zone } from '../src/core/types';
import { validateTrip } from '../src/core/validator';
import type { TripSink } from '../src/pipeline/trip-sink';

export const BASE_ROW: RawTripRecord = {
  vendor_id: '1',
  pickup_datetime: '2024-01-15 08:30:00',
  dropoff_datetime: '2024-01-15 08:45:00',
  pickup_lat: '40.758',
  pickup_lon: '-73.9855',
  dropoff_lat: '40.7484',
  dropoff_lon: '-73.9857',
  passenger_count: '1',
  trip_distance: '5.0',
  fare_amount: '20.00',
  tip_amount: '3.00',
};

export const CSV_COLUMNS: readonly RawColumn[] = [
  'vendor_id',
  'pickup_datetime',
  'dropoff_datetime',
  'pickup_lat',
  'pickup_lon',
  'dropoff_lat',
  'dropoff_lon',
  'passenger_count',
  'trip_distance',
  'fare_amount',
  'tip_amount',
];

export function row(overrides: RawTripRecord = {}): RawTripRecord {
  return { ...BASE_ROW, ...overrides };
}

/** A valid row whose pickup is `index` minutes after the base pickup, so every index is a distinct trip. */
export function validRow(index: number, overrides: RawTripRecord = {}): RawTripRecord {
  const pickup = Date.UTC(2024, 0, 15, 8, 30, 0) + index * 60_000;
  return row({
    pickup_datetime: formatTimestamp(new Date(pickup)),
    dropoff_datetime: formatTimestamp(new Date(pickup + 900_000)),
    ...overrides,
  });
}

/** Cleaned record of `validRow(index)`, numbered as source row `index + 1`. */
export function cleanedRecord(index: number, overrides: RawTripRecord = {}): CleanedTripRecord {
  const result = validateTrip(validRow(index, overrides), DEFAULT_CLEANING_RULES);
  if (!result.ok) throw new Error(`fixture row ${index} is invalid: ${result.detail}`);
  return deriveFeatures(result.value, { runId: 'test-run', rowNumber: index + 1 });
}

export function toCsv(rows: readonly RawTripRecord[], header: readonly RawColumn[] = CSV_COLUMNS): string {
  const lines = [header.join(',')];
  for (const r of rows) {
    lines.push(header.map((column) => r[column] ?? '').join(','));
  }
  return lines.join('\n') + '\n';
}

export function csvStream(text: string): Readable {
  return Readable.from([text]);
}

export function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'taxi-etl-'));
}

export function silentLogger(runId = 'test-run'): EtlLogger {
  return new EtlLogger({ runId, logDir: null, silent: true });
}

export const noSleep = async (): Promise<void> => undefined;

export function transientError(): Error {
  return Object.assign(new Error('Connection terminated unexpectedly'), { code: '08006' });
}

export function uniqueViolation(key: string): Error {
  return Object.assign(new Error(`duplicate key value violates unique constraint "trips_trip_key_key" (${key})`), {
    code: '23505',
  });
}

/**
 * In-memory sink with the trips table's unique trip_key and switches for
 * simulating transient or permanent outages.
 */
export class MemoryTripSink implements TripSink {
  public readonly rows = new Map<string, CleanedTripRecord>();
  public readonly batchCalls: number[] = [];
  public rowCalls = 0;
  public transientBatchFailures = 0;
  public unreachable = false;
  /** Becomes unreachable after this many successful batch commits. */
  public failAfterBatches = Infinity;
  public zones: Zone[] = [];
  public prepareCalls = 0;
  /** Thrown from prepare() when set, as an unreachable server would at startup. */
  public prepareError: Error | null = null;
  private readonly vendors = new Map<string, number>();
  private committedBatches = 0;

  get count(): number {
    return this.rows.size;
  }

  async prepare(): Promise<void> {
    this.prepareCalls++;
    if (this.prepareError) throw this.prepareError;
  }

  async insertBatch(records: readonly CleanedTripRecord[]): Promise<void> {
    this.batchCalls.push(records.length);
    if (this.committedBatches >= this.failAfterBatches) this.unreachable = true;
    if (this.unreachable) throw transientError();
    if (this.transientBatchFailures > 0) {
      this.transientBatchFailures--;
      throw transientError();
    }

    const keys = new Set<string>();
    for (const record of records) {
      if (this.rows.has(record.trip_key) || keys.has(record.trip_key)) {
        throw uniqueViolation(record.trip_key);
      }
      keys.add(record.trip_key);
    }
    for (const record of records) {
      this.rows.set(record.trip_key, { ...record });
    }
    this.committedBatches++;
  }

  async insertOne(record: CleanedTripRecord): Promise<void> {
    this.rowCalls++;
    if (this.unreachable) throw transientError();
    if (this.rows.has(record.trip_key)) throw uniqueViolation(record.trip_key);
    this.rows.set(record.trip_key, { ...record });
  }

  async resolveVendorIds(codes: readonly string[]): Promise<Map<string, number>> {
    const tooLong = codes.find((code) => code.length > VENDOR_CODE_MAX_LENGTH);
    if (tooLong !== undefined) {
      throw Object.assign(new Error(`value too long for type character varying(${VENDOR_CODE_MAX_LENGTH})`), {
        code: '22001',
      });
    }
    const resolved = new Map<string, number>();
    for (const code of codes) {
      if (!this.vendors.has(code)) this.vendors.set(code, this.vendors.size + 1);
      const id = this.vendors.get(code);
      if (id !== undefined) resolved.set(code, id);
    }
    return resolved;
  }

  async loadZones(): Promise<Zone[]> {
    return this.zones;
  }
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

/** Reads an exclusion log back as `row_number:reason` entries, header dropped. */
export function readExclusions(file: string): string[] {
  return fs
    .readFileSync(file, 'utf8')
    .split('\n')
    .slice(1)
    .filter((line) => line.length > 0)
    .map((line) => {
      const [, rowNumber, reason] = line.split(',');
      return `${rowNumber}:${reason}`;
    });
}
