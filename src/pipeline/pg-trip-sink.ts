import type { Writable } from 'stream';
import * as copyFrom from 'pg-copy-streams';
import * as csvWriter from 'csv-writer';
import { z } from 'zod';
import { initializeTargetSchema, isValidTableName, quoteIdentifier, type Queryable } from '../config/database';
import { formatTimestamp } from '../core/parse';
import type { CleanedTripRecord, Zone } from '../core/types';
import type { TripSink } from './trip-sink';

export type BulkMode = 'values' | 'copy';

export const TRIP_COLUMNS = [
  'trip_key',
  'vendor_id',
  'pickup_datetime',
  'dropoff_datetime',
  'pickup_lat',
  'pickup_lon',
  'dropoff_lat',
  'dropoff_lon',
  'pickup_zone_id',
  'dropoff_zone_id',
  'passenger_count',
  'trip_distance_km',
  'trip_duration_seconds',
  'fare_amount',
  'tip_amount',
  'trip_speed_kmh',
  'fare_per_km',
  'tip_pct',
  'hour_of_day',
  'day_of_week',
  'etl_run_id',
] as const;

type TripColumn = (typeof TRIP_COLUMNS)[number];
type SqlValue = string | number | null;

// 21 parameters per row; 1000 rows stays well under Postgres' 65535 limit.
const INSERT_CHUNK_SIZE = 1000;

export function toRowValues(record: CleanedTripRecord): Record<TripColumn, SqlValue> {
  return {
    trip_key: record.trip_key,
    vendor_id: record.vendor_id,
    // wall-clock strings, so the TIMESTAMP column keeps the source's local time
    pickup_datetime: formatTimestamp(record.pickup_datetime),
    dropoff_datetime: formatTimestamp(record.dropoff_datetime),
    pickup_lat: record.pickup_lat,
    pickup_lon: record.pickup_lon,
    dropoff_lat: record.dropoff_lat,
    dropoff_lon: record.dropoff_lon,
    pickup_zone_id: record.pickup_zone_id,
    dropoff_zone_id: record.dropoff_zone_id,
    passenger_count: record.passenger_count,
    trip_distance_km: record.trip_distance_km,
    trip_duration_seconds: record.trip_duration_seconds,
    fare_amount: record.fare_amount,
    tip_amount: record.tip_amount,
    trip_speed_kmh: record.trip_speed_kmh,
    fare_per_km: record.fare_per_km,
    tip_pct: record.tip_pct,
    hour_of_day: record.hour_of_day,
    day_of_week: record.day_of_week,
    etl_run_id: record.etl_run_id,
  };
}

/** Builds one parameterised multi-row INSERT for the given records. */
export function buildInsertStatement(
  table: string,
  records: readonly CleanedTripRecord[]
): { text: string; values: SqlValue[] } {
  const placeholders: string[] = [];
  const values: SqlValue[] = [];
  let p = 1;

  for (const record of records) {
    placeholders.push(`(${TRIP_COLUMNS.map(() => `$${p++}`).join(',')})`);
    const row = toRowValues(record);
    for (const column of TRIP_COLUMNS) {
      values.push(row[column]);
    }
  }

  return {
    text: `INSERT INTO ${quoteIdentifier(table)} (${TRIP_COLUMNS.join(',')}) VALUES ${placeholders.join(',')}`,
    values,
  };
}

export type CopyQuery = ReturnType<typeof copyFrom.from>;

/** The slice of a pg `PoolClient` the sink uses inside a transaction. */
export interface TripDatabaseClient {
  query(stream: CopyQuery): Writable;
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  release(destroy?: boolean): void;
}

/** The slice of a pg `Pool` the sink uses. */
export interface TripDatabase extends Queryable {
  connect(): Promise<TripDatabaseClient>;
}

const VendorRowSchema = z.object({ vendor_id: z.number().int(), vendor_code: z.string() });

const ZoneRowSchema = z.object({
  zone_id: z.number().int(),
  zone_name: z.string().nullable(),
  borough: z.string().nullable(),
  centroid_lat: z.number(),
  centroid_lon: z.number(),
});

export class PgTripSink implements TripSink {
  private readonly pool: TripDatabase;
  private readonly table: string;
  private readonly bulkMode: BulkMode;
  private readonly vendorCache = new Map<string, number>();

  constructor(pool: TripDatabase, table: string, bulkMode: BulkMode = 'values') {
    if (!isValidTableName(table)) {
      throw new Error(`Invalid table name: ${table}`);
    }
    this.pool = pool;
    this.table = table;
    this.bulkMode = bulkMode;
  }

  public async prepare(): Promise<void> {
    await initializeTargetSchema(this.pool, this.table);
  }

  public async insertBatch(records: readonly CleanedTripRecord[]): Promise<void> {
    if (!records.length) return;

    await this.inTransaction(async (client) => {
      if (this.bulkMode === 'copy') {
        await this.copyBatch(client, records);
        return;
      }
      for (let i = 0; i < records.length; i += INSERT_CHUNK_SIZE) {
        const { text, values } = buildInsertStatement(this.table, records.slice(i, i + INSERT_CHUNK_SIZE));
        await client.query(text, values);
      }
    });
  }

  public async insertOne(record: CleanedTripRecord): Promise<void> {
    const { text, values } = buildInsertStatement(this.table, [record]);
    await this.pool.query(text, values);
  }

  public async resolveVendorIds(codes: readonly string[]): Promise<Map<string, number>> {
    const missing = [...new Set(codes)].filter((code) => !this.vendorCache.has(code));

    if (missing.length > 0) {
      await this.pool.query(
        `INSERT INTO vendors (vendor_code, vendor_name)
         SELECT code, 'Vendor ' || code FROM unnest($1::text[]) AS code
         ON CONFLICT (vendor_code) DO NOTHING`,
        [missing]
      );
      const result = await this.pool.query(
        'SELECT vendor_id, vendor_code FROM vendors WHERE vendor_code = ANY($1::text[])',
        [missing]
      );
      for (const row of VendorRowSchema.array().parse(result.rows)) {
        this.vendorCache.set(row.vendor_code, row.vendor_id);
      }
    }

    const resolved = new Map<string, number>();
    for (const code of codes) {
      const id = this.vendorCache.get(code);
      if (id !== undefined) resolved.set(code, id);
    }
    return resolved;
  }

  public async loadZones(): Promise<Zone[]> {
    const result = await this.pool.query(
      'SELECT zone_id, zone_name, borough, centroid_lat, centroid_lon FROM zones ORDER BY zone_id'
    );
    return ZoneRowSchema.array().parse(result.rows);
  }

  private async inTransaction(work: (client: TripDatabaseClient) => Promise<void>): Promise<void> {
    const client = await this.pool.connect();
    let broken = false;
    try {
      await client.query('BEGIN');
      await work(client);
      await client.query('COMMIT');
    } catch (error) {
      // a connection that cannot even roll back is discarded instead of pooled
      broken = await client.query('ROLLBACK').then(
        () => false,
        () => true
      );
      throw error;
    } finally {
      client.release(broken);
    }
  }

  /**
   * COPY into a transaction-scoped staging table, then move the rows over
   * with one INSERT ... SELECT so table constraints are checked as usual.
   */
  private async copyBatch(client: TripDatabaseClient, records: readonly CleanedTripRecord[]): Promise<void> {
    const columns = TRIP_COLUMNS.join(', ');
    await client.query(`
      CREATE TEMP TABLE tmp_trip_batch ON COMMIT DROP AS
      SELECT ${columns} FROM ${quoteIdentifier(this.table)} WITH NO DATA
    `);

    const stringifier = csvWriter.createObjectCsvStringifier({
      header: TRIP_COLUMNS.map((column) => ({ id: column, title: column })),
    });
    const payload = stringifier.stringifyRecords(records.map(toRowValues));

    const stream = client.query(copyFrom.from(`COPY tmp_trip_batch (${columns}) FROM STDIN WITH (FORMAT csv)`));
    await new Promise<void>((resolve, reject) => {
      stream.on('error', reject);
      stream.on('finish', () => resolve());
      stream.end(payload);
    });

    await client.query(`INSERT INTO ${quoteIdentifier(this.table)} (${columns}) SELECT ${columns} FROM tmp_trip_batch`);
  }
}
