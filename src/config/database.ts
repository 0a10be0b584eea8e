import { Pool, type PoolConfig } from 'pg';
import type { EtlLogger } from '../core/logger';

export type DatabaseConnection =
  | { connectionString: string }
  | { host: string; port: number; database: string; user: string; password: string };

/** Anything that runs a parameterised statement: a Pool or a checked-out client. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export const VENDOR_CODE_MAX_LENGTH = 50;

const TABLE_NAME_PATTERN = /^[a-z_][a-z0-9_]{0,62}$/;

export function isValidTableName(name: string): boolean {
  return TABLE_NAME_PATTERN.test(name);
}

/** Double-quotes an identifier; callers validate names with isValidTableName first. */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Idle clients that lose their connection are reported as warnings; the next
 * query on the pool then fails with a transient error and takes the retry path.
 */
export function createTargetPool(connection: DatabaseConnection, logger: EtlLogger): Pool {
  const config: PoolConfig = {
    ...connection,
    max: 4,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: parseInt(process.env.TARGET_DB_CONN_TIMEOUT_MS || '10000', 10),
  };
  const pool = new Pool(config);
  pool.on('error', (error) => {
    logger.logWarning('Idle database connection lost', { message: error.message });
  });
  return pool;
}

/**
 * Creates the reference tables and the trips fact table if they do not exist.
 * Foreign keys are nullable and SET NULL on delete so a trip survives the
 * loss of its vendor or zone; derived ratios are nullable for zero denominators.
 */
export async function initializeTargetSchema(db: Queryable, tableName: string): Promise<void> {
  if (!isValidTableName(tableName)) {
    throw new Error(`Invalid table name: ${tableName}`);
  }
  const table = quoteIdentifier(tableName);
  const index = (suffix: string) => quoteIdentifier(`idx_${tableName}_${suffix}`);

  const createTablesQuery = `
    CREATE TABLE IF NOT EXISTS vendors (
      vendor_id SERIAL PRIMARY KEY,
      vendor_code VARCHAR(${VENDOR_CODE_MAX_LENGTH}) UNIQUE NOT NULL,
      vendor_name VARCHAR(255),
      notes TEXT
    );

    CREATE TABLE IF NOT EXISTS zones (
      zone_id SERIAL PRIMARY KEY,
      zone_name VARCHAR(255),
      borough VARCHAR(255),
      centroid_lat DOUBLE PRECISION NOT NULL,
      centroid_lon DOUBLE PRECISION NOT NULL,
      shapefile_id VARCHAR(100)
    );

    CREATE TABLE IF NOT EXISTS ${table} (
      id BIGSERIAL PRIMARY KEY,
      trip_key CHAR(64) NOT NULL UNIQUE,
      vendor_id INTEGER REFERENCES vendors(vendor_id) ON DELETE SET NULL ON UPDATE CASCADE,
      pickup_datetime TIMESTAMP NOT NULL,
      dropoff_datetime TIMESTAMP NOT NULL,
      pickup_lat DOUBLE PRECISION NOT NULL,
      pickup_lon DOUBLE PRECISION NOT NULL,
      dropoff_lat DOUBLE PRECISION NOT NULL,
      dropoff_lon DOUBLE PRECISION NOT NULL,
      pickup_zone_id INTEGER REFERENCES zones(zone_id) ON DELETE SET NULL ON UPDATE CASCADE,
      dropoff_zone_id INTEGER REFERENCES zones(zone_id) ON DELETE SET NULL ON UPDATE CASCADE,
      passenger_count INTEGER NOT NULL CHECK (passenger_count >= 0),
      trip_distance_km DOUBLE PRECISION NOT NULL CHECK (trip_distance_km >= 0),
      trip_duration_seconds DOUBLE PRECISION NOT NULL CHECK (trip_duration_seconds >= 0),
      fare_amount DOUBLE PRECISION NOT NULL CHECK (fare_amount >= 0),
      tip_amount DOUBLE PRECISION NOT NULL DEFAULT 0 CHECK (tip_amount >= 0),
      trip_speed_kmh DOUBLE PRECISION,
      fare_per_km DOUBLE PRECISION,
      tip_pct DOUBLE PRECISION,
      hour_of_day SMALLINT NOT NULL CHECK (hour_of_day BETWEEN 0 AND 23),
      day_of_week VARCHAR(16) NOT NULL,
      etl_run_id VARCHAR(64) NOT NULL,
      etl_timestamp TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    );

    CREATE INDEX IF NOT EXISTS ${index('pickup_datetime')} ON ${table}(pickup_datetime);
    CREATE INDEX IF NOT EXISTS ${index('pickup_zone')} ON ${table}(pickup_zone_id);
    CREATE INDEX IF NOT EXISTS ${index('dropoff_zone')} ON ${table}(dropoff_zone_id);
    CREATE INDEX IF NOT EXISTS ${index('vendor')} ON ${table}(vendor_id);
    CREATE INDEX IF NOT EXISTS ${index('fare')} ON ${table}(fare_amount);
    CREATE INDEX IF NOT EXISTS ${index('speed')} ON ${table}(trip_speed_kmh);
  `;

  // Daily rollup the dashboard's summary endpoint reads from
  const summaryViewQuery = `
    CREATE OR REPLACE VIEW ${quoteIdentifier(`${tableName}_daily_summary`)} AS
    SELECT
      DATE(pickup_datetime) AS trip_date,
      COUNT(*) AS total_trips,
      ROUND(AVG(trip_distance_km)::numeric, 2) AS avg_distance_km,
      ROUND(AVG(fare_amount)::numeric, 2) AS avg_fare,
      ROUND((AVG(trip_duration_seconds) / 60)::numeric, 1) AS avg_duration_min,
      ROUND(AVG(tip_pct)::numeric, 2) AS avg_tip_pct
    FROM ${table}
    GROUP BY DATE(pickup_datetime);
  `;

  await db.query(createTablesQuery);
  await db.query(summaryViewQuery);
}
