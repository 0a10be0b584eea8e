import { RAW_COLUMNS, type RawColumn, type RawTripRecord } from '../core/types';

// Header variants seen across TLC yellow/green exports and the Kaggle trip
// duration dataset, keyed by their normalized (trimmed, lower-cased) form.
const COLUMN_ALIASES: Record<RawColumn, readonly string[]> = {
  vendor_id: ['vendor_id', 'vendorid', 'vendor', 'vendor_code'],
  pickup_datetime: [
    'pickup_datetime',
    'tpep_pickup_datetime',
    'lpep_pickup_datetime',
    'pickup_time',
    'pickup_ts',
  ],
  dropoff_datetime: [
    'dropoff_datetime',
    'tpep_dropoff_datetime',
    'lpep_dropoff_datetime',
    'dropoff_time',
    'dropoff_ts',
  ],
  pickup_lat: ['pickup_lat', 'pickup_latitude', 'pickup_latitude_decimal'],
  pickup_lon: ['pickup_lon', 'pickup_longitude', 'pickup_long'],
  dropoff_lat: ['dropoff_lat', 'dropoff_latitude', 'dropoff_latitude_decimal'],
  dropoff_lon: ['dropoff_lon', 'dropoff_longitude', 'dropoff_long'],
  passenger_count: ['passenger_count', 'passengers'],
  trip_distance: ['trip_distance', 'trip_distance_km', 'distance', 'tripdistance'],
  trip_duration: ['trip_duration', 'trip_duration_seconds'],
  fare_amount: ['fare_amount', 'fare', 'fareamount'],
  tip_amount: ['tip_amount', 'tip', 'tipamount'],
};

const ALIAS_LOOKUP = new Map<string, RawColumn>();
for (const column of RAW_COLUMNS) {
  for (const alias of COLUMN_ALIASES[column]) {
    ALIAS_LOOKUP.set(alias, column);
  }
}

export const REQUIRED_COLUMNS: readonly RawColumn[] = [
  'pickup_datetime',
  'dropoff_datetime',
  'pickup_lat',
  'pickup_lon',
  'dropoff_lat',
  'dropoff_lon',
  'passenger_count',
  'fare_amount',
];

export function normalizeHeader(name: string): string {
  return name.replace(/^\uFEFF/, '').trim().toLowerCase();
}

export interface ResolvedHeader {
  /** Canonical name per source column, false for columns that are ignored. */
  columns: Array<RawColumn | false>;
  missing: RawColumn[];
}

/**
 * Maps a source header onto canonical columns. The first source column wins
 * when several aliases of the same canonical column are present.
 */
export function resolveHeader(header: readonly string[], optional: readonly RawColumn[] = []): ResolvedHeader {
  const seen = new Set<RawColumn>();
  const columns = header.map((name): RawColumn | false => {
    const canonical = ALIAS_LOOKUP.get(normalizeHeader(name));
    if (!canonical || seen.has(canonical)) return false;
    seen.add(canonical);
    return canonical;
  });

  const missing = REQUIRED_COLUMNS.filter((column) => !seen.has(column) && !optional.includes(column));
  return { columns, missing };
}

export function pickRawFields(record: unknown): RawTripRecord {
  const raw: RawTripRecord = {};
  if (typeof record !== 'object' || record === null) return raw;

  for (const column of RAW_COLUMNS) {
    const value: unknown = Reflect.get(record, column);
    if (typeof value === 'string') {
      raw[column] = value;
    }
  }
  return raw;
}
