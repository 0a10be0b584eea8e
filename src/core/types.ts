/**
 * Canonical column names a raw trip row is keyed by after header aliasing.
 */
export const RAW_COLUMNS = [
  'vendor_id',
  'pickup_datetime',
  'dropoff_datetime',
  'pickup_lat',
  'pickup_lon',
  'dropoff_lat',
  'dropoff_lon',
  'passenger_count',
  'trip_distance',
  'trip_duration',
  'fare_amount',
  'tip_amount',
] as const;

export type RawColumn = (typeof RAW_COLUMNS)[number];

export type RawTripRecord = Partial<Record<RawColumn, string>>;

export interface RawChunk {
  index: number;
  /** 1-based data-row number of the first row in the chunk */
  startRow: number;
  rows: RawTripRecord[];
}

export const REJECTION_REASONS = [
  'MissingOrUnparseable',
  'InvalidTimeRange',
  'OutOfBounds',
  'InvalidPassengerCount',
  'InvalidFare',
  'DegenerateTrip',
  'InsertFailed',
] as const;

export type RejectionReason = (typeof REJECTION_REASONS)[number];

export type ValidationRejection = Exclude<RejectionReason, 'InsertFailed'>;

export interface ValidatedTrip {
  vendor_code: string | null;
  pickup_datetime: Date;
  dropoff_datetime: Date;
  pickup_lat: number;
  pickup_lon: number;
  dropoff_lat: number;
  dropoff_lon: number;
  passenger_count: number;
  trip_distance_km: number;
  trip_duration_seconds: number;
  fare_amount: number;
  tip_amount: number;
}

export type ValidationResult =
  | { ok: true; value: ValidatedTrip }
  | { ok: false; reason: ValidationRejection; detail: string };

export type DayOfWeek =
  | 'Sunday'
  | 'Monday'
  | 'Tuesday'
  | 'Wednesday'
  | 'Thursday'
  | 'Friday'
  | 'Saturday';

export interface CleanedTripRecord extends ValidatedTrip {
  trip_key: string;
  row_number: number;
  vendor_id: number | null;
  pickup_zone_id: number | null;
  dropoff_zone_id: number | null;
  trip_speed_kmh: number | null;
  fare_per_km: number | null;
  tip_pct: number | null;
  hour_of_day: number;
  day_of_week: DayOfWeek;
  etl_run_id: string;
}

export interface ExclusionRecord {
  runId: string;
  rowNumber: number;
  reason: RejectionReason;
  detail: string;
  raw: RawTripRecord;
}

export interface Zone {
  zone_id: number;
  zone_name: string | null;
  borough: string | null;
  centroid_lat: number;
  centroid_lon: number;
}

export interface ChunkCounters {
  index: number;
  startRow: number;
  read: number;
  cleaned: number;
  excluded: number;
  inserted: number;
  insertFailed: number;
  durationMs: number;
}

export interface RunCounters {
  rowsRead: number;
  rowsCleaned: number;
  rowsInserted: number;
  rowsExcluded: number;
  rowsInsertFailed: number;
  excludedByReason: Record<RejectionReason, number>;
  exclusionLogFailures: number;
  chunks: ChunkCounters[];
}

export type RunState =
  | 'Idle'
  | 'Reading'
  | 'Processing'
  | 'Loading'
  | 'Complete'
  | 'Failed'
  | 'Stopped';

export type RunStatus = Extract<RunState, 'Complete' | 'Failed' | 'Stopped'>;

export interface RunSummary {
  runId: string;
  status: RunStatus;
  counters: RunCounters;
  successRate: number;
  exclusionLogPath: string;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  error?: { code: string; message: string };
}

export interface FailedInsert {
  record: CleanedTripRecord;
  message: string;
}

export interface LoadResult {
  inserted: number;
  batches: number;
  fallbackBatches: number;
  failed: FailedInsert[];
}

export function createRunCounters(): RunCounters {
  const excludedByReason: Record<RejectionReason, number> = {
    MissingOrUnparseable: 0,
    InvalidTimeRange: 0,
    OutOfBounds: 0,
    InvalidPassengerCount: 0,
    InvalidFare: 0,
    DegenerateTrip: 0,
    InsertFailed: 0,
  };
  return {
    rowsRead: 0,
    rowsCleaned: 0,
    rowsInserted: 0,
    rowsExcluded: 0,
    rowsInsertFailed: 0,
    excludedByReason,
    exclusionLogFailures: 0,
    chunks: [],
  };
}
