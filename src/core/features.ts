import * as crypto from 'crypto';
import type { ZoneLocator } from './geo';
import { formatTimestamp } from './parse';
import type { CleanedTripRecord, DayOfWeek, ValidatedTrip } from './types';

const DAY_NAMES: readonly DayOfWeek[] = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
];

export interface DeriveContext {
  runId: string;
  rowNumber: number;
  zones?: ZoneLocator | null;
}

/** numerator / denominator, or null when the denominator is zero or the quotient is not finite. */
export function safeRatio(numerator: number, denominator: number): number | null {
  if (denominator === 0) return null;
  const ratio = numerator / denominator;
  return Number.isFinite(ratio) ? ratio : null;
}

export function dayOfWeek(date: Date): DayOfWeek {
  return DAY_NAMES[date.getUTCDay()];
}

/**
 * Stable identity of a trip, independent of the run that loaded it. The sink
 * keeps it unique so reloading the same file cannot double-count trips.
 */
export function tripKey(trip: ValidatedTrip): string {
  const identity = [
    trip.vendor_code ?? '',
    formatTimestamp(trip.pickup_datetime),
    formatTimestamp(trip.dropoff_datetime),
    trip.pickup_lat,
    trip.pickup_lon,
    trip.dropoff_lat,
    trip.dropoff_lon,
    trip.passenger_count,
    trip.fare_amount,
  ].join('|');
  return crypto.createHash('sha256').update(identity).digest('hex');
}

export function deriveFeatures(trip: ValidatedTrip, context: DeriveContext): CleanedTripRecord {
  const zones = context.zones && context.zones.size > 0 ? context.zones : null;

  return {
    ...trip,
    trip_key: tripKey(trip),
    row_number: context.rowNumber,
    vendor_id: null,
    pickup_zone_id: zones ? zones.locate({ lat: trip.pickup_lat, lon: trip.pickup_lon }) : null,
    dropoff_zone_id: zones ? zones.locate({ lat: trip.dropoff_lat, lon: trip.dropoff_lon }) : null,
    trip_speed_kmh: safeRatio(trip.trip_distance_km, trip.trip_duration_seconds / 3600),
    fare_per_km: safeRatio(trip.fare_amount, trip.trip_distance_km),
    tip_pct: safeRatio(trip.tip_amount * 100, trip.fare_amount),
    hour_of_day: trip.pickup_datetime.getUTCHours(),
    day_of_week: dayOfWeek(trip.pickup_datetime),
    etl_run_id: context.runId,
  };
}
