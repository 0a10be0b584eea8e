import { wallClockMillis, type CleaningRules } from '../config/cleaning-rules';
import { haversineKm, milesToKm } from './geo';
import { formatTimestamp, parseNumber, parseText, parseTimestamp } from './parse';
import { safeRatio } from './features';
import type {
  RawTripRecord,
  ValidatedTrip,
  ValidationRejection,
  ValidationResult,
} from './types';

interface TripRule {
  reason: ValidationRejection;
  /** Returns a human-readable detail when the trip violates the rule. */
  check(trip: ValidatedTrip, rules: CleaningRules): string | null;
}

// Metered fare approximation used when the source carries no fare at all.
const BASE_FARE = 2.5;
const FARE_PER_KM = 2.5;
const FARE_PER_MINUTE = 0.4;

export function estimateFare(distanceKm: number, durationSeconds: number): number {
  return Math.max(BASE_FARE, BASE_FARE + distanceKm * FARE_PER_KM + (durationSeconds / 60) * FARE_PER_MINUTE);
}

function inBox(lat: number, lon: number, rules: CleaningRules): boolean {
  return lat >= rules.minLat && lat <= rules.maxLat && lon >= rules.minLon && lon <= rules.maxLon;
}

/**
 * Ordered rule chain applied after every field parsed. The first rule that
 * reports a violation decides the rejection reason.
 */
export const TRIP_RULES: readonly TripRule[] = [
  {
    reason: 'InvalidTimeRange',
    check(trip, rules) {
      const pickup = trip.pickup_datetime.getTime();
      const dropoff = trip.dropoff_datetime.getTime();
      if (pickup >= dropoff) return 'dropoff is not after pickup';

      const min = wallClockMillis(rules.minDatetime) ?? -Infinity;
      const max = wallClockMillis(rules.maxDatetime) ?? Infinity;
      if (pickup < min || dropoff > max) {
        return `timestamps outside ${rules.minDatetime} .. ${rules.maxDatetime}`;
      }
      return null;
    },
  },
  {
    reason: 'OutOfBounds',
    check(trip, rules) {
      if (!inBox(trip.pickup_lat, trip.pickup_lon, rules)) return 'pickup outside bounding box';
      if (!inBox(trip.dropoff_lat, trip.dropoff_lon, rules)) return 'dropoff outside bounding box';
      return null;
    },
  },
  {
    reason: 'InvalidPassengerCount',
    check(trip, rules) {
      const count = trip.passenger_count;
      if (!Number.isInteger(count) || count < 0 || count > rules.maxPassengers) {
        return `passenger_count ${count} not an integer in 0..${rules.maxPassengers}`;
      }
      return null;
    },
  },
  {
    reason: 'InvalidFare',
    check(trip, rules) {
      if (trip.fare_amount < 0) return 'negative fare';
      if (trip.fare_amount > rules.maxFare) return `fare above ${rules.maxFare}`;
      if (trip.tip_amount < 0) return 'negative tip';
      return null;
    },
  },
  {
    reason: 'DegenerateTrip',
    check(trip, rules) {
      const km = trip.trip_distance_km;
      const seconds = trip.trip_duration_seconds;
      if (km < 0 || seconds < 0) return 'negative distance or duration';
      if (km >= rules.maxDistanceKm) return `distance ${km} km not below ${rules.maxDistanceKm}`;
      if (seconds >= rules.maxDurationSeconds) {
        return `duration ${seconds} s not below ${rules.maxDurationSeconds}`;
      }
      if (km < rules.minDistanceKm && seconds < rules.minDurationSeconds) {
        return `implausibly short trip (${km} km in ${seconds} s)`;
      }
      const speed = safeRatio(km, seconds / 3600);
      if (speed !== null && speed > rules.maxSpeedKmh) {
        return `unrealistic speed ${speed.toFixed(1)} km/h`;
      }
      return null;
    },
  },
];

type ParseResult = { ok: true; value: ValidatedTrip } | { ok: false; detail: string };

function parseTrip(raw: RawTripRecord, rules: CleaningRules): ParseResult {
  const pickup = parseTimestamp(raw.pickup_datetime);
  const dropoff = parseTimestamp(raw.dropoff_datetime);
  if (pickup.status !== 'ok') return { ok: false, detail: `pickup_datetime ${pickup.status}` };
  if (dropoff.status !== 'ok') return { ok: false, detail: `dropoff_datetime ${dropoff.status}` };

  const pickup_lat = parseNumber(raw.pickup_lat);
  if (pickup_lat.status !== 'ok') return { ok: false, detail: `pickup_lat ${pickup_lat.status}` };
  const pickup_lon = parseNumber(raw.pickup_lon);
  if (pickup_lon.status !== 'ok') return { ok: false, detail: `pickup_lon ${pickup_lon.status}` };
  const dropoff_lat = parseNumber(raw.dropoff_lat);
  if (dropoff_lat.status !== 'ok') return { ok: false, detail: `dropoff_lat ${dropoff_lat.status}` };
  const dropoff_lon = parseNumber(raw.dropoff_lon);
  if (dropoff_lon.status !== 'ok') return { ok: false, detail: `dropoff_lon ${dropoff_lon.status}` };

  const passengers = parseNumber(raw.passenger_count);
  if (passengers.status !== 'ok') return { ok: false, detail: `passenger_count ${passengers.status}` };

  const tip = parseNumber(raw.tip_amount);
  if (tip.status === 'invalid') return { ok: false, detail: 'tip_amount invalid' };

  let distanceKm: number;
  const sourceDistance = parseNumber(raw.trip_distance);
  if (rules.distanceSource === 'source' && sourceDistance.status === 'invalid') {
    return { ok: false, detail: 'trip_distance invalid' };
  }
  if (rules.distanceSource === 'source' && sourceDistance.status === 'ok') {
    distanceKm = rules.distanceUnit === 'miles' ? milesToKm(sourceDistance.value) : sourceDistance.value;
  } else {
    distanceKm = haversineKm(
      { lat: pickup_lat.value, lon: pickup_lon.value },
      { lat: dropoff_lat.value, lon: dropoff_lon.value }
    );
  }

  let durationSeconds: number;
  const sourceDuration = parseNumber(raw.trip_duration);
  if (rules.durationSource === 'source' && sourceDuration.status === 'invalid') {
    return { ok: false, detail: 'trip_duration invalid' };
  }
  if (rules.durationSource === 'source' && sourceDuration.status === 'ok') {
    durationSeconds = sourceDuration.value;
  } else {
    durationSeconds = (dropoff.value.getTime() - pickup.value.getTime()) / 1000;
  }

  const fare = parseNumber(raw.fare_amount);
  let fareAmount: number;
  if (fare.status === 'ok') {
    fareAmount = fare.value;
  } else if (fare.status === 'absent' && rules.estimateFareWhenAbsent) {
    fareAmount = estimateFare(distanceKm, durationSeconds);
  } else {
    return { ok: false, detail: `fare_amount ${fare.status}` };
  }

  return {
    ok: true,
    value: {
      vendor_code: parseText(raw.vendor_id),
      pickup_datetime: pickup.value,
      dropoff_datetime: dropoff.value,
      pickup_lat: pickup_lat.value,
      pickup_lon: pickup_lon.value,
      dropoff_lat: dropoff_lat.value,
      dropoff_lon: dropoff_lon.value,
      passenger_count: passengers.value,
      trip_distance_km: distanceKm,
      trip_duration_seconds: durationSeconds,
      fare_amount: fareAmount,
      tip_amount: tip.status === 'ok' ? tip.value : 0,
    },
  };
}

/**
 * Validates and types one raw row. Never throws: every problem comes back as
 * exactly one rejection reason.
 */
export function validateTrip(raw: RawTripRecord, rules: CleaningRules): ValidationResult {
  const parsed = parseTrip(raw, rules);
  if (!parsed.ok) {
    return { ok: false, reason: 'MissingOrUnparseable', detail: parsed.detail };
  }

  for (const rule of TRIP_RULES) {
    const violation = rule.check(parsed.value, rules);
    if (violation !== null) {
      return { ok: false, reason: rule.reason, detail: violation };
    }
  }
  return { ok: true, value: parsed.value };
}

/** Serialises validated fields back into the raw shape the reader produces. */
export function toRawRecord(trip: ValidatedTrip, rules: CleaningRules): RawTripRecord {
  const distance =
    rules.distanceUnit === 'miles' ? trip.trip_distance_km / milesToKm(1) : trip.trip_distance_km;

  return {
    vendor_id: trip.vendor_code ?? '',
    pickup_datetime: formatTimestamp(trip.pickup_datetime),
    dropoff_datetime: formatTimestamp(trip.dropoff_datetime),
    pickup_lat: String(trip.pickup_lat),
    pickup_lon: String(trip.pickup_lon),
    dropoff_lat: String(trip.dropoff_lat),
    dropoff_lon: String(trip.dropoff_lon),
    passenger_count: String(trip.passenger_count),
    trip_distance: String(distance),
    trip_duration: String(trip.trip_duration_seconds),
    fare_amount: String(trip.fare_amount),
    tip_amount: String(trip.tip_amount),
  };
}
