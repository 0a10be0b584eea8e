import { z } from 'zod';
import { parseTimestamp } from '../core/parse';

/** Reads a rules bound on the same wall clock as trip timestamps; null when unparseable. */
export function wallClockMillis(value: string): number | null {
  const parsed = parseTimestamp(value);
  return parsed.status === 'ok' ? parsed.value.getTime() : null;
}

const wallClockDate = z.string().refine((value) => wallClockMillis(value) !== null, {
  message: 'must be a timestamp of the form YYYY-MM-DD HH:MM[:SS] without a zone offset',
});

const CleaningRulesShape = z
  .object({
    minLat: z.number(),
    maxLat: z.number(),
    minLon: z.number(),
    maxLon: z.number(),
    minDatetime: wallClockDate,
    maxDatetime: wallClockDate,
    maxPassengers: z.number().int().nonnegative(),
    maxFare: z.number().positive(),
    maxDistanceKm: z.number().positive(),
    maxDurationSeconds: z.number().positive(),
    minDistanceKm: z.number().nonnegative(),
    minDurationSeconds: z.number().nonnegative(),
    maxSpeedKmh: z.number().positive(),
    distanceSource: z.enum(['source', 'haversine']),
    distanceUnit: z.enum(['km', 'miles']),
    durationSource: z.enum(['source', 'timestamps']),
    estimateFareWhenAbsent: z.boolean(),
    maxZoneDistanceKm: z.number().positive(),
  })
  .strict();

export const CleaningRulesSchema = CleaningRulesShape
  .refine((rules) => rules.minLat < rules.maxLat && rules.minLon < rules.maxLon, {
    message: 'bounding box minimums must be below maximums',
  })
  .refine((rules) => (wallClockMillis(rules.minDatetime) ?? 0) < (wallClockMillis(rules.maxDatetime) ?? 0), {
    message: 'minDatetime must precede maxDatetime',
  });

export type CleaningRules = z.infer<typeof CleaningRulesSchema>;

/** NYC bounding box and plausibility limits used when no rules file is given. */
export const DEFAULT_CLEANING_RULES: CleaningRules = {
  minLat: 40.4,
  maxLat: 40.95,
  minLon: -74.35,
  maxLon: -73.7,
  minDatetime: '2009-01-01T00:00:00Z',
  maxDatetime: '2030-12-31T23:59:59Z',
  maxPassengers: 8,
  maxFare: 1000,
  maxDistanceKm: 200,
  maxDurationSeconds: 86400,
  minDistanceKm: 0.1,
  minDurationSeconds: 120,
  maxSpeedKmh: 200,
  distanceSource: 'source',
  distanceUnit: 'km',
  durationSource: 'timestamps',
  estimateFareWhenAbsent: false,
  maxZoneDistanceKm: 5,
};

/**
 * Merges a partial override (typically a JSON rules file) over the defaults
 * and validates the result.
 */
export function resolveCleaningRules(
  override: unknown
): { ok: true; rules: CleaningRules } | { ok: false; issues: string[] } {
  const partial = CleaningRulesShape.partial().safeParse(override ?? {});
  if (!partial.success) {
    return {
      ok: false,
      issues: partial.error.issues.map((i) => `rules${i.path.map((key) => `.${key}`).join('')}: ${i.message}`),
    };
  }

  const merged = CleaningRulesSchema.safeParse({ ...DEFAULT_CLEANING_RULES, ...partial.data });
  if (!merged.success) {
    return { ok: false, issues: merged.error.issues.map((i) => `rules: ${i.message}`) };
  }
  return { ok: true, rules: merged.data };
}
