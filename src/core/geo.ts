import distance from '@turf/distance';
import { convertLength, point } from '@turf/helpers';
import type { Zone } from './types';

export interface LatLon {
  lat: number;
  lon: number;
}

export function haversineKm(from: LatLon, to: LatLon): number {
  return distance(point([from.lon, from.lat]), point([to.lon, to.lat]), { units: 'kilometers' });
}

export function milesToKm(miles: number): number {
  return convertLength(miles, 'miles', 'kilometers');
}

/**
 * Assigns points to the zone with the nearest centroid. Points farther than
 * `maxDistanceKm` from every centroid get no zone.
 */
export class ZoneLocator {
  private readonly zones: readonly Zone[];
  private readonly maxDistanceKm: number;

  constructor(zones: readonly Zone[], maxDistanceKm: number) {
    this.zones = zones;
    this.maxDistanceKm = maxDistanceKm;
  }

  get size(): number {
    return this.zones.length;
  }

  public locate(position: LatLon): number | null {
    let best: number | null = null;
    let bestDistance = Infinity;

    for (const zone of this.zones) {
      const d = haversineKm(position, { lat: zone.centroid_lat, lon: zone.centroid_lon });
      if (d <= this.maxDistanceKm && d < bestDistance) {
        best = zone.zone_id;
        bestDistance = d;
      }
    }
    return best;
  }
}
