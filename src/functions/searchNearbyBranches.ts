/**
 * src/functions/searchNearbyBranches.ts
 *
 * Ranks library branches by great-circle distance from a postal code. Uses
 * Turf's haversine `distance` between the postal area centroid and each
 * branch's latest known location.
 */

import { distance, point } from '@turf/turf';
import { DatasetTable, compareCodes } from '../lib/dataset-table';
import { PostalGeocoder } from '../lib/postal-geocoder';
import { Need, satisfiesNeeds } from './needs';
import type { Coordinate, NearbyBranch } from '../types';

export function distanceKm(from: Coordinate, to: Coordinate): number {
  return distance(point([from.lng, from.lat]), point([to.lng, to.lat]), { units: 'kilometers' });
}

// Nearest first; equal distances fall back to library code
function compareNearby(a: NearbyBranch, b: NearbyBranch): number {
  return a.distanceKm - b.distanceKm || compareCodes(a.record.code, b.record.code);
}

/**
 * Returns every branch whose latest record has a location and meets all
 * `needs`, nearest first. Throws UnresolvableLocationError when the postal
 * code cannot be placed; an empty array means nothing qualified.
 */
export const searchNearbyBranches = (
  table: DatasetTable,
  geocoder: PostalGeocoder,
  postalCode: string,
  needs: readonly Need[] = []
): NearbyBranch[] => {
  const origin = geocoder.resolve(postalCode);

  const results: NearbyBranch[] = [];
  for (const record of table.latestRecords()) {
    if (!record.coordinate || !satisfiesNeeds(record, needs)) continue;
    results.push({ record, distanceKm: distanceKm(origin, record.coordinate) });
  }

  return results.sort(compareNearby);
};
