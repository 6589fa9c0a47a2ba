import { Geodesic } from 'geographiclib-geodesic';

import type { GeoPoint } from '../entities/geo-point.js';

/**
 * Ellipsoidal (WGS-84) distance in kilometres between two points, using
 * Karney's method. It converges for every pair of valid coordinates,
 * nearly antipodal ones included.
 */
export function geodesicDistanceKm(from: GeoPoint, to: GeoPoint): number {
  if (from.lat === to.lat && from.lng === to.lng) return 0;
  const { s12 } = Geodesic.WGS84.Inverse(from.lat, from.lng, to.lat, to.lng);
  return (s12 ?? Number.NaN) / 1000;
}
