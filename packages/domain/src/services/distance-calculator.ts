import { LATITUDE_RANGE, LONGITUDE_RANGE } from '../entities/geo-point.js';
import type { LocatedTrip, MeasuredTrip, TripCollection } from '../entities/trip.js';
import { CoordinateRangeError } from '../errors.js';
import { geodesicDistanceKm } from './geodesic.js';

interface Range {
  readonly min: number;
  readonly max: number;
}

function inRange(value: number, range: Range): boolean {
  return Number.isFinite(value) && value >= range.min && value <= range.max;
}

/** Throws for the first trip carrying an out-of-range coordinate. */
export function assertCoordinatesInRange(trips: readonly LocatedTrip[]): void {
  trips.forEach((trip, position) => {
    const checks: [string, number, Range][] = [
      ['poi_lat', trip.origin.lat, LATITUDE_RANGE],
      ['poi_lng', trip.origin.lng, LONGITUDE_RANGE],
      ['receipt_lat', trip.destination.lat, LATITUDE_RANGE],
      ['receipt_lng', trip.destination.lng, LONGITUDE_RANGE],
    ];
    for (const [field, value, range] of checks) {
      if (!inRange(value, range)) throw new CoordinateRangeError(position, field, value);
    }
  });
}

export function measureTrip<T extends LocatedTrip>(trip: T): T & MeasuredTrip {
  const measured: T & MeasuredTrip = { ...trip, distanceKm: geodesicDistanceKm(trip.origin, trip.destination) };
  Object.freeze(measured);
  return measured;
}

/**
 * Adds `distanceKm` to every trip. The whole batch is validated before any
 * distance is computed, so a bad row never yields a partial collection.
 */
export function computeDistances<T extends LocatedTrip>(
  collection: TripCollection<T>,
): TripCollection<T & MeasuredTrip> {
  assertCoordinatesInRange(collection.trips);
  return {
    columns: collection.columns,
    trips: Object.freeze(collection.trips.map((trip) => measureTrip(trip))),
  };
}
