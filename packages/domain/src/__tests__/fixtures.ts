import type { LocatedTrip, MeasuredTrip, RawCell, RawTripTable } from '../index.js';

export const COORDS = ['poi_lat', 'poi_lng', 'receipt_lat', 'receipt_lng'];

export function makeTable(rows: RawTripTable['rows'], columns: string[] = COORDS): RawTripTable {
  return { columns, rows };
}

export function locatedTrip(
  index: number,
  origin: [number, number],
  destination: [number, number],
  attributes: Record<string, RawCell> = {},
): LocatedTrip {
  return {
    index,
    origin: { lat: origin[0], lng: origin[1] },
    destination: { lat: destination[0], lng: destination[1] },
    attributes,
  };
}

export function measuredTrip(distanceKm: number, attributes: Record<string, RawCell> = {}, index = 0): MeasuredTrip {
  return { ...locatedTrip(index, [0, 0], [0, 0], attributes), distanceKm };
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}
