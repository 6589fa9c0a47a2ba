import { METRIC_COLUMNS } from '../entities/trip.js';
import type { EnrichedTrip, TripCollection, TripOutputRow } from '../entities/trip.js';

// Stale metric columns from a previously exported table are recomputed, not passed through.
function inputColumns(columns: readonly string[]): string[] {
  const metrics: readonly string[] = METRIC_COLUMNS;
  return columns.filter((c) => !metrics.includes(c));
}

function coordinateValue(trip: EnrichedTrip, column: string): number | undefined {
  switch (column) {
    case 'poi_lat':
      return trip.origin.lat;
    case 'poi_lng':
      return trip.origin.lng;
    case 'receipt_lat':
      return trip.destination.lat;
    case 'receipt_lng':
      return trip.destination.lng;
    default:
      return undefined;
  }
}

export function toOutputRow(trip: EnrichedTrip, columns: readonly string[]): TripOutputRow {
  const row: Record<string, string | number | boolean> = {};
  for (const column of inputColumns(columns)) {
    row[column] = coordinateValue(trip, column) ?? trip.attributes[column] ?? '';
  }
  row['distance_km'] = trip.distanceKm;
  row['co2_kg'] = trip.co2Kg;
  row['suggest_ev'] = trip.suggestEv;
  row['ev_saving_kg'] = trip.evSavingKg;
  row['ev_priority_score'] = trip.evPriorityScore;
  return row;
}

/** Input columns in their original order, followed by the metric columns. */
export function outputColumns(columns: readonly string[]): string[] {
  return [...inputColumns(columns), ...METRIC_COLUMNS];
}

export function toOutputRows(collection: TripCollection<EnrichedTrip>): TripOutputRow[] {
  return collection.trips.map((trip) => toOutputRow(trip, collection.columns));
}
