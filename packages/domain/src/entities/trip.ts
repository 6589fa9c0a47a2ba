import type { GeoPoint } from './geo-point.js';

/** Column names every raw trip table must carry, in microdegrees. */
export const COORDINATE_COLUMNS = ['poi_lat', 'poi_lng', 'receipt_lat', 'receipt_lng'] as const;

export type CoordinateColumn = (typeof COORDINATE_COLUMNS)[number];

/** Columns appended by the pipeline, in output order. */
export const METRIC_COLUMNS = [
  'distance_km',
  'co2_kg',
  'suggest_ev',
  'ev_saving_kg',
  'ev_priority_score',
] as const;

export type MetricColumn = (typeof METRIC_COLUMNS)[number];

export type RawCell = string | number;

/** An already-materialised tabular source. */
export interface RawTripTable {
  readonly columns: readonly string[];
  readonly rows: readonly Readonly<Record<string, RawCell>>[];
}

export interface LocatedTrip {
  /** Zero-based position in the input table. */
  readonly index: number;
  readonly origin: GeoPoint;
  readonly destination: GeoPoint;
  /** Non-coordinate input columns, passed through untouched (city, store_id, ...). */
  readonly attributes: Readonly<Record<string, RawCell>>;
}

export interface MeasuredTrip extends LocatedTrip {
  readonly distanceKm: number;
}

export interface EnrichedTrip extends MeasuredTrip {
  readonly co2Kg: number;
  readonly suggestEv: boolean;
  readonly evSavingKg: number;
  readonly evPriorityScore: number;
}

export interface TripCollection<T extends LocatedTrip = LocatedTrip> {
  /** Input column order, coordinate columns included. */
  readonly columns: readonly string[];
  readonly trips: readonly T[];
}

export type TripOutputRow = Readonly<Record<string, string | number | boolean>>;
