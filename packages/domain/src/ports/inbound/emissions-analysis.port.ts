import type { EnrichedTrip, TripCollection, TripOutputRow } from '../../entities/trip.js';

export interface StageTimings {
  loadMs: number;
  distanceMs: number;
  emissionsMs: number;
}

export interface EmissionsRunResult {
  collection: TripCollection<EnrichedTrip>;
  /** Input columns preserved, metric columns appended; same order as the trips. */
  rows: TripOutputRow[];
  columns: string[];
  timings: StageTimings;
}

export interface EmissionsAnalysisPort {
  /** Load, measure and estimate in one pass; rejects with a single PipelineError. */
  run(): Promise<EmissionsRunResult>;
}
