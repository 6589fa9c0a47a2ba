/** kg CO2 per km. */
export interface EmissionFactors {
  readonly dieselFactor: number;
  readonly evFactor: number;
}

export const DEFAULT_EMISSION_FACTORS: EmissionFactors = Object.freeze({
  dieselFactor: 0.21,
  evFactor: 0.05,
});

/** Trips strictly shorter than this are flagged as EV candidates. */
export const EV_SUITABILITY_THRESHOLD_KM = 10;

export interface EvPriorityBand {
  /** Exclusive upper bound in km; the last band is open-ended. */
  readonly belowKm: number;
  readonly score: number;
}

export const EV_PRIORITY_BANDS: readonly EvPriorityBand[] = Object.freeze([
  { belowKm: 5, score: 1.0 },
  { belowKm: 10, score: 0.9 },
  { belowKm: 15, score: 0.7 },
  { belowKm: 20, score: 0.5 },
  { belowKm: 30, score: 0.3 },
  { belowKm: Number.POSITIVE_INFINITY, score: 0.1 },
]);
