import {
  DEFAULT_EMISSION_FACTORS,
  EV_PRIORITY_BANDS,
  EV_SUITABILITY_THRESHOLD_KM,
} from '../entities/emission-factors.js';
import type { EmissionFactors } from '../entities/emission-factors.js';
import type { EnrichedTrip, MeasuredTrip, TripCollection } from '../entities/trip.js';
import { ConfigurationError } from '../errors.js';

/** Step score for EV conversion urgency; first band whose bound exceeds the distance wins. */
export function scoreEvPriority(distanceKm: number): number {
  for (const band of EV_PRIORITY_BANDS) {
    if (distanceKm < band.belowKm) return band.score;
  }
  return EV_PRIORITY_BANDS[EV_PRIORITY_BANDS.length - 1]?.score ?? 0.1;
}

export function assertEmissionFactors(factors: EmissionFactors): void {
  const { dieselFactor, evFactor } = factors;
  if (!Number.isFinite(dieselFactor) || dieselFactor < 0) {
    throw new ConfigurationError(`diesel_factor must be a non-negative number, got ${dieselFactor}`, 'diesel_factor');
  }
  if (!Number.isFinite(evFactor) || evFactor < 0) {
    throw new ConfigurationError(`ev_factor must be a non-negative number, got ${evFactor}`, 'ev_factor');
  }
  if (evFactor >= dieselFactor) {
    throw new ConfigurationError(
      `ev_factor (${evFactor}) must be strictly less than diesel_factor (${dieselFactor})`,
      'ev_factor',
    );
  }
}

/**
 * Derives CO2 output and EV conversion metrics from trip distance.
 * Factors are validated once here and never change afterwards.
 */
export class EmissionsEstimator {
  readonly factors: EmissionFactors;

  constructor(factors: Partial<EmissionFactors> = {}) {
    const resolved: EmissionFactors = {
      dieselFactor: factors.dieselFactor ?? DEFAULT_EMISSION_FACTORS.dieselFactor,
      evFactor: factors.evFactor ?? DEFAULT_EMISSION_FACTORS.evFactor,
    };
    assertEmissionFactors(resolved);
    this.factors = Object.freeze(resolved);
  }

  estimateTrip<T extends MeasuredTrip>(trip: T): T & EnrichedTrip {
    const { dieselFactor, evFactor } = this.factors;
    const d = trip.distanceKm;
    const enriched: T & EnrichedTrip = {
      ...trip,
      co2Kg: d * dieselFactor,
      suggestEv: d < EV_SUITABILITY_THRESHOLD_KM,
      evSavingKg: d * (dieselFactor - evFactor),
      evPriorityScore: scoreEvPriority(d),
    };
    Object.freeze(enriched);
    return enriched;
  }

  estimate<T extends MeasuredTrip>(collection: TripCollection<T>): TripCollection<T & EnrichedTrip> {
    return {
      columns: collection.columns,
      trips: Object.freeze(collection.trips.map((trip) => this.estimateTrip(trip))),
    };
  }
}
