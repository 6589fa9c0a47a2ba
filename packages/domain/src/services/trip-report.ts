import type { EnrichedTrip } from '../entities/trip.js';
import { ConfigurationError } from '../errors.js';

// ─── Filtering ────────────────────────────────────────────────────────────────

export interface DistanceRange {
  minKm?: number;
  maxKm?: number;
}

/** Keeps trips whose distance lies within [minKm, maxKm]; both bounds inclusive. */
export function filterByDistance<T extends EnrichedTrip>(trips: readonly T[], range: DistanceRange): T[] {
  const min = range.minKm ?? 0;
  const max = range.maxKm ?? Number.POSITIVE_INFINITY;
  if (min > max) {
    throw new ConfigurationError(`distance range is empty: min ${min} > max ${max}`, 'distance_range');
  }
  return trips.filter((t) => t.distanceKm >= min && t.distanceKm <= max);
}

// ─── Totals ───────────────────────────────────────────────────────────────────

export interface EmissionsSummary {
  tripCount: number;
  totalCo2Kg: number;
  evSuitableCount: number;
  averageDistanceKm: number;
  totalEvSavingKg: number;
}

export function summarizeEmissions(trips: readonly EnrichedTrip[]): EmissionsSummary {
  let totalCo2Kg = 0;
  let totalDistance = 0;
  let totalEvSavingKg = 0;
  let evSuitableCount = 0;
  for (const t of trips) {
    totalCo2Kg += t.co2Kg;
    totalDistance += t.distanceKm;
    totalEvSavingKg += t.evSavingKg;
    if (t.suggestEv) evSuitableCount++;
  }
  return {
    tripCount: trips.length,
    totalCo2Kg,
    evSuitableCount,
    averageDistanceKm: trips.length > 0 ? totalDistance / trips.length : 0,
    totalEvSavingKg,
  };
}

export interface EvSuitabilityBreakdown {
  suitable: number;
  notSuitable: number;
  suitableShare: number;
  notSuitableShare: number;
}

export function evSuitabilityBreakdown(trips: readonly EnrichedTrip[]): EvSuitabilityBreakdown {
  const suitable = trips.filter((t) => t.suggestEv).length;
  const notSuitable = trips.length - suitable;
  const total = trips.length;
  return {
    suitable,
    notSuitable,
    suitableShare: total > 0 ? suitable / total : 0,
    notSuitableShare: total > 0 ? notSuitable / total : 0,
  };
}

// ─── EV adoption what-if ──────────────────────────────────────────────────────

export interface EvAdoptionSimulation {
  adoptionPct: number;
  beforeCo2Kg: number;
  afterCo2Kg: number;
  savedCo2Kg: number;
}

/**
 * Assumes `adoptionPct` percent of EV-suitable trips switch over and
 * their diesel emissions disappear entirely.
 */
export function simulateEvAdoption(trips: readonly EnrichedTrip[], adoptionPct: number): EvAdoptionSimulation {
  if (!Number.isFinite(adoptionPct) || adoptionPct < 0 || adoptionPct > 100) {
    throw new ConfigurationError(`adoption percentage must be within 0..100, got ${adoptionPct}`, 'adoption_pct');
  }
  const beforeCo2Kg = trips.reduce((sum, t) => sum + t.co2Kg, 0);
  const suitableCo2 = trips.reduce((sum, t) => (t.suggestEv ? sum + t.co2Kg : sum), 0);
  const savedCo2Kg = suitableCo2 * (adoptionPct / 100);
  return { adoptionPct, beforeCo2Kg, afterCo2Kg: beforeCo2Kg - savedCo2Kg, savedCo2Kg };
}

// ─── Grouping ─────────────────────────────────────────────────────────────────

export interface GroupEmissions {
  key: string;
  co2Kg: number;
  tripCount: number;
}

/**
 * Sums CO2 per value of a pass-through column, highest emitter first.
 * Trips without the column are left out; if no trip has it the result is empty.
 */
export function groupEmissionsBy(trips: readonly EnrichedTrip[], column: string): GroupEmissions[] {
  const groups = new Map<string, GroupEmissions>();
  for (const t of trips) {
    if (!Object.prototype.hasOwnProperty.call(t.attributes, column)) continue;
    const key = String(t.attributes[column] ?? '');
    const group = groups.get(key) ?? { key, co2Kg: 0, tripCount: 0 };
    group.co2Kg += t.co2Kg;
    group.tripCount += 1;
    groups.set(key, group);
  }
  return [...groups.values()].sort((a, b) => b.co2Kg - a.co2Kg || a.key.localeCompare(b.key));
}

export interface Leaderboard {
  column: string;
  /** Lowest emitters, ascending. */
  cleanest: GroupEmissions[];
  /** Highest emitters, ascending (the worst one last). */
  dirtiest: GroupEmissions[];
}

export function storeLeaderboard(
  trips: readonly EnrichedTrip[],
  opts: { column?: string; size?: number } = {},
): Leaderboard {
  const column = opts.column ?? 'store_id';
  const size = opts.size ?? 5;
  const ascending = groupEmissionsBy(trips, column).sort(
    (a, b) => a.co2Kg - b.co2Kg || a.key.localeCompare(b.key),
  );
  return {
    column,
    cleanest: ascending.slice(0, size),
    dirtiest: ascending.slice(Math.max(0, ascending.length - size)),
  };
}

// ─── Cost & distribution ──────────────────────────────────────────────────────

export function estimateCarbonCost(trips: readonly EnrichedTrip[], pricePerKg: number): number {
  if (!Number.isFinite(pricePerKg) || pricePerKg < 0) {
    throw new ConfigurationError(`carbon price must be a non-negative number, got ${pricePerKg}`, 'price_per_kg');
  }
  return trips.reduce((sum, t) => sum + t.co2Kg, 0) * pricePerKg;
}

export interface HistogramBin {
  fromKg: number;
  toKg: number;
  count: number;
}

/** Equal-width bins over the observed CO2 range; the last bin is closed on the right. */
export function emissionsHistogram(trips: readonly EnrichedTrip[], bins = 40): HistogramBin[] {
  if (!Number.isInteger(bins) || bins <= 0) {
    throw new ConfigurationError(`bins must be a positive integer, got ${bins}`, 'bins');
  }
  if (trips.length === 0) return [];

  const values = trips.map((t) => t.co2Kg);
  let min = values.reduce((m, v) => Math.min(m, v), Number.POSITIVE_INFINITY);
  let max = values.reduce((m, v) => Math.max(m, v), Number.NEGATIVE_INFINITY);
  if (min === max) {
    min -= 0.5;
    max += 0.5;
  }
  const width = (max - min) / bins;
  const result: HistogramBin[] = Array.from({ length: bins }, (_, i) => ({
    fromKg: min + i * width,
    toKg: i === bins - 1 ? max : min + (i + 1) * width,
    count: 0,
  }));
  for (const v of values) {
    const slot = Math.min(bins - 1, Math.floor((v - min) / width));
    const bin = result[slot];
    if (bin) bin.count++;
  }
  return result;
}

// ─── Trend ────────────────────────────────────────────────────────────────────

export interface EmissionTrend {
  slope: number;
  intercept: number;
  /** Fitted CO2 per trip, same order as the input. */
  predictedCo2Kg: number[];
}

/** Ordinary least squares of co2Kg against distanceKm. */
export function fitEmissionTrend(trips: readonly EnrichedTrip[]): EmissionTrend | null {
  const n = trips.length;
  if (n < 2) return null;

  const meanX = trips.reduce((s, t) => s + t.distanceKm, 0) / n;
  const meanY = trips.reduce((s, t) => s + t.co2Kg, 0) / n;
  let sxx = 0;
  let sxy = 0;
  for (const t of trips) {
    const dx = t.distanceKm - meanX;
    sxx += dx * dx;
    sxy += dx * (t.co2Kg - meanY);
  }
  if (sxx === 0) return null;

  const slope = sxy / sxx;
  const intercept = meanY - slope * meanX;
  return {
    slope,
    intercept,
    predictedCo2Kg: trips.map((t) => intercept + slope * t.distanceKm),
  };
}
