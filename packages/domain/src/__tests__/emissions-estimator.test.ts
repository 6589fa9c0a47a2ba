/**
 * Emissions Estimator Tests
 *
 * EV priority bands, per-trip CO2 and EV metrics, and factor validation.
 */

import { describe, it, expect } from '@jest/globals';

import {
  computeDistances,
  ConfigurationError,
  DEFAULT_EMISSION_FACTORS,
  EmissionsEstimator,
  scoreEvPriority,
} from '../index.js';
import { catchError, locatedTrip, measuredTrip } from './fixtures.js';

describe('scoreEvPriority', () => {
  it.each([
    [0, 1.0],
    [4.999, 1.0],
    [5.0, 0.9],
    [9.999, 0.9],
    [10.0, 0.7],
    [14.999, 0.7],
    [15.0, 0.5],
    [19.999, 0.5],
    [20.0, 0.3],
    [29.999, 0.3],
    [30.0, 0.1],
    [850, 0.1],
  ])('scores %p km as %p', (distanceKm, score) => {
    expect(scoreEvPriority(distanceKm)).toBe(score);
  });

  it('never increases with distance', () => {
    const scores = Array.from({ length: 400 }, (_, i) => scoreEvPriority(i * 0.1));

    scores.slice(1).forEach((s, i) => expect(s).toBeLessThanOrEqual(scores[i] ?? Number.POSITIVE_INFINITY));
  });
});

describe('EmissionsEstimator', () => {
  it('defaults to the diesel and EV factors', () => {
    expect(new EmissionsEstimator().factors).toEqual({ dieselFactor: 0.21, evFactor: 0.05 });
    expect(DEFAULT_EMISSION_FACTORS).toEqual({ dieselFactor: 0.21, evFactor: 0.05 });
  });

  it('derives every metric for a 12 km trip', () => {
    const trip = new EmissionsEstimator({ dieselFactor: 0.21, evFactor: 0.05 }).estimateTrip(measuredTrip(12));

    expect(trip.co2Kg).toBeCloseTo(2.52, 10);
    expect(trip.evSavingKg).toBeCloseTo(1.92, 10);
    expect(trip.suggestEv).toBe(false);
    expect(trip.evPriorityScore).toBe(0.7);
  });

  it('stores co2 as the exact product of distance and diesel factor', () => {
    const trip = new EmissionsEstimator().estimateTrip(measuredTrip(7.3));

    expect(trip.co2Kg).toBe(7.3 * 0.21);
    expect(trip.evSavingKg).toBe(7.3 * (0.21 - 0.05));
  });

  it('zero-length trip is EV-suitable with top priority', () => {
    const trip = new EmissionsEstimator().estimateTrip(measuredTrip(0));

    expect(trip).toMatchObject({ co2Kg: 0, evSavingKg: 0, suggestEv: true, evPriorityScore: 1.0 });
  });

  it.each([
    [9.999, true],
    [10, false],
  ])('suggestEv at %p km is %p', (distanceKm, expected) => {
    expect(new EmissionsEstimator().estimateTrip(measuredTrip(distanceKm)).suggestEv).toBe(expected);
  });

  it('keeps earlier fields and pass-through attributes', () => {
    const input = measuredTrip(3, { city: 'Pune' }, 4);

    const trip = new EmissionsEstimator().estimateTrip(input);

    expect(trip.index).toBe(4);
    expect(trip.distanceKm).toBe(3);
    expect(trip.attributes).toEqual({ city: 'Pune' });
  });

  it('is idempotent over an already-estimated collection', () => {
    const estimator = new EmissionsEstimator({ dieselFactor: 0.3, evFactor: 0.1 });
    const once = estimator.estimate({ columns: [], trips: [measuredTrip(2), measuredTrip(22)] });

    const twice = estimator.estimate(once);

    expect(twice).toEqual(once);
  });

  it('gives the same result when distance and emissions run again over enriched trips', () => {
    const estimator = new EmissionsEstimator();
    const located = {
      columns: ['poi_lat', 'poi_lng', 'receipt_lat', 'receipt_lng', 'city'],
      trips: [locatedTrip(0, [0, 0], [0, 1], { city: 'A' }), locatedTrip(1, [31.23, 121.47], [31.3, 121.5], { city: 'B' })],
    };
    const once = estimator.estimate(computeDistances(located));

    const twice = estimator.estimate(computeDistances(once));

    expect(twice).toEqual(once);
  });

  it('freezes the enriched trips and the trip list', () => {
    const { trips } = new EmissionsEstimator().estimate({ columns: [], trips: [measuredTrip(12)] });

    expect(Object.isFrozen(trips)).toBe(true);
    expect(Object.isFrozen(trips[0])).toBe(true);
  });

  it('uses custom factors', () => {
    const trip = new EmissionsEstimator({ dieselFactor: 0.5, evFactor: 0.25 }).estimateTrip(measuredTrip(4));

    expect(trip.co2Kg).toBe(2);
    expect(trip.evSavingKg).toBe(1);
  });

  it.each([
    [{ dieselFactor: 0.21, evFactor: 0.21 }, 'ev_factor'],
    [{ dieselFactor: 0.05, evFactor: 0.21 }, 'ev_factor'],
    [{ dieselFactor: -1, evFactor: 0.05 }, 'diesel_factor'],
    [{ dieselFactor: 0.21, evFactor: -0.01 }, 'ev_factor'],
    [{ dieselFactor: Number.NaN, evFactor: 0.05 }, 'diesel_factor'],
  ])('rejects %p at construction', (factors, option) => {
    const caught = catchError(() => new EmissionsEstimator(factors));

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({ option, code: 'CONFIGURATION' });
  });

  it('freezes its factors', () => {
    const estimator = new EmissionsEstimator();

    expect(Object.isFrozen(estimator.factors)).toBe(true);
  });
});
