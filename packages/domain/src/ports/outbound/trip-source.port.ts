import type { LocatedTrip, TripCollection } from '../../entities/trip.js';

export interface TripSourcePort {
  /** Human-readable origin of the data, used in logs. */
  describe(): string;
  /**
   * Reads at most `limit` trips, coordinates already in decimal degrees.
   * Rejects with NotFoundError or LoadError.
   */
  load(limit: number): Promise<TripCollection<LocatedTrip>>;
}
