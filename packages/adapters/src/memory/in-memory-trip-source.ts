import { decodeTripTable } from '@trip-carbon/domain';
import type { LocatedTrip, RawTripTable, TripCollection, TripSourcePort } from '@trip-carbon/domain';

/** Serves a table that is already in memory, e.g. a parsed upload. */
export class InMemoryTripSource implements TripSourcePort {
  constructor(private readonly table: RawTripTable) {}

  describe(): string {
    return `memory:${this.table.rows.length} rows`;
  }

  async load(limit: number): Promise<TripCollection<LocatedTrip>> {
    return decodeTripTable(this.table, limit);
  }
}
