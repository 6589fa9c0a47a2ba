import { stringify } from 'csv-stringify/sync';
import type { EmissionsRunResult, TripOutputRow } from '@trip-carbon/domain';

/** Renders enriched rows as CSV with a header line, booleans as true/false. */
export function writeTripsCsv(rows: readonly TripOutputRow[], columns: readonly string[]): string {
  return stringify([...rows], {
    header: true,
    columns: [...columns],
    cast: {
      boolean: (value) => (value ? 'true' : 'false'),
    },
  });
}

export function writeRunCsv(result: Pick<EmissionsRunResult, 'rows' | 'columns'>): string {
  return writeTripsCsv(result.rows, result.columns);
}
