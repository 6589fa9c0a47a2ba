import { MICRODEGREES_PER_DEGREE } from '../entities/geo-point.js';
import { COORDINATE_COLUMNS } from '../entities/trip.js';
import type { CoordinateColumn, LocatedTrip, RawCell, RawTripTable, TripCollection } from '../entities/trip.js';
import { ConfigurationError, LoadError } from '../errors.js';

export const DEFAULT_ROW_LIMIT = 100_000;

export function assertRowLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ConfigurationError(`row_limit must be a positive integer, got ${limit}`, 'row_limit');
  }
}

function parseMicrodegrees(cell: RawCell | undefined, column: CoordinateColumn, rowIndex: number): number {
  const raw = typeof cell === 'string' ? cell.trim() : cell;
  if (raw === undefined || raw === '') {
    throw new LoadError(`row ${rowIndex}: missing value for column '${column}'`);
  }
  const value = typeof raw === 'number' ? raw : Number(raw);
  if (!Number.isFinite(value)) {
    throw new LoadError(`row ${rowIndex}: could not convert '${String(raw)}' in column '${column}' to a number`);
  }
  return value / MICRODEGREES_PER_DEGREE;
}

/**
 * Decodes up to `limit` rows of a raw trip table, converting the four
 * microdegree coordinate columns to decimal degrees. Any other column is kept
 * as an attribute holding the cell exactly as it was read.
 */
export function decodeTripTable(table: RawTripTable, limit: number = DEFAULT_ROW_LIMIT): TripCollection<LocatedTrip> {
  assertRowLimit(limit);

  const missing = COORDINATE_COLUMNS.filter((c) => !table.columns.includes(c));
  if (missing.length > 0) {
    throw new LoadError(`columns expected but not found: ${missing.join(', ')}`);
  }

  const coordinateColumns: readonly string[] = COORDINATE_COLUMNS;
  const passThrough = table.columns.filter((c) => !coordinateColumns.includes(c));

  const trips = table.rows.slice(0, limit).map((row, index): LocatedTrip => {
    const attributes: Record<string, RawCell> = {};
    for (const column of passThrough) {
      attributes[column] = row[column] ?? '';
    }
    return Object.freeze({
      index,
      origin: Object.freeze({
        lat: parseMicrodegrees(row['poi_lat'], 'poi_lat', index),
        lng: parseMicrodegrees(row['poi_lng'], 'poi_lng', index),
      }),
      destination: Object.freeze({
        lat: parseMicrodegrees(row['receipt_lat'], 'receipt_lat', index),
        lng: parseMicrodegrees(row['receipt_lng'], 'receipt_lng', index),
      }),
      attributes: Object.freeze(attributes),
    });
  });

  return { columns: Object.freeze([...table.columns]), trips: Object.freeze(trips) };
}
