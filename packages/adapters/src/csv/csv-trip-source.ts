import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { assertRowLimit, decodeTripTable, isPipelineError, LoadError, NotFoundError } from '@trip-carbon/domain';
import type { LocatedTrip, TripCollection, TripSourcePort } from '@trip-carbon/domain';

const linesSchema = z.array(z.array(z.string()));

export interface CsvTripSourceOptions {
  delimiter?: string;
  encoding?: BufferEncoding;
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/** Delimited text export of raw trips, coordinates in microdegrees. */
export class CsvTripSource implements TripSourcePort {
  constructor(
    private readonly path: string,
    private readonly opts: CsvTripSourceOptions = {},
  ) {}

  describe(): string {
    return `csv:${this.path}`;
  }

  async load(limit: number): Promise<TripCollection<LocatedTrip>> {
    assertRowLimit(limit);
    let text: string;
    try {
      text = await readFile(this.path, { encoding: this.opts.encoding ?? 'utf8' });
    } catch (err) {
      if (isMissingFile(err)) throw new NotFoundError(this.path);
      throw new LoadError(err instanceof Error ? err.message : String(err));
    }

    try {
      // header line counts as a record when columns are not mapped
      const parsed: unknown = parse(text, {
        bom: true,
        delimiter: this.opts.delimiter ?? ',',
        skip_empty_lines: true,
        trim: true,
        to: limit + 1,
      });
      const [header, ...records] = linesSchema.parse(parsed);
      if (!header) throw new LoadError('No columns to parse from file');
      const rows = records.map((cells) =>
        Object.fromEntries(header.map((column, i) => [column, cells[i] ?? ''])),
      );
      return decodeTripTable({ columns: header, rows }, limit);
    } catch (err) {
      if (isPipelineError(err)) throw err;
      throw new LoadError(err instanceof Error ? err.message : String(err));
    }
  }
}
