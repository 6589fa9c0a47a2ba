import { filterByDistance, toOutputRow } from '@trip-carbon/domain';
import type {
  EmissionsRunResult,
  EnrichedTrip,
  PipelineLogger,
  RawTripTable,
  TripOutputRow,
} from '@trip-carbon/domain';
import { createEmissionsPipeline } from '@trip-carbon/adapters';
import { z } from 'zod';
import type { ApiConfig } from '../../config/env.js';

/** Query options shared by every endpoint that runs the pipeline. */
export const analysisOptionsSchema = z.object({
  rowLimit: z.coerce.number().int().optional(),
  dieselFactor: z.coerce.number().optional(),
  evFactor: z.coerce.number().optional(),
  minDistanceKm: z.coerce.number().min(0).optional(),
  maxDistanceKm: z.coerce.number().min(0).optional(),
});

export type AnalysisOptions = z.infer<typeof analysisOptionsSchema>;

export interface Analysis {
  trips: EnrichedTrip[];
  rows: TripOutputRow[];
  columns: string[];
}

interface CachedRun {
  expiresAt: number;
  run: Promise<EmissionsRunResult>;
}

export class AnalysisService {
  // Dataset runs keyed by pipeline options; the distance filter is applied per request.
  private readonly runs = new Map<string, CachedRun>();

  constructor(
    private readonly config: ApiConfig,
    private readonly logger?: PipelineLogger,
    private readonly now: () => number = Date.now,
  ) {}

  /** Runs the pipeline over the configured dataset file, reusing a recent run with the same options. */
  async analyzeDataset(opts: AnalysisOptions = {}): Promise<Analysis> {
    const ttl = this.config.ANALYSIS_CACHE_TTL_MS;
    if (ttl === 0) return this.shape(await this.run(this.config.TRIP_DATA_PATH, opts), opts);

    const key = JSON.stringify([this.config.TRIP_DATA_PATH, ...this.pipelineOptions(opts)]);
    const cached = this.runs.get(key);
    if (cached && cached.expiresAt > this.now()) return this.shape(await cached.run, opts);

    const run = this.run(this.config.TRIP_DATA_PATH, opts);
    this.runs.set(key, { expiresAt: this.now() + ttl, run });
    try {
      return this.shape(await run, opts);
    } catch (err) {
      // failed runs are never reused
      if (this.runs.get(key)?.run === run) this.runs.delete(key);
      throw err;
    }
  }

  async analyzeTable(table: RawTripTable, opts: AnalysisOptions = {}): Promise<Analysis> {
    return this.shape(await this.run(table, opts), opts);
  }

  clearCache(): void {
    this.runs.clear();
  }

  private pipelineOptions(opts: AnalysisOptions): [number, number, number] {
    return [
      opts.rowLimit ?? this.config.TRIP_ROW_LIMIT,
      opts.dieselFactor ?? this.config.DIESEL_EMISSION_FACTOR,
      opts.evFactor ?? this.config.EV_EMISSION_FACTOR,
    ];
  }

  private run(source: string | RawTripTable, opts: AnalysisOptions): Promise<EmissionsRunResult> {
    const [rowLimit, dieselFactor, evFactor] = this.pipelineOptions(opts);
    const pipeline = createEmissionsPipeline(
      { source_path: source, row_limit: rowLimit, diesel_factor: dieselFactor, ev_factor: evFactor },
      this.logger,
    );
    return pipeline.run();
  }

  private shape(result: EmissionsRunResult, opts: AnalysisOptions): Analysis {
    const trips = filterByDistance(result.collection.trips, {
      minKm: opts.minDistanceKm,
      maxKm: opts.maxDistanceKm,
    });
    return {
      trips,
      rows: trips.map((t) => toOutputRow(t, result.collection.columns)),
      columns: result.columns,
    };
  }
}
