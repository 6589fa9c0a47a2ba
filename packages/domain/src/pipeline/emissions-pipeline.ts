import { DEFAULT_EMISSION_FACTORS } from '../entities/emission-factors.js';
import type { EnrichedTrip, RawTripTable, TripCollection } from '../entities/trip.js';
import type { EmissionsAnalysisPort, EmissionsRunResult } from '../ports/inbound/emissions-analysis.port.js';
import type { TripSourcePort } from '../ports/outbound/trip-source.port.js';
import { assertRowLimit, DEFAULT_ROW_LIMIT } from '../services/coordinate-loader.js';
import { computeDistances } from '../services/distance-calculator.js';
import { EmissionsEstimator } from '../services/emissions-estimator.js';
import { outputColumns, toOutputRows } from '../services/trip-table.js';

export interface PipelineLogger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
}

export const silentLogger: PipelineLogger = {
  info: () => undefined,
  warn: () => undefined,
};

export interface EmissionsPipelineOptions {
  source: TripSourcePort;
  rowLimit?: number;
  dieselFactor?: number;
  evFactor?: number;
  logger?: PipelineLogger;
}

/** External option names, as accepted by configuration files and callers. */
export interface PipelineConfig {
  source_path: string | RawTripTable;
  row_limit?: number;
  diesel_factor?: number;
  ev_factor?: number;
}

export function normalizePipelineConfig(
  config: PipelineConfig,
  resolveSource: (source: string | RawTripTable) => TripSourcePort,
): EmissionsPipelineOptions {
  return {
    source: resolveSource(config.source_path),
    rowLimit: config.row_limit ?? DEFAULT_ROW_LIMIT,
    dieselFactor: config.diesel_factor ?? DEFAULT_EMISSION_FACTORS.dieselFactor,
    evFactor: config.ev_factor ?? DEFAULT_EMISSION_FACTORS.evFactor,
  };
}

/**
 * loader → distance calculator → emissions estimator.
 * Configuration is checked here, before any row is read.
 */
export class EmissionsPipeline implements EmissionsAnalysisPort {
  readonly rowLimit: number;
  private readonly source: TripSourcePort;
  private readonly estimator: EmissionsEstimator;
  private readonly logger: PipelineLogger;

  constructor(opts: EmissionsPipelineOptions) {
    const rowLimit = opts.rowLimit ?? DEFAULT_ROW_LIMIT;
    assertRowLimit(rowLimit);
    this.rowLimit = rowLimit;
    this.source = opts.source;
    this.estimator = new EmissionsEstimator({
      dieselFactor: opts.dieselFactor,
      evFactor: opts.evFactor,
    });
    this.logger = opts.logger ?? silentLogger;
  }

  async run(): Promise<EmissionsRunResult> {
    const t0 = performance.now();
    const located = await this.source.load(this.rowLimit);
    const t1 = performance.now();
    const measured = computeDistances(located);
    const t2 = performance.now();
    const collection: TripCollection<EnrichedTrip> = this.estimator.estimate(measured);
    const t3 = performance.now();

    const timings = { loadMs: t1 - t0, distanceMs: t2 - t1, emissionsMs: t3 - t2 };
    this.logger.info('[pipeline] run complete', {
      source: this.source.describe(),
      trips: collection.trips.length,
      ...timings,
    });

    return {
      collection,
      rows: toOutputRows(collection),
      columns: outputColumns(collection.columns),
      timings,
    };
  }
}
