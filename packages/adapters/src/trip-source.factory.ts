import { EmissionsPipeline, normalizePipelineConfig } from '@trip-carbon/domain';
import type { PipelineConfig, PipelineLogger, RawTripTable, TripSourcePort } from '@trip-carbon/domain';
import { CsvTripSource } from './csv/csv-trip-source.js';
import { InMemoryTripSource } from './memory/in-memory-trip-source.js';

export function createTripSource(source: string | RawTripTable): TripSourcePort {
  return typeof source === 'string' ? new CsvTripSource(source) : new InMemoryTripSource(source);
}

/** Builds a pipeline from the external snake_case configuration. */
export function createEmissionsPipeline(config: PipelineConfig, logger?: PipelineLogger): EmissionsPipeline {
  return new EmissionsPipeline({ ...normalizePipelineConfig(config, createTripSource), logger });
}
