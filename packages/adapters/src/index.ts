// ─── Trip sources ─────────────────────────────────────────────────────────────
export { CsvTripSource } from './csv/csv-trip-source.js';
export type { CsvTripSourceOptions } from './csv/csv-trip-source.js';
export { InMemoryTripSource } from './memory/in-memory-trip-source.js';
export { createTripSource, createEmissionsPipeline } from './trip-source.factory.js';

// ─── Export ───────────────────────────────────────────────────────────────────
export { writeTripsCsv, writeRunCsv } from './csv/csv-trip-writer.js';

// ─── OpenRouteService Adapter ─────────────────────────────────────────────────
export {
  OpenRouteServiceRoutePlanner,
  TOO_FEW_POINTS_MESSAGE,
} from './openrouteservice/ors-route-planner.adapter.js';
export type { OpenRouteServiceOptions } from './openrouteservice/ors-route-planner.adapter.js';
