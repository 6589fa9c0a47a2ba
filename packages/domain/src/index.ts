// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/geo-point.js';
export * from './entities/trip.js';
export * from './entities/emission-factors.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors.js';

// ─── Pipeline stages ──────────────────────────────────────────────────────────
export * from './services/coordinate-loader.js';
export * from './services/geodesic.js';
export * from './services/distance-calculator.js';
export * from './services/emissions-estimator.js';
export * from './services/trip-table.js';
export * from './pipeline/emissions-pipeline.js';

// ─── Reporting facade ─────────────────────────────────────────────────────────
export * from './services/trip-report.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/emissions-analysis.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/trip-source.port.js';
export * from './ports/outbound/route-planner.port.js';
