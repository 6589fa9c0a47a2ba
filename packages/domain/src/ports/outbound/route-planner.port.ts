import type { GeoPoint } from '../../entities/geo-point.js';

/** GeoJSON FeatureCollection as returned by the routing service; kept opaque. */
export interface RouteGeometry {
  type: 'FeatureCollection';
  features: unknown[];
  bbox?: number[];
}

export type RoutePlanResult =
  | { ok: true; route: RouteGeometry }
  | { ok: false; error: string };

/**
 * External routing collaborator. Consumed by presentation code only;
 * the emissions pipeline never calls it. Implementations never throw.
 */
export interface RoutePlannerPort {
  planRoute(points: readonly GeoPoint[], apiKey: string): Promise<RoutePlanResult>;
}
