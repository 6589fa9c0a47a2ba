import { fetch } from 'undici';
import type { Dispatcher } from 'undici';
import { z } from 'zod';
import type { GeoPoint, RoutePlannerPort, RoutePlanResult } from '@trip-carbon/domain';

const DEFAULT_BASE_URL = 'https://api.openrouteservice.org';
const DEFAULT_PROFILE = 'driving-car';

export const TOO_FEW_POINTS_MESSAGE = 'Need at least 2 locations for route optimization.';

const featureCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(z.unknown()),
  bbox: z.array(z.number()).optional(),
});

const errorBodySchema = z.object({
  error: z.union([z.string(), z.object({ code: z.number().optional(), message: z.string() })]),
});

export interface OpenRouteServiceOptions {
  baseUrl?: string;
  profile?: string;
  timeoutMs?: number;
  /** Injected for tests (undici MockAgent) or a custom connection pool. */
  dispatcher?: Dispatcher;
}

/**
 * Directions client for OpenRouteService. Points are sent as [lng, lat]
 * pairs; any failure is reported as an error string, never thrown.
 */
export class OpenRouteServiceRoutePlanner implements RoutePlannerPort {
  private readonly baseUrl: string;
  private readonly profile: string;
  private readonly timeoutMs: number;

  constructor(private readonly opts: OpenRouteServiceOptions = {}) {
    this.baseUrl = (opts.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.profile = opts.profile ?? DEFAULT_PROFILE;
    this.timeoutMs = opts.timeoutMs ?? 15_000;
  }

  async planRoute(points: readonly GeoPoint[], apiKey: string): Promise<RoutePlanResult> {
    if (points.length < 2) return { ok: false, error: TOO_FEW_POINTS_MESSAGE };

    const url = `${this.baseUrl}/v2/directions/${this.profile}/geojson`;
    try {
      const res = await fetch(url, {
        method: 'POST',
        headers: {
          Authorization: apiKey,
          'Content-Type': 'application/json',
          Accept: 'application/geo+json, application/json',
        },
        body: JSON.stringify({ coordinates: points.map((p) => [p.lng, p.lat]) }),
        signal: AbortSignal.timeout(this.timeoutMs),
        dispatcher: this.opts.dispatcher,
      });
      const body: unknown = await res.json();

      if (!res.ok) {
        const parsed = errorBodySchema.safeParse(body);
        if (!parsed.success) return { ok: false, error: `routing service responded ${res.status}` };
        const { error } = parsed.data;
        return { ok: false, error: typeof error === 'string' ? error : error.message };
      }

      const route = featureCollectionSchema.safeParse(body);
      if (!route.success) return { ok: false, error: 'routing service returned an unexpected payload' };
      return { ok: true, route: route.data };
    } catch (err) {
      return { ok: false, error: err instanceof Error ? err.message : String(err) };
    }
  }
}
