/**
 * API Controller Tests
 *
 * Builds the Express app over a temporary CSV dataset and a fake route
 * planner, then drives it with supertest.
 */

import { jest, describe, it, expect, beforeAll, afterAll, beforeEach } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import request from 'supertest';
import type { RoutePlannerPort } from '@trip-carbon/domain';

import { buildApp } from '../app.js';
import { loadConfig } from '../config/env.js';

// ─── Fixtures ─────────────────────────────────────────────────────────────────

// Equatorial trips: 0 km, 0.1 deg (~11.13 km) and 0.05 deg (~5.57 km)
const DATASET = [
  'city,store_id,poi_lat,poi_lng,receipt_lat,receipt_lng',
  'Pune,S1,0,0,0,0',
  'Pune,S2,0,0,0,100000',
  'Delhi,S1,0,0,0,50000',
].join('\n');

const D2 = 11.131949079327356;
const D3 = 5.565974539663678;

const mockPlanRoute = jest.fn<RoutePlannerPort['planRoute']>();
const routePlanner: RoutePlannerPort = { planRoute: mockPlanRoute };

let dir: string;
let datasetPath: string;

function appWith(env: Record<string, string> = {}) {
  return buildApp({
    config: loadConfig({ NODE_ENV: 'test', TRIP_DATA_PATH: datasetPath, ...env }),
    routePlanner,
  });
}

let app: ReturnType<typeof buildApp>;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), 'trip-api-'));
  datasetPath = join(dir, 'trips.csv');
  await writeFile(datasetPath, DATASET, 'utf8');
  app = appWith({ ORS_API_KEY: 'test-key' });
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

beforeEach(() => {
  jest.clearAllMocks();
});

// ═══════════════════════════════════════════════════════════════════════════════
// Health Check
// ═══════════════════════════════════════════════════════════════════════════════

describe('GET /healthz', () => {
  it('returns status ok', async () => {
    const res = await request(app).get('/healthz').expect(200);
    expect(res.body.status).toBe('ok');
    expect(res.body.ts).toBeDefined();
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Emissions Routes
// ═══════════════════════════════════════════════════════════════════════════════

describe('GET /api/emissions/trips', () => {
  it('returns enriched rows with input columns preserved', async () => {
    const res = await request(app).get('/api/emissions/trips').expect(200);

    expect(res.body.total).toBe(3);
    expect(res.body.columns).toEqual([
      'city',
      'store_id',
      'poi_lat',
      'poi_lng',
      'receipt_lat',
      'receipt_lng',
      'distance_km',
      'co2_kg',
      'suggest_ev',
      'ev_saving_kg',
      'ev_priority_score',
    ]);
    expect(res.body.data[0]).toEqual({
      city: 'Pune',
      store_id: 'S1',
      poi_lat: 0,
      poi_lng: 0,
      receipt_lat: 0,
      receipt_lng: 0,
      distance_km: 0,
      co2_kg: 0,
      suggest_ev: true,
      ev_saving_kg: 0,
      ev_priority_score: 1,
    });
    expect(res.body.data[1].distance_km).toBeCloseTo(D2, 6);
    expect(res.body.data[1].co2_kg).toBeCloseTo(D2 * 0.21, 6);
    expect(res.body.data[1].suggest_ev).toBe(false);
    expect(res.body.data[2].ev_priority_score).toBe(0.9);
    expect(res.body.summary.evSuitableCount).toBe(2);
  });

  it('filters by distance and pages the result', async () => {
    const res = await request(app).get('/api/emissions/trips?minDistanceKm=5&limit=1&offset=1').expect(200);

    expect(res.body.total).toBe(2);
    expect(res.body.data).toHaveLength(1);
    expect(res.body.data[0].city).toBe('Delhi');
  });

  it('applies custom emission factors', async () => {
    const res = await request(app).get('/api/emissions/trips?dieselFactor=1&evFactor=0.5').expect(200);

    expect(res.body.data[2].co2_kg).toBeCloseTo(D3, 6);
    expect(res.body.data[2].ev_saving_kg).toBeCloseTo(D3 / 2, 6);
  });

  it('rejects a non-positive row limit as a configuration error', async () => {
    const res = await request(app).get('/api/emissions/trips?rowLimit=0').expect(400);

    expect(res.body.code).toBe('CONFIGURATION');
  });

  it('rejects an EV factor not below the diesel factor', async () => {
    const res = await request(app).get('/api/emissions/trips?evFactor=0.3').expect(400);

    expect(res.body.code).toBe('CONFIGURATION');
    expect(res.body.details).toEqual({ option: 'ev_factor' });
  });

  it('rejects an invalid page size', async () => {
    const res = await request(app).get('/api/emissions/trips?limit=-1').expect(400);

    expect(res.body.error).toBe('validation_error');
  });

  it('returns 404 when the dataset file is missing', async () => {
    const res = await request(appWith({ TRIP_DATA_PATH: join(dir, 'missing.csv') }))
      .get('/api/emissions/trips')
      .expect(404);

    expect(res.body.code).toBe('NOT_FOUND');
  });
});

describe('GET /api/emissions/trips.csv', () => {
  it('downloads the enriched table as CSV', async () => {
    const res = await request(app).get('/api/emissions/trips.csv?maxDistanceKm=0').expect(200);

    expect(res.headers['content-type']).toMatch(/^text\/csv/);
    expect(res.headers['content-disposition']).toBe('attachment; filename="trip_emissions.csv"');
    expect(res.text).toBe(
      'city,store_id,poi_lat,poi_lng,receipt_lat,receipt_lng,distance_km,co2_kg,suggest_ev,ev_saving_kg,ev_priority_score\n' +
        'Pune,S1,0,0,0,0,0,0,true,0,1\n',
    );
  });
});

describe('POST /api/emissions/analyze', () => {
  const columns = ['poi_lat', 'poi_lng', 'receipt_lat', 'receipt_lng'];

  it('runs the pipeline over an uploaded table', async () => {
    const res = await request(app)
      .post('/api/emissions/analyze')
      .send({ table: { columns, rows: [{ poi_lat: 0, poi_lng: 0, receipt_lat: 0, receipt_lng: 100000 }] } })
      .expect(200);

    expect(res.body.total).toBe(1);
    expect(res.body.data[0].distance_km).toBeCloseTo(D2, 6);
    expect(res.body.data[0].ev_priority_score).toBe(0.7);
  });

  it('rejects an out-of-range coordinate, naming the trip', async () => {
    const res = await request(app)
      .post('/api/emissions/analyze')
      .send({
        table: {
          columns,
          rows: [
            { poi_lat: 0, poi_lng: 0, receipt_lat: 0, receipt_lng: 0 },
            { poi_lat: 95000000, poi_lng: 0, receipt_lat: 0, receipt_lng: 0 },
          ],
        },
      })
      .expect(422);

    expect(res.body.code).toBe('COORDINATE_RANGE');
    expect(res.body.details).toEqual({ tripIndex: 1, field: 'poi_lat', value: 95 });
  });

  it('rejects a table missing a coordinate column', async () => {
    const res = await request(app)
      .post('/api/emissions/analyze')
      .send({ table: { columns: ['poi_lat'], rows: [{ poi_lat: 1 }] } })
      .expect(422);

    expect(res.body.code).toBe('LOAD_ERROR');
  });

  it('rejects a body without a table', async () => {
    const res = await request(app).post('/api/emissions/analyze').send({}).expect(400);

    expect(res.body.error).toBe('validation_error');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Report Routes
// ═══════════════════════════════════════════════════════════════════════════════

describe('GET /api/reports', () => {
  it('summarizes the dataset', async () => {
    const res = await request(app).get('/api/reports/summary').expect(200);

    expect(res.body.tripCount).toBe(3);
    expect(res.body.evSuitableCount).toBe(2);
    expect(res.body.totalCo2Kg).toBeCloseTo((D2 + D3) * 0.21, 6);
    expect(res.body.averageDistanceKm).toBeCloseTo((D2 + D3) / 3, 6);
  });

  it('breaks down EV suitability', async () => {
    const res = await request(app).get('/api/reports/ev-breakdown').expect(200);

    expect(res.body.suitable).toBe(2);
    expect(res.body.notSuitable).toBe(1);
  });

  it('simulates full EV adoption', async () => {
    const res = await request(app).get('/api/reports/ev-simulation?adoptionPct=100').expect(200);

    expect(res.body.savedCo2Kg).toBeCloseTo(D3 * 0.21, 6);
    expect(res.body.afterCo2Kg).toBeCloseTo(D2 * 0.21, 6);
  });

  it('rejects an adoption percentage above 100', async () => {
    await request(app).get('/api/reports/ev-simulation?adoptionPct=120').expect(400);
  });

  it('groups emissions by city', async () => {
    const res = await request(app).get('/api/reports/by-group?column=city').expect(200);

    expect(res.body.column).toBe('city');
    expect(res.body.data.map((g: { key: string }) => g.key)).toEqual(['Pune', 'Delhi']);
  });

  it('ranks stores', async () => {
    const res = await request(app).get('/api/reports/leaderboard?size=1').expect(200);

    expect(res.body.cleanest[0].key).toBe('S1');
    expect(res.body.dirtiest[0].key).toBe('S2');
  });

  it('prices the emissions', async () => {
    const res = await request(app).get('/api/reports/carbon-cost?pricePerKg=0.05').expect(200);

    expect(res.body.pricePerKg).toBe(0.05);
    expect(res.body.totalCost).toBeCloseTo((D2 + D3) * 0.21 * 0.05, 6);
  });

  it('builds a histogram', async () => {
    const res = await request(app).get('/api/reports/histogram?bins=3').expect(200);

    expect(res.body.data).toHaveLength(3);
    expect(res.body.data.map((b: { count: number }) => b.count)).toEqual([1, 1, 1]);
  });

  it('fits the emission trend', async () => {
    const res = await request(app).get('/api/reports/trend').expect(200);

    expect(res.body.trend.slope).toBeCloseTo(0.21, 6);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Routing Routes
// ═══════════════════════════════════════════════════════════════════════════════

describe('POST /api/routing/optimize', () => {
  const points = [
    { lat: 19.076, lng: 72.8777 },
    { lat: 19.1, lng: 72.9 },
  ];

  it('returns the planned route', async () => {
    mockPlanRoute.mockResolvedValueOnce({ ok: true, route: { type: 'FeatureCollection', features: [] } });

    const res = await request(app).post('/api/routing/optimize').send({ points }).expect(200);

    expect(res.body.route.type).toBe('FeatureCollection');
    expect(mockPlanRoute).toHaveBeenCalledWith(points, 'test-key');
  });

  it('maps a planner error to 502', async () => {
    mockPlanRoute.mockResolvedValueOnce({ ok: false, error: 'quota exceeded' });

    const res = await request(app).post('/api/routing/optimize').send({ points }).expect(502);

    expect(res.body.error).toBe('quota exceeded');
  });

  it('maps too few points to 400', async () => {
    mockPlanRoute.mockResolvedValueOnce({ ok: false, error: 'Need at least 2 locations for route optimization.' });

    await request(app).post('/api/routing/optimize').send({ points: points.slice(0, 1) }).expect(400);
  });

  it('is unavailable without an API key', async () => {
    const res = await request(appWith()).post('/api/routing/optimize').send({ points }).expect(503);

    expect(res.body.error).toBe('routing service is not configured');
    expect(mockPlanRoute).not.toHaveBeenCalled();
  });
});
