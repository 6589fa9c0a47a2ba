import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import {
  emissionsHistogram,
  estimateCarbonCost,
  evSuitabilityBreakdown,
  fitEmissionTrend,
  groupEmissionsBy,
  simulateEvAdoption,
  storeLeaderboard,
  summarizeEmissions,
} from '@trip-carbon/domain';
import { analysisOptionsSchema } from '../services/analysis/analysis.service.js';
import type { AnalysisService } from '../services/analysis/analysis.service.js';

const evSimulationSchema = analysisOptionsSchema.extend({
  adoptionPct: z.coerce.number().min(0).max(100).default(50),
});

const groupSchema = analysisOptionsSchema.extend({
  column: z.string().min(1).default('city'),
});

const leaderboardSchema = analysisOptionsSchema.extend({
  column: z.string().min(1).default('store_id'),
  size: z.coerce.number().int().min(1).max(50).default(5),
});

const carbonCostSchema = analysisOptionsSchema.extend({
  pricePerKg: z.coerce.number().nonnegative().default(0.02),
});

const histogramSchema = analysisOptionsSchema.extend({
  bins: z.coerce.number().int().min(1).max(200).default(40),
});

export function createReportsRouter(analysis: AnalysisService): Router {
  const router = Router();

  /** GET /api/reports/summary */
  router.get('/summary', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { trips } = await analysis.analyzeDataset(analysisOptionsSchema.parse(req.query));
      res.json(summarizeEmissions(trips));
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/reports/ev-breakdown */
  router.get('/ev-breakdown', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { trips } = await analysis.analyzeDataset(analysisOptionsSchema.parse(req.query));
      res.json(evSuitabilityBreakdown(trips));
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/reports/ev-simulation */
  router.get('/ev-simulation', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { adoptionPct, ...opts } = evSimulationSchema.parse(req.query);
      const { trips } = await analysis.analyzeDataset(opts);
      res.json(simulateEvAdoption(trips, adoptionPct));
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/reports/by-group — CO2 per value of a pass-through column */
  router.get('/by-group', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { column, ...opts } = groupSchema.parse(req.query);
      const { trips } = await analysis.analyzeDataset(opts);
      res.json({ column, data: groupEmissionsBy(trips, column) });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/reports/leaderboard */
  router.get('/leaderboard', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { column, size, ...opts } = leaderboardSchema.parse(req.query);
      const { trips } = await analysis.analyzeDataset(opts);
      res.json(storeLeaderboard(trips, { column, size }));
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/reports/carbon-cost */
  router.get('/carbon-cost', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { pricePerKg, ...opts } = carbonCostSchema.parse(req.query);
      const { trips } = await analysis.analyzeDataset(opts);
      res.json({ pricePerKg, totalCost: estimateCarbonCost(trips, pricePerKg) });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/reports/histogram */
  router.get('/histogram', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { bins, ...opts } = histogramSchema.parse(req.query);
      const { trips } = await analysis.analyzeDataset(opts);
      res.json({ data: emissionsHistogram(trips, bins) });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/reports/trend */
  router.get('/trend', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { trips } = await analysis.analyzeDataset(analysisOptionsSchema.parse(req.query));
      res.json({ trend: fitEmissionTrend(trips) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
