import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { summarizeEmissions } from '@trip-carbon/domain';
import { writeTripsCsv } from '@trip-carbon/adapters';
import { analysisOptionsSchema } from '../services/analysis/analysis.service.js';
import type { AnalysisService } from '../services/analysis/analysis.service.js';

const pageSchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

const listTripsQuerySchema = analysisOptionsSchema.merge(pageSchema);

const rawTableSchema = z.object({
  columns: z.array(z.string().min(1)).min(1),
  rows: z.array(z.record(z.union([z.string(), z.number()]))).max(100_000),
});

const analyzeBodySchema = analysisOptionsSchema.merge(pageSchema).extend({
  table: rawTableSchema,
});

export function createEmissionsRouter(analysis: AnalysisService): Router {
  const router = Router();

  /** GET /api/emissions/trips */
  router.get('/trips', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit, offset, ...opts } = listTripsQuerySchema.parse(req.query);
      const result = await analysis.analyzeDataset(opts);
      res.json({
        data: result.rows.slice(offset, offset + limit),
        columns: result.columns,
        total: result.rows.length,
        summary: summarizeEmissions(result.trips),
      });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/emissions/trips.csv */
  router.get('/trips.csv', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const opts = analysisOptionsSchema.parse(req.query);
      const result = await analysis.analyzeDataset(opts);
      res
        .type('text/csv')
        .attachment('trip_emissions.csv')
        .send(writeTripsCsv(result.rows, result.columns));
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/emissions/analyze — run the pipeline over an uploaded table */
  router.post('/analyze', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { table, limit, offset, ...opts } = analyzeBodySchema.parse(req.body);
      const result = await analysis.analyzeTable(table, opts);
      res.json({
        data: result.rows.slice(offset, offset + limit),
        columns: result.columns,
        total: result.rows.length,
        summary: summarizeEmissions(result.trips),
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
