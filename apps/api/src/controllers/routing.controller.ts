import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { RoutePlannerPort } from '@trip-carbon/domain';
import { TOO_FEW_POINTS_MESSAGE } from '@trip-carbon/adapters';

const optimizeBodySchema = z.object({
  points: z
    .array(z.object({ lat: z.number().min(-90).max(90), lng: z.number().min(-180).max(180) }))
    .max(50),
});

export function createRoutingRouter(planner: RoutePlannerPort, apiKey: string | undefined): Router {
  const router = Router();

  /** POST /api/routing/optimize */
  router.post('/optimize', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { points } = optimizeBodySchema.parse(req.body);
      if (!apiKey) {
        res.status(503).json({ error: 'routing service is not configured' });
        return;
      }
      const result = await planner.planRoute(points, apiKey);
      if (result.ok) {
        res.json({ route: result.route });
        return;
      }
      console.warn('[routing] route planning failed', result.error);
      res.status(result.error === TOO_FEW_POINTS_MESSAGE ? 400 : 502).json({ error: result.error });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
