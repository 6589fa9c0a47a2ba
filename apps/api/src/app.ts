import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { RoutePlannerPort } from '@trip-carbon/domain';
import { OpenRouteServiceRoutePlanner } from '@trip-carbon/adapters';

import { loadConfig } from './config/env.js';
import type { ApiConfig } from './config/env.js';
import { consoleLogger } from './logger.js';
import { AnalysisService } from './services/analysis/analysis.service.js';
import { createEmissionsRouter } from './controllers/emissions.controller.js';
import { createReportsRouter } from './controllers/reports.controller.js';
import { createRoutingRouter } from './controllers/routing.controller.js';
import { errorHandler } from './middleware/error-handler.js';

export interface AppDeps {
  config?: ApiConfig;
  routePlanner?: RoutePlannerPort;
}

export function buildApp(deps: AppDeps = {}): ReturnType<typeof express> {
  const config = deps.config ?? loadConfig();
  const analysis = new AnalysisService(config, config.NODE_ENV === 'test' ? undefined : consoleLogger);
  const routePlanner = deps.routePlanner ?? new OpenRouteServiceRoutePlanner({ baseUrl: config.ORS_BASE_URL });

  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: config.CORS_ORIGIN }));
  if (config.NODE_ENV !== 'test') app.use(morgan('combined'));
  app.use(express.json({ limit: '20mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/emissions', createEmissionsRouter(analysis));
  app.use('/api/reports', createReportsRouter(analysis));
  app.use('/api/routing', createRoutingRouter(routePlanner, config.ORS_API_KEY));

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', ts: new Date().toISOString() });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
