import express from 'express';
import type { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { createApiRouter } from './api/index.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';
import type { JobRouterEnv } from './api/jobRoutes.js';
import type { Env } from './infra/env.js';
import { logger } from './infra/logger.js';
import type { EventStreamer } from './services/EventStreamer.js';
import type { JobQueryService } from './services/JobQueryService.js';
import type { ProcessSupervisor } from './services/ProcessSupervisor.js';

export function createApp(deps: {
  supervisor: ProcessSupervisor;
  queries: JobQueryService;
  streamer: EventStreamer;
  env: JobRouterEnv & Pick<Env, 'NODE_ENV'>;
}): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.info('Incoming request', {
      method: req.method,
      path: req.path,
      ip: req.ip,
    });
    next();
  });

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(
    '/api',
    createApiRouter({
      supervisor: deps.supervisor,
      queries: deps.queries,
      streamer: deps.streamer,
      env: deps.env,
    })
  );

  app.use(notFoundHandler);
  app.use(createErrorHandler(deps.env));

  return app;
}
