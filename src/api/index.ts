import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { createJobRouter, type JobRouterEnv } from './jobRoutes.js';
import { createJobEventsRouter } from './jobEventsRoutes.js';
import type { EventStreamer } from '../services/EventStreamer.js';
import type { JobQueryService } from '../services/JobQueryService.js';
import type { ProcessSupervisor } from '../services/ProcessSupervisor.js';

/**
 * Main API router - composes all route handlers
 * Dependencies are injected from server.ts
 */
export function createApiRouter(deps: {
  supervisor: ProcessSupervisor;
  queries: JobQueryService;
  streamer: EventStreamer;
  env: JobRouterEnv;
}): Router {
  const router = Router();

  router.use('/jobs', createJobEventsRouter(deps.streamer));
  router.use(
    '/jobs',
    createJobRouter({ supervisor: deps.supervisor, queries: deps.queries, env: deps.env })
  );

  /**
   * GET /api/cache
   */
  router.get('/cache', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await deps.queries.cacheStatus());
    } catch (error) {
      next(error);
    }
  });

  return router;
}
