import { randomUUID } from 'node:crypto';
import { mkdir, rm, stat } from 'node:fs/promises';
import path from 'node:path';
import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { NotFoundError, ValidationError } from '../domain/errors.js';
import type { Env } from '../infra/env.js';
import { logger } from '../infra/logger.js';
import type { JobQueryService } from '../services/JobQueryService.js';
import type { ProcessSupervisor } from '../services/ProcessSupervisor.js';
import { mapCancelToResponse, mapProgressToResponse, mapSummaryToResponse } from './jobMapper.js';
import { buildWorkerCommand } from './workerCommand.js';

const PARAM_KEY = /^[A-Za-z_][A-Za-z0-9_.]*$/;

const spawnBodySchema = z.object({
  inputPath: z.string().min(1, { message: 'inputPath is required' }),
  params: z
    .record(
      z.string().regex(PARAM_KEY, { message: 'Parameter names must be identifiers' }),
      z.union([z.string(), z.number(), z.boolean()])
    )
    .optional(),
});

const downloadQuerySchema = z.object({
  filename: z.string().min(1).optional(),
});

function isMissingFile(error: Error): boolean {
  return 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR');
}

async function assertInputFile(inputPath: string): Promise<void> {
  try {
    const info = await stat(inputPath);
    if (info.isFile()) return;
  } catch (error) {
    logger.debug('Input file lookup failed', { inputPath, error });
  }
  throw new ValidationError('Input file not found', { inputPath });
}

export type JobRouterEnv = Pick<
  Env,
  'WORKER_COMMAND' | 'WORKER_CWD' | 'OUTPUT_ROOT' | 'DOWNLOAD_PREFERRED_EXTENSION'
>;

/**
 * Jobs route handler
 * HTTP layer only: validation and response shaping, the services do the work
 */
export function createJobRouter(deps: {
  supervisor: ProcessSupervisor;
  queries: JobQueryService;
  env: JobRouterEnv;
}): Router {
  const { supervisor, queries, env } = deps;
  const router = Router();

  /**
   * POST /api/jobs
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    let outputDir: string | null = null;
    try {
      const parsed = spawnBodySchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError('Invalid job request', parsed.error.flatten());
      }
      const inputPath = path.resolve(parsed.data.inputPath);
      await assertInputFile(inputPath);

      outputDir = path.resolve(env.OUTPUT_ROOT, randomUUID());
      await mkdir(outputDir, { recursive: true });

      const command = buildWorkerCommand(env.WORKER_COMMAND, {
        inputPath,
        outputDir,
        params: parsed.data.params,
      });
      const jobId = await supervisor.spawn({
        command,
        workDir: env.WORKER_CWD ?? process.cwd(),
        inputPath,
        outputDir,
        params: parsed.data.params ?? null,
      });

      res.status(201).json({ jobId, status: 'running' });
    } catch (error) {
      if (outputDir) {
        await rm(outputDir, { recursive: true, force: true }).catch((cleanupError: unknown) => {
          logger.warn('Failed to remove output directory', { outputDir, error: cleanupError });
        });
      }
      next(error);
    }
  });

  /**
   * GET /api/jobs
   */
  router.get('/', (_req: Request, res: Response, next: NextFunction) => {
    try {
      const jobs = queries.listJobs();
      res.json({ jobs: jobs.map(mapSummaryToResponse), total: jobs.length });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/jobs/:jobId
   */
  router.get('/:jobId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await queries.status(req.params.jobId));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/jobs/:jobId/progress
   */
  router.get('/:jobId/progress', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const view = await queries.progress(req.params.jobId);
      res.json(mapProgressToResponse(view));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/jobs/:jobId/files
   */
  router.get('/:jobId/files', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { jobId } = req.params;
      const files = await queries.listOutputFiles(jobId);
      res.json({ jobId, files });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/jobs/:jobId/download?filename=
   */
  router.get('/:jobId/download', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = downloadQuerySchema.safeParse(req.query);
      if (!query.success) {
        throw new ValidationError('Invalid download request', query.error.flatten());
      }
      const target = await queries.downloadTarget(req.params.jobId, {
        fileName: query.data.filename,
        preferredExtension: env.DOWNLOAD_PREFERRED_EXTENSION,
      });

      res.download(target.filePath, target.fileName, (error) => {
        if (!error) return;
        if (res.headersSent) {
          logger.warn('Download interrupted', { jobId: req.params.jobId, error });
          return;
        }
        next(isMissingFile(error) ? new NotFoundError('Output file', target.fileName) : error);
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/jobs/:jobId/output
   */
  router.get('/:jobId/output', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(queries.output(req.params.jobId));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/jobs/:jobId/debug
   */
  router.get('/:jobId/debug', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await queries.debug(req.params.jobId));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/jobs/:jobId/cancel
   */
  router.post('/:jobId/cancel', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { jobId } = req.params;
      const result = await supervisor.cancel(jobId);
      res.json(mapCancelToResponse(jobId, result));
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/jobs/:jobId
   */
  router.delete('/:jobId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await supervisor.delete(req.params.jobId);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
