import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { JobStreamEvent } from '../domain/entities/JobEvent.js';
import { logger } from '../infra/logger.js';
import type { EventStreamer } from '../services/EventStreamer.js';
import { formatSseFrame } from './jobMapper.js';

const HEARTBEAT_MS = 30_000;

/**
 * GET /api/jobs/:jobId/stream - replayed output followed by live events.
 * The response ends after the job's terminal event or when the client leaves.
 */
export function createJobEventsRouter(streamer: EventStreamer): Router {
  const router = Router();

  router.get('/:jobId/stream', async (req: Request, res: Response, next: NextFunction) => {
    const { jobId } = req.params;
    const disconnect = new AbortController();

    let events: AsyncIterableIterator<JobStreamEvent>;
    try {
      events = streamer.streamEvents(jobId, disconnect.signal);
    } catch (error) {
      next(error);
      return;
    }

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    res.write('event: ready\n');
    res.write(`data: ${JSON.stringify({ jobId })}\n\n`);

    const heartbeat = setInterval(() => {
      res.write(': keep-alive\n\n');
    }, HEARTBEAT_MS);

    res.on('close', () => {
      clearInterval(heartbeat);
      disconnect.abort();
    });

    try {
      for await (const event of events) {
        res.write(formatSseFrame(event));
      }
    } catch (error) {
      logger.error('Event stream failed', { jobId, error });
    } finally {
      clearInterval(heartbeat);
      if (!res.writableEnded) res.end();
    }
  });

  return router;
}
