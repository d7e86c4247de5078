import type { Job } from '../domain/entities/Job.js';
import type { JobStreamEvent } from '../domain/entities/JobEvent.js';
import {
  JOB_DELETED_MESSAGE,
  createErrorEvent,
  createTerminalEvent,
  isTerminalEvent,
} from '../domain/entities/JobEvent.js';
import { NotFoundError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { JobRecordStore } from '../infra/repositories/JobRecordStore.js';
import { AsyncQueue } from '../utils/AsyncQueue.js';
import type { JobEventBus } from './JobEventBus.js';

/**
 * The log keeps lines only, so replayed lines carry the job's progress and
 * stage at subscription time rather than at the time each line was written.
 */
function replayEvent(job: Job, line: string): JobStreamEvent {
  return {
    type: 'output',
    jobId: job.id,
    data: line,
    progress: job.progress.progress,
    stage: job.progress.stage,
  };
}

/**
 * EventStreamer - live event sequences for any number of subscribers.
 *
 * A subscriber first replays the job's output log, then follows the bus.
 * Snapshot and subscription happen in the same synchronous step, so nothing is
 * missed or repeated. Stopping iteration early only unsubscribes; the worker
 * is unaffected.
 */
export class EventStreamer {
  constructor(
    private store: JobRecordStore,
    private bus: JobEventBus
  ) {}

  /**
   * Throws NotFoundError immediately for a job that is not in memory.
   * Aborting `signal` ends the sequence even while it is waiting for output.
   */
  streamEvents(jobId: string, signal?: AbortSignal): AsyncIterableIterator<JobStreamEvent> {
    if (!this.store.has(jobId)) {
      throw new NotFoundError('Job', jobId);
    }
    return this.follow(jobId, signal);
  }

  private async *follow(
    jobId: string,
    signal?: AbortSignal
  ): AsyncGenerator<JobStreamEvent, void, undefined> {
    if (signal?.aborted) return;

    const queue = new AsyncQueue<JobStreamEvent>();
    const onAbort = () => {
      void queue.return();
    };
    const listener = (event: JobStreamEvent) => {
      queue.push(event);
      if (isTerminalEvent(event)) queue.close();
    };

    const job = this.store.get(jobId);
    const backlog = this.store.getOutput(jobId);
    if (!job || !backlog) {
      // removed between streamEvents() and the first read
      yield createErrorEvent(jobId, JOB_DELETED_MESSAGE);
      return;
    }

    const closing = createTerminalEvent(job);
    if (!closing) {
      this.bus.onJob(jobId, listener);
    }
    signal?.addEventListener('abort', onAbort, { once: true });
    logger.debug('Stream subscriber attached', { jobId, replay: backlog.length });

    try {
      for (const line of backlog) {
        if (signal?.aborted) return;
        yield replayEvent(job, line);
      }
      if (closing) {
        yield closing;
        return;
      }
      for await (const event of queue) {
        yield event;
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.bus.offJob(jobId, listener);
      queue.close();
      logger.debug('Stream subscriber detached', { jobId });
    }
  }
}
