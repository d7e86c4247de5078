import type { CacheFacade } from '../infra/cache/CacheFacade.js';
import { logger } from '../infra/logger.js';
import type { JobRecordStore } from '../infra/repositories/JobRecordStore.js';
import type { ProcessSupervisor } from './ProcessSupervisor.js';

export interface SweepResult {
  reaped: number;
  evicted: number;
}

/**
 * JobRetentionService - periodic sweep of finished jobs.
 * Running jobs are never evicted.
 */
export class JobRetentionService {
  constructor(
    private store: JobRecordStore,
    private cache: CacheFacade,
    private supervisor: ProcessSupervisor,
    private retentionMs: number
  ) {}

  async sweep(now: Date = new Date()): Promise<SweepResult> {
    const reaped = this.supervisor.reapOrphans();

    const cutoff = new Date(now.getTime() - this.retentionMs);
    const expired = this.store.listCompletedBefore(cutoff);

    if (expired.length === 0) {
      logger.debug('No expired jobs to cleanup', { cutoff: cutoff.toISOString(), reaped });
      return { reaped, evicted: 0 };
    }

    for (const job of expired) {
      this.store.delete(job.id);
    }
    await Promise.all(expired.map((job) => this.cache.forgetJob(job.id)));

    logger.info('Cleaned up expired jobs', {
      count: expired.length,
      reaped,
      cutoff: cutoff.toISOString(),
    });

    return { reaped, evicted: expired.length };
  }
}
