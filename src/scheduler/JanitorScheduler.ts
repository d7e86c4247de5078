import cron, { type ScheduledTask } from 'node-cron';
import { logger } from '../infra/logger.js';
import type { JobRetentionService } from '../services/JobRetentionService.js';

export type RetentionSweeper = Pick<JobRetentionService, 'sweep'>;

/**
 * JanitorScheduler - runs the retention sweep every N minutes using node-cron
 */
export class JanitorScheduler {
  private task: ScheduledTask | null = null;
  private running = false;

  constructor(
    private retentionService: RetentionSweeper,
    private intervalMinutes: number
  ) {}

  start(): void {
    if (this.task) return;

    if (this.intervalMinutes < 1 || this.intervalMinutes > 59) {
      logger.warn('Janitor interval must be between 1 and 59 minutes, skipping scheduler', {
        intervalMinutes: this.intervalMinutes,
      });
      return;
    }

    const cronExpression = `*/${this.intervalMinutes} * * * *`;
    this.task = cron.schedule(cronExpression, async () => {
      await this.runSweep();
    });

    logger.info('JanitorScheduler started', {
      intervalMinutes: this.intervalMinutes,
      cronExpression,
    });
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('JanitorScheduler stopped');
    }
  }

  /**
   * One sweep; overlapping ticks are skipped
   */
  async runSweep(): Promise<void> {
    if (this.running) {
      logger.info('Janitor sweep skipped - previous sweep still running');
      return;
    }

    this.running = true;
    try {
      await this.retentionService.sweep();
    } catch (error) {
      logger.error('Janitor sweep failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.running = false;
    }
  }
}

/**
 * Factory function to create and start the scheduler
 */
export function startJanitor(
  retentionService: RetentionSweeper,
  intervalMinutes: number
): JanitorScheduler {
  const scheduler = new JanitorScheduler(retentionService, intervalMinutes);
  scheduler.start();
  return scheduler;
}
