import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { SweepResult } from '../../../src/services/JobRetentionService.js';
import { JanitorScheduler, type RetentionSweeper } from '../../../src/scheduler/JanitorScheduler.js';

const cronMock = vi.hoisted(() => {
  const task = { stop: vi.fn() };
  return { task, schedule: vi.fn(() => task) };
});

vi.mock('node-cron', () => ({ default: { schedule: cronMock.schedule } }));

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

function retentionWith(sweep: () => Promise<SweepResult>): RetentionSweeper {
  return { sweep };
}

describe('JanitorScheduler', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('schedules a sweep every N minutes', () => {
    const scheduler = new JanitorScheduler(retentionWith(async () => ({ reaped: 0, evicted: 0 })), 5);
    scheduler.start();
    scheduler.start();

    expect(cronMock.schedule).toHaveBeenCalledTimes(1);
    expect(cronMock.schedule).toHaveBeenCalledWith('*/5 * * * *', expect.any(Function));

    scheduler.stop();
    expect(cronMock.task.stop).toHaveBeenCalledTimes(1);
  });

  it('refuses an interval cron cannot express', () => {
    const scheduler = new JanitorScheduler(retentionWith(async () => ({ reaped: 0, evicted: 0 })), 90);
    scheduler.start();
    expect(cronMock.schedule).not.toHaveBeenCalled();
  });

  it('skips a tick while the previous sweep is still running', async () => {
    let release: () => void = () => undefined;
    const sweep = vi.fn(
      () =>
        new Promise<SweepResult>((resolve) => {
          release = () => resolve({ reaped: 0, evicted: 0 });
        })
    );
    const scheduler = new JanitorScheduler(retentionWith(sweep), 5);

    const first = scheduler.runSweep();
    await scheduler.runSweep();
    release();
    await first;

    expect(sweep).toHaveBeenCalledTimes(1);
    expect(loggerMock.logger.info).toHaveBeenCalledWith(
      'Janitor sweep skipped - previous sweep still running'
    );
  });

  it('logs a failed sweep instead of throwing', async () => {
    const scheduler = new JanitorScheduler(
      retentionWith(async () => {
        throw new Error('disk gone');
      }),
      5
    );

    await expect(scheduler.runSweep()).resolves.toBeUndefined();
    expect(loggerMock.logger.error).toHaveBeenCalledWith('Janitor sweep failed', {
      error: 'disk gone',
    });
  });
});
