import { beforeEach, describe, expect, it } from 'vitest';
import { createJob } from '../../../src/domain/entities/Job.js';
import { loadStageTable } from '../../../src/domain/progress/StageTable.js';
import { CacheFacade } from '../../../src/infra/cache/CacheFacade.js';
import { JobRecordStore } from '../../../src/infra/repositories/JobRecordStore.js';
import { JobEventBus } from '../../../src/services/JobEventBus.js';
import { JobRetentionService } from '../../../src/services/JobRetentionService.js';
import { ProcessSupervisor } from '../../../src/services/ProcessSupervisor.js';
import { FakeCacheClient } from '../../helpers/fakeCacheClient.js';
import { FakeLauncher, FakeWorker } from '../../helpers/fakeWorker.js';

const HOUR = 60 * 60 * 1000;
const NOW = new Date();
const ago = (ms: number) => new Date(NOW.getTime() - ms);

describe('JobRetentionService', () => {
  let store: JobRecordStore;
  let client: FakeCacheClient;
  let cache: CacheFacade;
  let retention: JobRetentionService;

  function addJob(id: string, createdAt: Date) {
    return store.create(
      createJob({ id, command: ['worker'], workDir: '/srv', now: createdAt }),
      new FakeWorker()
    );
  }

  beforeEach(async () => {
    store = new JobRecordStore();
    client = new FakeCacheClient();
    cache = new CacheFacade(client);
    await cache.initialize();
    const supervisor = new ProcessSupervisor(store, new FakeLauncher(), cache, new JobEventBus(), {
      stageTable: loadStageTable(),
    });
    retention = new JobRetentionService(store, cache, supervisor, HOUR);
  });

  it('evicts terminal jobs older than the retention window', async () => {
    const old = addJob('old', ago(3 * HOUR));
    store.finish('old', { status: 'completed', now: ago(2 * HOUR) });
    addJob('recent', ago(3 * HOUR));
    store.finish('recent', { status: 'failed', now: ago(HOUR / 2) });
    await cache.mirrorMetadata(old);

    expect(await retention.sweep(NOW)).toEqual({ reaped: 0, evicted: 1 });
    expect(store.has('old')).toBe(false);
    expect(store.has('recent')).toBe(true);
    expect(client.entries.has('metadata:old')).toBe(false);
  });

  it('never evicts a running job', async () => {
    addJob('running', ago(10 * HOUR));
    expect(await retention.sweep(NOW)).toEqual({ reaped: 0, evicted: 0 });
    expect(store.get('running')?.status).toBe('running');
  });

  it('reaps orphans before evicting', async () => {
    const worker = new FakeWorker();
    worker.finish(1);
    store.create(createJob({ id: 'orphan', command: ['worker'], workDir: '/srv', now: ago(HOUR) }), worker);

    expect(await retention.sweep(NOW)).toEqual({ reaped: 1, evicted: 0 });
    expect(store.get('orphan')?.status).toBe('failed');
  });
});
