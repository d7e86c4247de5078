import dotenv from 'dotenv';
import { createApp } from './app.js';
import { loadStageTable } from './domain/progress/StageTable.js';
import { CacheFacade } from './infra/cache/CacheFacade.js';
import { RedisCacheClient } from './infra/cache/RedisCacheClient.js';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { FsOutputFileLister } from './infra/OutputFileLister.js';
import { ChildProcessLauncher } from './infra/process/ChildProcessLauncher.js';
import { JobRecordStore } from './infra/repositories/JobRecordStore.js';
import { startJanitor } from './scheduler/JanitorScheduler.js';
import { EventStreamer } from './services/EventStreamer.js';
import { JobEventBus } from './services/JobEventBus.js';
import { JobQueryService } from './services/JobQueryService.js';
import { JobRetentionService } from './services/JobRetentionService.js';
import { ProcessSupervisor } from './services/ProcessSupervisor.js';
import { DEFAULT_PROGRESS_TUNING } from './services/ProgressEstimator.js';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

// Initialize logger
const loggerInstance = createLogger(env);
setLogger(loggerInstance);

const stageTable = loadStageTable(env.STAGE_TABLE_PATH);

// Optional Redis mirror; the probe decides whether it stays on
const cache = new CacheFacade(
  env.REDIS_URL
    ? new RedisCacheClient({ url: env.REDIS_URL, connectTimeoutMs: env.REDIS_CONNECT_TIMEOUT_MS })
    : null,
  {
    progressSeconds: env.PROGRESS_CACHE_TTL_SECONDS,
    metadataSeconds: env.PROGRESS_CACHE_TTL_SECONDS,
    filesSeconds: env.FILES_CACHE_TTL_SECONDS,
  }
);
await cache.initialize();

const store = new JobRecordStore();
const bus = new JobEventBus();
const supervisor = new ProcessSupervisor(store, new ChildProcessLauncher(env.WORKER_ENV), cache, bus, {
  stageTable,
  tuning: {
    ...DEFAULT_PROGRESS_TUNING,
    quiescenceMs: env.PROGRESS_QUIESCENCE_MS,
    assumedTotalMs: env.PROGRESS_ASSUMED_TOTAL_MS,
  },
  cancelGraceMs: env.CANCEL_GRACE_MS,
});
const queries = new JobQueryService(store, cache, new FsOutputFileLister());
const streamer = new EventStreamer(store, bus);
const retention = new JobRetentionService(
  store,
  cache,
  supervisor,
  env.JOB_RETENTION_MINUTES * 60_000
);

const app = createApp({ supervisor, queries, streamer, env });

// Start server
const server = app.listen(env.PORT, () => {
  loggerInstance.info('Server started', {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    cache: cache.isActive ? 'active' : 'disabled',
  });
});

const janitor = startJanitor(retention, env.JANITOR_INTERVAL_MINUTES);

// Graceful shutdown
let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  loggerInstance.info(`${signal} received, shutting down gracefully`);

  janitor.stop();
  server.close(() => {
    loggerInstance.info('Server closed');
  });
  await supervisor.shutdown();
  await cache.close();
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        loggerInstance.error('Shutdown failed', { error });
        process.exit(1);
      }
    );
  });
}

export { app };
