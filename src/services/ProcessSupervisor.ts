import { randomUUID } from 'node:crypto';
import type { Job, JobStatus } from '../domain/entities/Job.js';
import { createJob } from '../domain/entities/Job.js';
import {
  JOB_DELETED_MESSAGE,
  createErrorEvent,
  createOutputEvent,
  createTerminalEvent,
} from '../domain/entities/JobEvent.js';
import { LaunchError, NotFoundError, isAppError } from '../domain/errors.js';
import type { StageTable } from '../domain/progress/StageTable.js';
import type { CacheFacade } from '../infra/cache/CacheFacade.js';
import { logger } from '../infra/logger.js';
import type { WorkerExit, WorkerLauncher, WorkerProcess } from '../infra/process/WorkerProcess.js';
import type { FinishParams, JobRecordStore } from '../infra/repositories/JobRecordStore.js';
import type { JobEventBus } from './JobEventBus.js';
import { DEFAULT_PROGRESS_TUNING, estimateProgress, type ProgressTuning } from './ProgressEstimator.js';

export const MONITORING_ERROR_MESSAGE = 'Job monitoring error';

export interface SpawnRequest {
  command: string[];
  workDir: string;
  inputPath?: string | null;
  outputDir?: string | null;
  params?: Record<string, unknown> | null;
}

export type CancelResult =
  | { result: 'cancelled'; forced: boolean; progress: number; stage: string }
  | { result: 'alreadyFinished'; status: JobStatus; progress: number; stage: string };

export interface ProcessSupervisorOptions {
  stageTable: StageTable;
  tuning?: ProgressTuning;
  /** Time between SIGTERM and SIGKILL on cancel */
  cancelGraceMs?: number;
  now?: () => Date;
}

/**
 * Resolves true once the worker has exited, false if the timeout elapses first
 */
function waitForExit(worker: WorkerProcess, timeoutMs: number): Promise<boolean> {
  if (worker.hasExited()) {
    return Promise.resolve(true);
  }
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), timeoutMs);
    void worker.exited.then(() => {
      clearTimeout(timer);
      resolve(true);
    });
  });
}

function describeExit(exit: WorkerExit): FinishParams {
  if (exit.code === 0) {
    return { status: 'completed', exitCode: 0 };
  }
  if (exit.code !== null) {
    return { status: 'failed', exitCode: exit.code, error: `Worker exited with code ${exit.code}` };
  }
  return { status: 'failed', error: `Worker terminated by signal ${exit.signal ?? 'unknown'}` };
}

/**
 * ProcessSupervisor - launches workers and owns their lifecycle.
 *
 * Each job gets one collector task: the only reader of the worker's output.
 * It appends to the job's log, feeds the progress estimator, publishes stream
 * events and finalizes the job when the worker exits.
 */
export class ProcessSupervisor {
  private collectors = new Map<string, Promise<void>>();
  private pendingWrites = new Set<Promise<boolean>>();
  private readonly tuning: ProgressTuning;
  private readonly cancelGraceMs: number;
  private readonly now: () => Date;

  constructor(
    private store: JobRecordStore,
    private launcher: WorkerLauncher,
    private cache: CacheFacade,
    private bus: JobEventBus,
    private options: ProcessSupervisorOptions
  ) {
    this.tuning = options.tuning ?? DEFAULT_PROGRESS_TUNING;
    this.cancelGraceMs = options.cancelGraceMs ?? 5000;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Starts a worker and begins collecting its output.
   * Throws LaunchError without creating a job when the worker cannot start.
   */
  async spawn(request: SpawnRequest): Promise<string> {
    let worker: WorkerProcess;
    try {
      worker = await this.launcher.launch(request.command, request.workDir);
    } catch (error) {
      logger.error('Worker launch failed', { command: request.command[0], error });
      if (isAppError(error)) throw error;
      throw new LaunchError('Failed to start worker', {
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    const job = createJob({
      id: randomUUID(),
      command: request.command,
      workDir: request.workDir,
      inputPath: request.inputPath,
      outputDir: request.outputDir,
      params: request.params,
      now: this.now(),
    });
    this.store.create(job, worker);
    logger.info('Job started', { jobId: job.id, pid: worker.pid, executable: request.command[0] });

    this.track(this.cache.mirrorMetadata(job));
    this.track(this.cache.mirrorProgress(job));

    const collector = this.collect(job.id, worker).finally(() => {
      this.collectors.delete(job.id);
    });
    this.collectors.set(job.id, collector);
    return job.id;
  }

  /**
   * Terminates a running job: SIGTERM, then SIGKILL after the grace period.
   */
  async cancel(jobId: string): Promise<CancelResult> {
    const current = this.store.get(jobId);
    if (!current) {
      throw new NotFoundError('Job', jobId);
    }

    const cancelled = this.finish(jobId, { status: 'cancelled' });
    if (!cancelled) {
      const latest = this.store.get(jobId) ?? current;
      return {
        result: 'alreadyFinished',
        status: latest.status,
        progress: latest.progress.progress,
        stage: latest.progress.stage,
      };
    }

    const worker = this.store.getProcess(jobId);
    const forced = worker ? await this.terminate(worker) : false;
    this.store.releaseProcess(jobId);
    logger.info('Job cancelled', { jobId, forced });

    return {
      result: 'cancelled',
      forced,
      progress: cancelled.progress.progress,
      stage: cancelled.progress.stage,
    };
  }

  /**
   * Removes a job from memory and cache, killing its worker if still alive.
   * Unknown ids are a no-op.
   */
  async delete(jobId: string): Promise<void> {
    const worker = this.store.getProcess(jobId);
    const removed = this.store.delete(jobId);

    if (worker && !worker.hasExited()) {
      worker.signal('SIGKILL');
    }
    if (removed) {
      this.bus.emitJob(createErrorEvent(jobId, JOB_DELETED_MESSAGE, removed.progress));
      logger.info('Job deleted', { jobId, status: removed.status });
    }

    await this.cache.forgetJob(jobId);
  }

  /**
   * Resolves when the job's collector has finished draining and finalizing
   */
  async waitForCompletion(jobId: string): Promise<void> {
    await this.collectors.get(jobId);
  }

  isCollecting(jobId: string): boolean {
    return this.collectors.has(jobId);
  }

  /**
   * Finalizes running jobs whose worker is gone and whose collector is no
   * longer active, and releases handles of terminal jobs whose worker exited.
   */
  reapOrphans(): number {
    let reaped = 0;
    for (const job of this.store.list()) {
      const worker = this.store.getProcess(job.id);

      if (job.status !== 'running') {
        if (worker?.hasExited()) this.store.releaseProcess(job.id);
        continue;
      }

      const orphaned = !worker || (worker.hasExited() && !this.collectors.has(job.id));
      if (!orphaned) continue;

      if (this.finish(job.id, { status: 'failed', error: 'Worker exited without finalization' })) {
        this.store.releaseProcess(job.id);
        logger.warn('Reaped orphaned job', { jobId: job.id });
        reaped += 1;
      }
    }
    return reaped;
  }

  /**
   * Cancels every running job and waits for collectors and cache writes
   */
  async shutdown(): Promise<void> {
    const running = this.store.list().filter((job) => job.status === 'running');
    if (running.length > 0) {
      logger.info('Terminating running jobs', { count: running.length });
    }
    await Promise.all(running.map((job) => this.cancel(job.id)));
    await Promise.all([...this.collectors.values()]);
    await this.flush();
  }

  /**
   * Waits for in-flight cache mirror writes
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pendingWrites]);
  }

  private async collect(jobId: string, worker: WorkerProcess): Promise<void> {
    try {
      for await (const line of worker.output) {
        this.handleLine(jobId, line);
      }
      const exit = await worker.exited;
      const finished = this.finish(jobId, describeExit(exit));
      if (finished) {
        logger.info('Job finished', {
          jobId,
          status: finished.status,
          exitCode: exit.code,
          signal: exit.signal,
        });
      }
    } catch (error) {
      logger.error('Job monitoring failed', { jobId, error });
      this.finish(jobId, { status: 'failed', error: MONITORING_ERROR_MESSAGE });
      worker.signal('SIGKILL');
    } finally {
      if (worker.hasExited()) {
        this.store.releaseProcess(jobId);
      }
    }
  }

  private handleLine(jobId: string, line: string): void {
    if (this.store.appendOutput(jobId, line) === null) {
      return;
    }
    let job = this.store.get(jobId);
    if (!job) return;

    if (job.status === 'running') {
      const now = this.now();
      const estimate = estimateProgress(
        line,
        {
          progress: job.progress.progress,
          stage: job.progress.stage,
          lastUpdate: job.progress.lastUpdate.getTime(),
        },
        {
          now: now.getTime(),
          startedAt: job.metadata.createdAt.getTime(),
          table: this.options.stageTable,
          tuning: this.tuning,
        }
      );
      if (estimate) {
        const updated = this.store.updateProgress(jobId, estimate, now);
        if (updated) {
          job = updated;
          this.track(this.cache.mirrorProgress(updated));
        }
      }
    }

    this.bus.emitJob(createOutputEvent(job, line));
  }

  /**
   * Applies a terminal transition; the first caller wins.
   * Mirrors the final state and publishes the closing stream event.
   */
  private finish(jobId: string, params: FinishParams): Job | null {
    const job = this.store.finish(jobId, { ...params, now: params.now ?? this.now() });
    if (!job) return null;

    this.track(this.cache.mirrorProgress(job));
    const event = createTerminalEvent(job);
    if (event) this.bus.emitJob(event);
    return job;
  }

  private async terminate(worker: WorkerProcess): Promise<boolean> {
    worker.signal('SIGTERM');
    if (await waitForExit(worker, this.cancelGraceMs)) {
      return false;
    }
    worker.signal('SIGKILL');
    await waitForExit(worker, this.cancelGraceMs);
    return true;
  }

  private track(write: Promise<boolean>): void {
    this.pendingWrites.add(write);
    void write.finally(() => {
      this.pendingWrites.delete(write);
    });
  }
}
