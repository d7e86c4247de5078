import type { Job, JobStatus, ProgressState } from '../../domain/entities/Job.js';
import { isTerminal } from '../../domain/entities/Job.js';
import type { WorkerProcess } from '../process/WorkerProcess.js';

/**
 * In-memory state of one job. `process` is non-null while a worker handle is
 * attached; it is released once the job is terminal and the worker has exited.
 */
export interface JobRecord extends Job {
  output: string[];
  process: WorkerProcess | null;
}

export type ProgressPatch = Pick<ProgressState, 'progress' | 'stage' | 'estimated'>;

export interface FinishParams {
  status: Exclude<JobStatus, 'running'>;
  error?: string | null;
  exitCode?: number | null;
  now?: Date;
}

function cloneJob(record: JobRecord): Job {
  return {
    id: record.id,
    status: record.status,
    metadata: { ...record.metadata, command: [...record.metadata.command] },
    progress: { ...record.progress },
    error: record.error,
    exitCode: record.exitCode,
  };
}

/**
 * JobRecordStore - owns every job's state behind atomic operations.
 *
 * All methods are synchronous and never await, so each call runs to completion
 * on the event loop before any collector, request handler or sweep can observe
 * the store. Callers perform I/O outside these calls and apply results back.
 * Reads return copies; the live record never leaves the store.
 */
export class JobRecordStore {
  private records = new Map<string, JobRecord>();

  create(job: Job, process: WorkerProcess): Job {
    if (this.records.has(job.id)) {
      throw new Error(`Job ${job.id} already exists`);
    }
    this.records.set(job.id, { ...job, output: [], process });
    return this.get(job.id) ?? job;
  }

  has(jobId: string): boolean {
    return this.records.has(jobId);
  }

  get(jobId: string): Job | null {
    const record = this.records.get(jobId);
    return record ? cloneJob(record) : null;
  }

  list(): Job[] {
    return [...this.records.values()].map(cloneJob);
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Appends one output line and returns its zero-based index, or null for an unknown job
   */
  appendOutput(jobId: string, line: string): number | null {
    const record = this.records.get(jobId);
    if (!record) return null;
    record.output.push(line);
    return record.output.length - 1;
  }

  /**
   * Returns a copy of the output log, optionally only the last `tail` lines
   */
  getOutput(jobId: string, tail?: number): string[] | null {
    const record = this.records.get(jobId);
    if (!record) return null;
    return tail === undefined ? [...record.output] : record.output.slice(-tail);
  }

  outputLength(jobId: string): number {
    return this.records.get(jobId)?.output.length ?? 0;
  }

  /**
   * Applies a progress update while the job is running.
   * Progress never decreases and lastUpdate never moves backward.
   */
  updateProgress(jobId: string, patch: ProgressPatch, now: Date = new Date()): Job | null {
    const record = this.records.get(jobId);
    if (!record || record.status !== 'running') return null;

    const lastUpdate =
      now.getTime() >= record.progress.lastUpdate.getTime() ? now : record.progress.lastUpdate;
    record.progress = {
      ...record.progress,
      progress: Math.max(record.progress.progress, Math.min(100, patch.progress)),
      stage: patch.stage,
      estimated: patch.estimated,
      lastUpdate,
    };
    return cloneJob(record);
  }

  /**
   * Moves a running job to a terminal status. Returns null when the job is
   * unknown or already terminal, so the first caller wins any race.
   */
  finish(jobId: string, params: FinishParams): Job | null {
    const record = this.records.get(jobId);
    if (!record || isTerminal(record.status)) return null;

    const now = params.now ?? new Date();
    record.status = params.status;
    record.error = params.error ?? null;
    record.exitCode = params.exitCode ?? null;
    record.progress = {
      ...record.progress,
      lastUpdate: now,
      completedAt: now,
      ...(params.status === 'completed'
        ? { progress: 100, stage: 'completed', estimated: false }
        : {}),
    };
    return cloneJob(record);
  }

  getProcess(jobId: string): WorkerProcess | null {
    return this.records.get(jobId)?.process ?? null;
  }

  /**
   * Drops the worker handle once the job is terminal
   */
  releaseProcess(jobId: string): boolean {
    const record = this.records.get(jobId);
    if (!record || !record.process || !isTerminal(record.status)) return false;
    record.process = null;
    return true;
  }

  delete(jobId: string): Job | null {
    const record = this.records.get(jobId);
    if (!record) return null;
    this.records.delete(jobId);
    return cloneJob(record);
  }

  /**
   * Terminal jobs whose completedAt is strictly before the cutoff
   */
  listCompletedBefore(cutoff: Date): Job[] {
    const expired: Job[] = [];
    for (const record of this.records.values()) {
      const completedAt = record.progress.completedAt;
      if (isTerminal(record.status) && completedAt && completedAt.getTime() < cutoff.getTime()) {
        expired.push(cloneJob(record));
      }
    }
    return expired;
  }
}
