/**
 * JobStreamEvent - one entry of a job's live event sequence
 */
import type { Job } from './Job.js';

export type JobStreamEventType = 'output' | 'completed' | 'failed' | 'cancelled' | 'error';

export interface JobStreamEvent {
  type: JobStreamEventType;
  jobId: string;
  data: string;
  progress: number;
  stage: string;
}

export const JOB_DELETED_MESSAGE = 'Job deleted';

export function isTerminalEvent(event: JobStreamEvent): boolean {
  return event.type !== 'output';
}

export function createOutputEvent(job: Job, line: string): JobStreamEvent {
  return {
    type: 'output',
    jobId: job.id,
    data: line,
    progress: job.progress.progress,
    stage: job.progress.stage,
  };
}

/**
 * Builds the closing event for a job that has reached a terminal status.
 * Returns null while the job is still running.
 */
export function createTerminalEvent(job: Job): JobStreamEvent | null {
  const base = {
    jobId: job.id,
    progress: job.progress.progress,
    stage: job.progress.stage,
  };

  switch (job.status) {
    case 'running':
      return null;
    case 'completed':
      return { ...base, type: 'completed', data: 'Job completed' };
    case 'cancelled':
      return { ...base, type: 'cancelled', data: 'Job cancelled' };
    case 'failed':
      return { ...base, type: 'failed', data: job.error ?? 'Job failed' };
  }
}

/**
 * Builds the closing event for a stream that ends without a terminal status,
 * carrying the job's last known progress when there is one.
 */
export function createErrorEvent(
  jobId: string,
  message: string,
  last: { progress: number; stage: string } = { progress: 0, stage: 'error' }
): JobStreamEvent {
  return { type: 'error', jobId, data: message, progress: last.progress, stage: last.stage };
}
