import type { JobStreamEvent } from '../domain/entities/JobEvent.js';
import type { CancelResult } from '../services/ProcessSupervisor.js';
import type { JobProgressView, JobSummary } from '../services/JobQueryService.js';

export function mapSummaryToResponse(job: JobSummary) {
  return {
    jobId: job.jobId,
    status: job.status,
    progress: job.progress,
    stage: job.stage,
    inputPath: job.inputPath,
    createdAt: job.createdAt.toISOString(),
    completedAt: job.completedAt ? job.completedAt.toISOString() : null,
    pid: job.pid,
  };
}

export function mapProgressToResponse(view: JobProgressView) {
  return {
    jobId: view.jobId,
    progress: view.progress,
    stage: view.stage,
    estimated: view.estimated,
    lastUpdate: view.lastUpdate.toISOString(),
    status: view.status,
  };
}

export function mapCancelToResponse(jobId: string, result: CancelResult) {
  if (result.result === 'alreadyFinished') {
    return {
      jobId,
      cancelled: false,
      status: result.status,
      progress: result.progress,
      stage: result.stage,
      message: `Job already ${result.status}`,
    };
  }
  return {
    jobId,
    cancelled: true,
    status: 'cancelled' as const,
    forced: result.forced,
    progress: result.progress,
    stage: result.stage,
    message: result.forced ? 'Job killed after grace period' : 'Job cancelled',
  };
}

/**
 * Server-Sent Events frame; the event type becomes the SSE event name
 */
export function formatSseFrame(event: JobStreamEvent): string {
  const data = {
    jobId: event.jobId,
    data: event.data,
    progress: event.progress,
    stage: event.stage,
  };
  return `event: ${event.type}\ndata: ${JSON.stringify(data)}\n\n`;
}
