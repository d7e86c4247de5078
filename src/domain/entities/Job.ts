/**
 * Job entity - one supervised run of an external worker process
 */
export type JobStatus = 'running' | 'completed' | 'failed' | 'cancelled';

export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled'];

export interface JobMetadata {
  command: string[];
  workDir: string;
  inputPath: string | null;
  outputDir: string | null;
  params: Record<string, unknown> | null;
  createdAt: Date;
}

export interface ProgressState {
  progress: number;
  stage: string;
  estimated: boolean;
  lastUpdate: Date;
  completedAt: Date | null;
}

export interface Job {
  id: string;
  status: JobStatus;
  metadata: JobMetadata;
  progress: ProgressState;
  error: string | null;
  exitCode: number | null;
}

export const INITIAL_STAGE = 'initializing';

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function createProgressState(now: Date = new Date()): ProgressState {
  return {
    progress: 0,
    stage: INITIAL_STAGE,
    estimated: false,
    lastUpdate: now,
    completedAt: null,
  };
}

/**
 * Factory function to create a new running Job
 */
export function createJob(params: {
  id: string;
  command: string[];
  workDir: string;
  inputPath?: string | null;
  outputDir?: string | null;
  params?: Record<string, unknown> | null;
  now?: Date;
}): Job {
  const now = params.now ?? new Date();
  return {
    id: params.id,
    status: 'running',
    metadata: {
      command: [...params.command],
      workDir: params.workDir,
      inputPath: params.inputPath ?? null,
      outputDir: params.outputDir ?? null,
      params: params.params ?? null,
      createdAt: now,
    },
    progress: createProgressState(now),
    error: null,
    exitCode: null,
  };
}
