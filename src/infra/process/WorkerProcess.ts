export type WorkerSignal = 'SIGTERM' | 'SIGKILL';

export interface WorkerExit {
  code: number | null;
  signal: string | null;
}

/**
 * Handle on a launched worker. Output is the merged stdout/stderr line stream
 * and has exactly one reader: the job's collector.
 */
export interface WorkerProcess {
  readonly pid: number | undefined;
  readonly output: AsyncIterable<string>;
  /** Resolves once the process has exited and its output streams are closed */
  readonly exited: Promise<WorkerExit>;
  hasExited(): boolean;
  /** Returns false when the process was already gone; never throws */
  signal(signal: WorkerSignal): boolean;
}

export interface WorkerLauncher {
  /**
   * Starts `command[0]` with the remaining entries as arguments.
   * Rejects with LaunchError when the executable cannot be started.
   */
  launch(command: readonly string[], cwd: string): Promise<WorkerProcess>;
}
