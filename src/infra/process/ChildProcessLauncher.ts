import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { LaunchError } from '../../domain/errors.js';
import { AsyncQueue } from '../../utils/AsyncQueue.js';
import { logger } from '../logger.js';
import type { WorkerExit, WorkerLauncher, WorkerProcess, WorkerSignal } from './WorkerProcess.js';

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => ChildProcess;

/**
 * Wraps a ChildProcess: merges stdout and stderr into one line stream and
 * exposes exit as a promise.
 */
class ChildWorkerProcess implements WorkerProcess {
  readonly output: AsyncQueue<string>;
  readonly exited: Promise<WorkerExit>;

  constructor(private readonly child: ChildProcess) {
    const lines = new AsyncQueue<string>();
    this.output = lines;

    const streams = [child.stdout, child.stderr].filter(
      (stream): stream is Readable => stream !== null
    );
    let open = streams.length;
    for (const stream of streams) {
      // readline splits on \n, \r\n and a lone \r, so carriage-return redraws become lines
      const reader = createInterface({ input: stream, crlfDelay: Infinity });
      reader.on('line', (line) => lines.push(line));
      reader.on('close', () => {
        open -= 1;
        if (open === 0) lines.close();
      });
    }
    if (open === 0) lines.close();

    this.exited = new Promise((resolve) => {
      child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
        lines.close();
        resolve({ code, signal });
      });
    });

    child.on('error', (error) => {
      logger.warn('Worker process error', { pid: child.pid, error });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  hasExited(): boolean {
    return this.child.exitCode !== null || this.child.signalCode !== null;
  }

  signal(signal: WorkerSignal): boolean {
    if (this.hasExited()) {
      return false;
    }
    return this.child.kill(signal);
  }
}

function waitForSpawn(child: ChildProcess): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = () => {
      child.off('error', onError);
      resolve();
    };
    const onError = (error: Error) => {
      child.off('spawn', onSpawn);
      reject(error);
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

/**
 * Launches workers as local child processes
 */
export class ChildProcessLauncher implements WorkerLauncher {
  constructor(
    private readonly extraEnv: Readonly<Record<string, string>> = {},
    private readonly spawnFn: SpawnFn = spawn
  ) {}

  async launch(command: readonly string[], cwd: string): Promise<WorkerProcess> {
    const [executable, ...args] = command;
    if (!executable) {
      throw new LaunchError('Worker command is empty');
    }

    try {
      const child = this.spawnFn(executable, args, {
        cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        env: { ...process.env, ...this.extraEnv },
        windowsHide: true,
      });
      const worker = new ChildWorkerProcess(child);
      await waitForSpawn(child);
      logger.debug('Worker process started', { pid: child.pid, executable, cwd });
      return worker;
    } catch (error) {
      const code =
        error && typeof error === 'object' && 'code' in error ? String(error.code) : undefined;
      throw new LaunchError(`Failed to start worker: ${executable}`, {
        executable,
        cwd,
        code,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
