import type {
  WorkerExit,
  WorkerLauncher,
  WorkerProcess,
  WorkerSignal,
} from '../../src/infra/process/WorkerProcess.js';
import { AsyncQueue } from '../../src/utils/AsyncQueue.js';

/**
 * In-process stand-in for a worker. Lines and exit are driven by the test.
 * By default SIGTERM and SIGKILL both end the process.
 */
export class FakeWorker implements WorkerProcess {
  readonly output = new AsyncQueue<string>();
  readonly exited: Promise<WorkerExit>;
  readonly signals: WorkerSignal[] = [];
  ignoreSigterm = false;

  private exit: WorkerExit | null = null;
  private resolveExit: (exit: WorkerExit) => void = () => undefined;

  constructor(readonly pid: number | undefined = 4242) {
    this.exited = new Promise((resolve) => {
      this.resolveExit = resolve;
    });
  }

  emit(...lines: string[]): void {
    for (const line of lines) this.output.push(line);
  }

  finish(code: number | null, signal: string | null = null): void {
    if (this.exit) return;
    this.exit = { code, signal };
    this.output.close();
    this.resolveExit(this.exit);
  }

  hasExited(): boolean {
    return this.exit !== null;
  }

  signal(signal: WorkerSignal): boolean {
    if (this.exit) return false;
    this.signals.push(signal);
    if (signal === 'SIGKILL' || !this.ignoreSigterm) {
      this.finish(null, signal);
    }
    return true;
  }
}

export class FakeLauncher implements WorkerLauncher {
  readonly launches: Array<{ command: string[]; cwd: string }> = [];
  readonly workers: FakeWorker[] = [];
  private failure: unknown = null;

  failNextWith(error: unknown): void {
    this.failure = error;
  }

  async launch(command: readonly string[], cwd: string): Promise<WorkerProcess> {
    if (this.failure !== null) {
      const error = this.failure;
      this.failure = null;
      throw error;
    }
    this.launches.push({ command: [...command], cwd });
    const worker = new FakeWorker(4242 + this.workers.length);
    this.workers.push(worker);
    return worker;
  }

  get last(): FakeWorker {
    const worker = this.workers.at(-1);
    if (!worker) throw new Error('no worker launched');
    return worker;
  }
}

/**
 * Lets queued collector work and cache writes run
 */
export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
