import { describe, expect, it } from 'vitest';
import { LaunchError } from '../../../../src/domain/errors.js';
import { ChildProcessLauncher } from '../../../../src/infra/process/ChildProcessLauncher.js';
import type { WorkerProcess } from '../../../../src/infra/process/WorkerProcess.js';

async function readAll(worker: WorkerProcess): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of worker.output) {
    lines.push(line);
  }
  return lines;
}

describe('ChildProcessLauncher', () => {
  const launcher = new ChildProcessLauncher();

  it('merges stdout and stderr into one line stream and reports the exit code', async () => {
    const worker = await launcher.launch(
      [process.execPath, '-e', "console.log('to stdout'); console.error('to stderr'); process.exitCode = 3;"],
      process.cwd()
    );

    expect(worker.pid).toEqual(expect.any(Number));
    const lines = await readAll(worker);
    expect(lines.sort()).toEqual(['to stderr', 'to stdout']);
    expect(await worker.exited).toEqual({ code: 3, signal: null });
    expect(worker.hasExited()).toBe(true);
    expect(worker.signal('SIGTERM')).toBe(false);
  });

  it('splits carriage-return progress redraws into separate lines', async () => {
    const worker = await launcher.launch(
      [process.execPath, '-e', "process.stdout.write('10%\\r20%\\rdone\\n');"],
      process.cwd()
    );

    expect(await readAll(worker)).toEqual(['10%', '20%', 'done']);
    expect((await worker.exited).code).toBe(0);
  });

  it('passes arguments without a shell', async () => {
    const worker = await launcher.launch(
      [process.execPath, '-e', 'console.log(process.argv.slice(1).join("|"))', 'seed=7', 'a b'],
      process.cwd()
    );

    expect(await readAll(worker)).toEqual(['seed=7|a b']);
  });

  it('adds the configured environment to the inherited one', async () => {
    const withEnv = new ChildProcessLauncher({ WORKER_MODEL_DIR: '/models/test' });
    const worker = await withEnv.launch(
      [process.execPath, '-e', 'console.log(process.env.WORKER_MODEL_DIR, typeof process.env.PATH)'],
      process.cwd()
    );

    expect(await readAll(worker)).toEqual(['/models/test string']);
  });

  it('terminates a running worker on SIGTERM', async () => {
    const worker = await launcher.launch(
      [process.execPath, '-e', 'setInterval(() => undefined, 1000);'],
      process.cwd()
    );

    expect(worker.hasExited()).toBe(false);
    expect(worker.signal('SIGTERM')).toBe(true);
    expect(await worker.exited).toEqual({ code: null, signal: 'SIGTERM' });
  });

  it('rejects with LaunchError when the executable does not exist', async () => {
    await expect(
      launcher.launch(['/nonexistent/worker-binary', 'audio_path=/tmp/in.mp3'], process.cwd())
    ).rejects.toMatchObject({
      code: 'LAUNCH_ERROR',
      message: 'Failed to start worker: /nonexistent/worker-binary',
      details: { executable: '/nonexistent/worker-binary', code: 'ENOENT' },
    });
  });

  it('rejects an empty command', async () => {
    await expect(launcher.launch([], process.cwd())).rejects.toBeInstanceOf(LaunchError);
  });
});
