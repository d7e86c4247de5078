import { describe, expect, it } from 'vitest';
import { createJob, isTerminal } from '../../../src/domain/entities/Job.js';
import {
  createErrorEvent,
  createOutputEvent,
  createTerminalEvent,
  isTerminalEvent,
} from '../../../src/domain/entities/JobEvent.js';

const T0 = new Date('2026-01-05T10:00:00.000Z');

describe('Job entity', () => {
  it('creates a running job with initial progress', () => {
    const job = createJob({ id: 'job-1', command: ['worker', 'x=1'], workDir: '/srv', now: T0 });
    expect(job).toEqual({
      id: 'job-1',
      status: 'running',
      metadata: {
        command: ['worker', 'x=1'],
        workDir: '/srv',
        inputPath: null,
        outputDir: null,
        params: null,
        createdAt: T0,
      },
      progress: { progress: 0, stage: 'initializing', estimated: false, lastUpdate: T0, completedAt: null },
      error: null,
      exitCode: null,
    });
  });

  it('classifies terminal statuses', () => {
    expect(isTerminal('running')).toBe(false);
    expect(isTerminal('completed')).toBe(true);
    expect(isTerminal('failed')).toBe(true);
    expect(isTerminal('cancelled')).toBe(true);
  });
});

describe('JobStreamEvent', () => {
  const job = createJob({ id: 'job-1', command: ['worker'], workDir: '/srv', now: T0 });

  it('carries the current progress on output events', () => {
    const event = createOutputEvent(
      { ...job, progress: { ...job.progress, progress: 40, stage: 'inference' } },
      'step'
    );
    expect(event).toEqual({ type: 'output', jobId: 'job-1', data: 'step', progress: 40, stage: 'inference' });
    expect(isTerminalEvent(event)).toBe(false);
  });

  it('has no terminal event while running', () => {
    expect(createTerminalEvent(job)).toBeNull();
  });

  it('uses the failure message as data', () => {
    const event = createTerminalEvent({ ...job, status: 'failed', error: 'Worker exited with code 9' });
    expect(event).toMatchObject({ type: 'failed', data: 'Worker exited with code 9' });
    expect(createTerminalEvent({ ...job, status: 'failed' })?.data).toBe('Job failed');
  });

  it('treats error events as terminal', () => {
    const event = createErrorEvent('job-1', 'Job deleted');
    expect(event).toEqual({ type: 'error', jobId: 'job-1', data: 'Job deleted', progress: 0, stage: 'error' });
    expect(isTerminalEvent(event)).toBe(true);
  });

  it('carries the last known progress on error events', () => {
    const event = createErrorEvent('job-1', 'Job deleted', { progress: 62, stage: 'generating_map' });
    expect(event).toEqual({
      type: 'error',
      jobId: 'job-1',
      data: 'Job deleted',
      progress: 62,
      stage: 'generating_map',
    });
  });
});
