import { describe, expect, it } from 'vitest';
import { parseEnv } from '../../../src/infra/env.js';

describe('parseEnv', () => {
  it('applies defaults around the required worker command', () => {
    const env = parseEnv({ WORKER_COMMAND: 'python3 -m worker.inference' });
    expect(env).toMatchObject({
      NODE_ENV: 'development',
      PORT: 8000,
      LOG_LEVEL: 'info',
      WORKER_COMMAND: ['python3', '-m', 'worker.inference'],
      OUTPUT_ROOT: './outputs',
      DOWNLOAD_PREFERRED_EXTENSION: '.osz',
      CANCEL_GRACE_MS: 5000,
      JANITOR_INTERVAL_MINUTES: 5,
      JOB_RETENTION_MINUTES: 60,
      PROGRESS_CACHE_TTL_SECONDS: 7200,
      FILES_CACHE_TTL_SECONDS: 3600,
      PROGRESS_QUIESCENCE_MS: 5000,
      PROGRESS_ASSUMED_TOTAL_MS: 180000,
    });
    expect(env.REDIS_URL).toBeUndefined();
    expect(env.WORKER_CWD).toBeUndefined();
    expect(env.WORKER_ENV).toEqual({});
  });

  it('reads extra worker environment as a JSON object', () => {
    expect(parseEnv({ WORKER_COMMAND: 'worker', WORKER_ENV: '{"MODEL_DIR":"/models"}' }).WORKER_ENV).toEqual({
      MODEL_DIR: '/models',
    });
    expect(() => parseEnv({ WORKER_COMMAND: 'worker', WORKER_ENV: '{"THREADS":4}' })).toThrow();
  });

  it('accepts the worker command as a JSON array', () => {
    const env = parseEnv({ WORKER_COMMAND: '["/opt/venv/bin/python", "inference.py", "--config name"]' });
    expect(env.WORKER_COMMAND).toEqual(['/opt/venv/bin/python', 'inference.py', '--config name']);
  });

  it('requires a worker command', () => {
    expect(() => parseEnv({})).toThrow();
    expect(() => parseEnv({ WORKER_COMMAND: '   ' })).toThrow();
    expect(() => parseEnv({ WORKER_COMMAND: '[]' })).toThrow('WORKER_COMMAND must name an executable');
  });

  it('treats an empty REDIS_URL as unset', () => {
    expect(parseEnv({ WORKER_COMMAND: 'worker', REDIS_URL: '' }).REDIS_URL).toBeUndefined();
    expect(parseEnv({ WORKER_COMMAND: 'worker', REDIS_URL: 'redis://cache:6379/0' }).REDIS_URL).toBe(
      'redis://cache:6379/0'
    );
  });

  it('coerces numbers and bounds the janitor interval', () => {
    expect(parseEnv({ WORKER_COMMAND: 'worker', CANCEL_GRACE_MS: '250' }).CANCEL_GRACE_MS).toBe(250);
    expect(() => parseEnv({ WORKER_COMMAND: 'worker', JANITOR_INTERVAL_MINUTES: '60' })).toThrow(
      'JANITOR_INTERVAL_MINUTES must be at most 59'
    );
  });
});
