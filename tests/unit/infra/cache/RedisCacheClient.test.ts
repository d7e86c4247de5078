import { beforeEach, describe, expect, it, vi } from 'vitest';
import { RedisCacheClient } from '../../../../src/infra/cache/RedisCacheClient.js';

const redisMock = vi.hoisted(() => {
  const instance = {
    status: 'wait',
    ping: vi.fn(async () => 'PONG'),
    set: vi.fn(async () => 'OK'),
    get: vi.fn(async (): Promise<string | null> => null),
    del: vi.fn(async (...keys: string[]) => keys.length),
    exists: vi.fn(async () => 1),
    scan: vi.fn(),
    quit: vi.fn(async () => 'OK'),
    disconnect: vi.fn(),
  };
  const Redis = vi.fn(function () {
    return instance;
  });
  return { instance, Redis };
});

vi.mock('ioredis', () => ({ Redis: redisMock.Redis }));

describe('RedisCacheClient', () => {
  const { instance } = redisMock;

  beforeEach(() => {
    vi.clearAllMocks();
    instance.status = 'wait';
  });

  it('connects lazily with a bounded timeout', () => {
    new RedisCacheClient({ url: 'redis://cache:6379', connectTimeoutMs: 1500 });
    expect(redisMock.Redis).toHaveBeenCalledWith('redis://cache:6379', {
      lazyConnect: true,
      connectTimeout: 1500,
      maxRetriesPerRequest: 1,
      enableOfflineQueue: true,
    });
  });

  it('writes with an expiry in seconds', async () => {
    const client = new RedisCacheClient({ url: 'redis://cache:6379', connectTimeoutMs: 1500 });
    await client.setWithExpiry('progress:job-1', '{}', 7200);
    expect(instance.set).toHaveBeenCalledWith('progress:job-1', '{}', 'EX', 7200);
  });

  it('skips DEL for an empty key list', async () => {
    const client = new RedisCacheClient({ url: 'redis://cache:6379', connectTimeoutMs: 1500 });
    expect(await client.del([])).toBe(0);
    expect(instance.del).not.toHaveBeenCalled();
    expect(await client.del(['a', 'b'])).toBe(2);
  });

  it('counts keys across SCAN pages', async () => {
    instance.scan
      .mockResolvedValueOnce(['17', ['progress:a', 'progress:b']])
      .mockResolvedValueOnce(['0', ['progress:c']]);
    const client = new RedisCacheClient({ url: 'redis://cache:6379', connectTimeoutMs: 1500 });

    expect(await client.countKeys('progress:*')).toBe(3);
    expect(instance.scan).toHaveBeenNthCalledWith(1, '0', 'MATCH', 'progress:*', 'COUNT', 100);
    expect(instance.scan).toHaveBeenNthCalledWith(2, '17', 'MATCH', 'progress:*', 'COUNT', 100);
  });

  it('quits gracefully when connected and disconnects otherwise', async () => {
    const client = new RedisCacheClient({ url: 'redis://cache:6379', connectTimeoutMs: 1500 });
    await client.quit();
    expect(instance.disconnect).toHaveBeenCalledTimes(1);
    expect(instance.quit).not.toHaveBeenCalled();

    instance.status = 'ready';
    await client.quit();
    expect(instance.quit).toHaveBeenCalledTimes(1);
  });
});
