import { Redis } from 'ioredis';
import type { CacheClient } from './CacheClient.js';

export interface RedisCacheClientOptions {
  url: string;
  connectTimeoutMs: number;
}

/**
 * CacheClient backed by Redis via ioredis.
 * Connects lazily on the first command; commands fail fast while disconnected.
 */
export class RedisCacheClient implements CacheClient {
  private readonly redis: Redis;

  constructor(options: RedisCacheClientOptions) {
    this.redis = new Redis(options.url, {
      lazyConnect: true,
      connectTimeout: options.connectTimeoutMs,
      maxRetriesPerRequest: 1,
      enableOfflineQueue: true,
    });
  }

  async ping(): Promise<string> {
    return this.redis.ping();
  }

  async setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(key, value, 'EX', ttlSeconds);
  }

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async del(keys: string[]): Promise<number> {
    if (keys.length === 0) return 0;
    return this.redis.del(...keys);
  }

  async exists(key: string): Promise<number> {
    return this.redis.exists(key);
  }

  async countKeys(pattern: string): Promise<number> {
    let count = 0;
    let cursor = '0';
    do {
      const [next, keys] = await this.redis.scan(cursor, 'MATCH', pattern, 'COUNT', 100);
      count += keys.length;
      cursor = next;
    } while (cursor !== '0');
    return count;
  }

  async quit(): Promise<void> {
    if (this.redis.status === 'ready') {
      await this.redis.quit();
      return;
    }
    // never connected or reconnecting: stop the retry loop without a round trip
    this.redis.disconnect();
  }
}
