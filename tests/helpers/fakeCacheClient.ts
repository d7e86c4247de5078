import type { CacheClient } from '../../src/infra/cache/CacheClient.js';

/**
 * In-memory CacheClient. Set `failing` to make every call reject.
 */
export class FakeCacheClient implements CacheClient {
  readonly entries = new Map<string, { value: string; ttlSeconds: number }>();
  failing = false;
  closed = false;

  async ping(): Promise<string> {
    this.check();
    return 'PONG';
  }

  async setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.check();
    this.entries.set(key, { value, ttlSeconds });
  }

  async get(key: string): Promise<string | null> {
    this.check();
    return this.entries.get(key)?.value ?? null;
  }

  async del(keys: string[]): Promise<number> {
    this.check();
    return keys.filter((key) => this.entries.delete(key)).length;
  }

  async exists(key: string): Promise<number> {
    this.check();
    return this.entries.has(key) ? 1 : 0;
  }

  async countKeys(pattern: string): Promise<number> {
    this.check();
    const prefix = pattern.replace(/\*$/, '');
    return [...this.entries.keys()].filter((key) => key.startsWith(prefix)).length;
  }

  async quit(): Promise<void> {
    this.closed = true;
  }

  read(key: string): unknown {
    const entry = this.entries.get(key);
    return entry ? JSON.parse(entry.value) : undefined;
  }

  private check(): void {
    if (this.failing) throw new Error('connection refused');
  }
}
