/**
 * Minimal key-value operations the cache façade needs from its store
 */
export interface CacheClient {
  ping(): Promise<string>;
  setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void>;
  get(key: string): Promise<string | null>;
  del(keys: string[]): Promise<number>;
  exists(key: string): Promise<number>;
  /** Counts keys matching a glob pattern without blocking the store */
  countKeys(pattern: string): Promise<number>;
  quit(): Promise<void>;
}
