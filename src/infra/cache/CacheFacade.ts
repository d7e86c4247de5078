import type { z } from 'zod';
import type { Job } from '../../domain/entities/Job.js';
import { logger } from '../logger.js';
import type { OutputFile } from '../OutputFileLister.js';
import type { CacheClient } from './CacheClient.js';
import {
  cacheKeys,
  cachedFilesSchema,
  cachedMetadataSchema,
  cachedProgressSchema,
  type CachedMetadata,
  type CachedProgress,
} from './jobCacheSchemas.js';

export type CacheMode = 'active' | 'disabled';

export interface CacheTtl {
  progressSeconds: number;
  metadataSeconds: number;
  filesSeconds: number;
}

export const DEFAULT_CACHE_TTL: Readonly<CacheTtl> = Object.freeze({
  progressSeconds: 7200,
  metadataSeconds: 7200,
  filesSeconds: 3600,
});

export interface CacheStatus {
  mode: CacheMode;
  keys: { progress: number; metadata: number; files: number } | null;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Best-effort mirror of job state in an external key-value store.
 *
 * A single probe in initialize() decides the mode for the process lifetime.
 * In disabled mode every call is a no-op miss. In active mode any store or
 * serialization failure is logged and reported as a miss; nothing throws.
 */
export class CacheFacade {
  private mode: CacheMode = 'disabled';

  constructor(
    private readonly client: CacheClient | null,
    private readonly ttl: CacheTtl = DEFAULT_CACHE_TTL
  ) {}

  get isActive(): boolean {
    return this.mode === 'active';
  }

  async initialize(): Promise<CacheMode> {
    if (!this.client) {
      logger.info('Cache disabled: no store configured');
      this.mode = 'disabled';
      return this.mode;
    }

    try {
      await this.client.ping();
      this.mode = 'active';
      logger.info('Cache connected');
    } catch (error) {
      this.mode = 'disabled';
      logger.warn('Cache unavailable, continuing with memory-only state', {
        error: describe(error),
      });
      await this.closeClient();
    }
    return this.mode;
  }

  async put(key: string, value: unknown, ttlSeconds: number): Promise<boolean> {
    if (!this.client || !this.isActive) return false;
    try {
      await this.client.setWithExpiry(key, JSON.stringify(value), ttlSeconds);
      return true;
    } catch (error) {
      logger.warn('Cache write failed', { key, error: describe(error) });
      return false;
    }
  }

  async get<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    if (!this.client || !this.isActive) return null;
    try {
      const raw = await this.client.get(key);
      if (raw === null) return null;
      const parsed = schema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        logger.warn('Cache entry has unexpected shape', { key });
        return null;
      }
      return parsed.data;
    } catch (error) {
      logger.warn('Cache read failed', { key, error: describe(error) });
      return null;
    }
  }

  async delete(...keys: string[]): Promise<boolean> {
    if (!this.client || !this.isActive || keys.length === 0) return false;
    try {
      await this.client.del(keys);
      return true;
    } catch (error) {
      logger.warn('Cache delete failed', { keys, error: describe(error) });
      return false;
    }
  }

  async exists(key: string): Promise<boolean> {
    if (!this.client || !this.isActive) return false;
    try {
      return (await this.client.exists(key)) > 0;
    } catch (error) {
      logger.warn('Cache exists check failed', { key, error: describe(error) });
      return false;
    }
  }

  mirrorProgress(job: Job): Promise<boolean> {
    const snapshot: CachedProgress = {
      status: job.status,
      progress: job.progress.progress,
      stage: job.progress.stage,
      estimated: job.progress.estimated,
      lastUpdate: job.progress.lastUpdate,
      completedAt: job.progress.completedAt,
      error: job.error,
    };
    return this.put(cacheKeys.progress(job.id), snapshot, this.ttl.progressSeconds);
  }

  mirrorMetadata(job: Job): Promise<boolean> {
    const metadata: CachedMetadata = { ...job.metadata };
    return this.put(cacheKeys.metadata(job.id), metadata, this.ttl.metadataSeconds);
  }

  mirrorFiles(jobId: string, files: OutputFile[]): Promise<boolean> {
    return this.put(cacheKeys.files(jobId), files, this.ttl.filesSeconds);
  }

  getProgress(jobId: string): Promise<CachedProgress | null> {
    return this.get(cacheKeys.progress(jobId), cachedProgressSchema);
  }

  getMetadata(jobId: string): Promise<CachedMetadata | null> {
    return this.get(cacheKeys.metadata(jobId), cachedMetadataSchema);
  }

  getFiles(jobId: string): Promise<OutputFile[] | null> {
    return this.get(cacheKeys.files(jobId), cachedFilesSchema);
  }

  forgetJob(jobId: string): Promise<boolean> {
    return this.delete(cacheKeys.progress(jobId), cacheKeys.metadata(jobId), cacheKeys.files(jobId));
  }

  async status(): Promise<CacheStatus> {
    if (!this.client || !this.isActive) {
      return { mode: this.mode, keys: null };
    }
    try {
      const [progress, metadata, files] = await Promise.all([
        this.client.countKeys(cacheKeys.progress('*')),
        this.client.countKeys(cacheKeys.metadata('*')),
        this.client.countKeys(cacheKeys.files('*')),
      ]);
      return { mode: this.mode, keys: { progress, metadata, files } };
    } catch (error) {
      logger.warn('Cache status check failed', { error: describe(error) });
      return { mode: this.mode, keys: null };
    }
  }

  async close(): Promise<void> {
    this.mode = 'disabled';
    await this.closeClient();
  }

  private async closeClient(): Promise<void> {
    if (!this.client) return;
    try {
      await this.client.quit();
    } catch (error) {
      logger.warn('Cache client did not close cleanly', { error: describe(error) });
    }
  }
}
