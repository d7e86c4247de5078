import path from 'node:path';
import type { JobStatus } from '../domain/entities/Job.js';
import { NotFoundError } from '../domain/errors.js';
import type { CacheFacade, CacheStatus } from '../infra/cache/CacheFacade.js';
import { cacheKeys, type CachedMetadata, type CachedProgress } from '../infra/cache/jobCacheSchemas.js';
import { logger } from '../infra/logger.js';
import type { OutputFile, OutputFileLister } from '../infra/OutputFileLister.js';
import type { JobRecordStore } from '../infra/repositories/JobRecordStore.js';

export interface JobStatusView {
  jobId: string;
  status: JobStatus;
  progress: number;
  stage: string;
  outputFiles?: string[];
  error?: string;
}

export interface JobProgressView {
  jobId: string;
  progress: number;
  stage: string;
  estimated: boolean;
  lastUpdate: Date;
  status: JobStatus;
}

export interface JobSummary {
  jobId: string;
  status: JobStatus;
  progress: number;
  stage: string;
  inputPath: string | null;
  createdAt: Date;
  completedAt: Date | null;
  pid: number | null;
}

export interface JobDebugView {
  jobId: string;
  recentOutput: string[];
  totalOutputLines: number;
  progress: CachedProgress;
  createdAt: Date | null;
  elapsedMs: number | null;
  isActive: boolean;
  cache: { progress: boolean; metadata: boolean; files: boolean };
}

export interface JobOutputView {
  jobId: string;
  output: string[];
  totalLines: number;
}

export interface DownloadTarget {
  filePath: string;
  fileName: string;
}

export interface DownloadRequest {
  /** Must name a file from the job's listing */
  fileName?: string;
  /** Chosen first when no file is named, e.g. ".osz" */
  preferredExtension?: string;
}

type JobSnapshot = {
  progress: CachedProgress;
  metadata: CachedMetadata | null;
};

const DEBUG_TAIL_LINES = 20;

function outputDirectory(metadata: CachedMetadata | null): string | null {
  return metadata ? (metadata.outputDir ?? metadata.workDir) : null;
}

/**
 * JobQueryService - read side: status, progress, listings and diagnostics.
 * Memory is authoritative; the cache answers only for jobs no longer in memory.
 */
export class JobQueryService {
  constructor(
    private store: JobRecordStore,
    private cache: CacheFacade,
    private fileLister: OutputFileLister,
    private now: () => Date = () => new Date()
  ) {}

  async status(jobId: string): Promise<JobStatusView> {
    const snapshot = await this.snapshot(jobId);
    const { progress } = snapshot;
    const view: JobStatusView = {
      jobId,
      status: progress.status,
      progress: progress.progress,
      stage: progress.stage,
    };

    if (progress.status === 'completed') {
      const files = await this.resolveFiles(jobId, snapshot.metadata);
      view.outputFiles = files.map((file) => file.name);
    }
    if (progress.error) {
      view.error = progress.error;
    }
    return view;
  }

  async progress(jobId: string): Promise<JobProgressView> {
    const { progress } = await this.snapshot(jobId);
    return {
      jobId,
      progress: progress.progress,
      stage: progress.stage,
      estimated: progress.estimated,
      lastUpdate: progress.lastUpdate,
      status: progress.status,
    };
  }

  listJobs(): JobSummary[] {
    return this.store
      .list()
      .sort((a, b) => a.metadata.createdAt.getTime() - b.metadata.createdAt.getTime())
      .map((job) => ({
        jobId: job.id,
        status: job.status,
        progress: job.progress.progress,
        stage: job.progress.stage,
        inputPath: job.metadata.inputPath,
        createdAt: job.metadata.createdAt,
        completedAt: job.progress.completedAt,
        pid: this.store.getProcess(job.id)?.pid ?? null,
      }));
  }

  async listOutputFiles(jobId: string): Promise<OutputFile[]> {
    const snapshot = await this.snapshot(jobId);
    return this.resolveFiles(jobId, snapshot.metadata);
  }

  /**
   * Full output log of a job still held in memory
   */
  output(jobId: string): JobOutputView {
    const output = this.store.getOutput(jobId);
    if (!output) {
      throw new NotFoundError('Job', jobId);
    }
    return { jobId, output, totalLines: output.length };
  }

  /**
   * Picks the file to send for a job. Only names present in the job's listing
   * are accepted, so the result always lies inside the output directory.
   */
  async downloadTarget(jobId: string, request: DownloadRequest = {}): Promise<DownloadTarget> {
    const snapshot = await this.snapshot(jobId);
    const directory = outputDirectory(snapshot.metadata);
    const files = directory ? await this.resolveFiles(jobId, snapshot.metadata) : [];

    let target: OutputFile | undefined;
    if (request.fileName !== undefined) {
      target = files.find((file) => file.name === request.fileName);
    } else {
      const { preferredExtension } = request;
      target =
        (preferredExtension ? files.find((file) => file.extension === preferredExtension) : undefined) ??
        files[0];
    }

    if (!directory || !target || path.basename(target.name) !== target.name) {
      throw new NotFoundError('Output file', request.fileName ?? jobId);
    }
    return { filePath: path.join(directory, target.name), fileName: target.name };
  }

  async debug(jobId: string): Promise<JobDebugView> {
    const snapshot = await this.snapshot(jobId);
    const [progressCached, metadataCached, filesCached] = await Promise.all([
      this.cache.exists(cacheKeys.progress(jobId)),
      this.cache.exists(cacheKeys.metadata(jobId)),
      this.cache.exists(cacheKeys.files(jobId)),
    ]);
    const createdAt = snapshot.metadata?.createdAt ?? null;

    return {
      jobId,
      recentOutput: this.store.getOutput(jobId, DEBUG_TAIL_LINES) ?? [],
      totalOutputLines: this.store.outputLength(jobId),
      progress: snapshot.progress,
      createdAt,
      elapsedMs: createdAt ? this.now().getTime() - createdAt.getTime() : null,
      isActive: this.store.getProcess(jobId) !== null,
      cache: { progress: progressCached, metadata: metadataCached, files: filesCached },
    };
  }

  cacheStatus(): Promise<CacheStatus> {
    return this.cache.status();
  }

  private async snapshot(jobId: string): Promise<JobSnapshot> {
    const job = this.store.get(jobId);
    if (job) {
      return {
        progress: { status: job.status, error: job.error, ...job.progress },
        metadata: job.metadata,
      };
    }

    const [progress, metadata] = await Promise.all([
      this.cache.getProgress(jobId),
      this.cache.getMetadata(jobId),
    ]);
    if (!progress) {
      throw new NotFoundError('Job', jobId);
    }
    logger.debug('Job served from cache', { jobId });
    return { progress, metadata };
  }

  /**
   * Lists the job's output directory; falls back to the cached listing when
   * the directory is gone or empty, and mirrors a non-empty listing.
   */
  private async resolveFiles(jobId: string, metadata: CachedMetadata | null): Promise<OutputFile[]> {
    const directory = outputDirectory(metadata);
    let listed: OutputFile[] | null = null;
    if (directory) {
      try {
        listed = await this.fileLister.list(directory);
      } catch (error) {
        logger.warn('Failed to list output directory', { jobId, directory, error });
      }
    }

    if (listed && listed.length > 0) {
      await this.cache.mirrorFiles(jobId, listed);
      return listed;
    }
    return (await this.cache.getFiles(jobId)) ?? listed ?? [];
  }
}
