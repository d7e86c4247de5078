import { z } from 'zod';

/**
 * Shapes of the job snapshots mirrored to the cache. Dates travel as ISO strings.
 */

export const cachedProgressSchema = z.object({
  status: z.enum(['running', 'completed', 'failed', 'cancelled']),
  progress: z.number().min(0).max(100),
  stage: z.string(),
  estimated: z.boolean(),
  lastUpdate: z.coerce.date(),
  completedAt: z.coerce.date().nullable(),
  error: z.string().nullable(),
});

export const cachedMetadataSchema = z.object({
  command: z.array(z.string()),
  workDir: z.string(),
  inputPath: z.string().nullable(),
  outputDir: z.string().nullable(),
  params: z.record(z.unknown()).nullable(),
  createdAt: z.coerce.date(),
});

export const cachedFilesSchema = z.array(
  z.object({
    name: z.string(),
    size: z.number().int().min(0),
    extension: z.string(),
  })
);

export type CachedProgress = z.infer<typeof cachedProgressSchema>;
export type CachedMetadata = z.infer<typeof cachedMetadataSchema>;

export const cacheKeys = {
  progress: (jobId: string) => `progress:${jobId}`,
  metadata: (jobId: string) => `metadata:${jobId}`,
  files: (jobId: string) => `files:${jobId}`,
};
