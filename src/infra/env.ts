import { z, ZodError } from 'zod';

/**
 * Splits WORKER_COMMAND given either as a JSON array or a whitespace-separated string
 */
function parseCommand(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  if (trimmed === '') return undefined;
  if (trimmed.startsWith('[')) {
    try {
      return JSON.parse(trimmed);
    } catch {
      return value;
    }
  }
  return trimmed.split(/\s+/);
}

function parseJsonObject(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  if (value.trim() === '') return undefined;
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

/**
 * Environment variable schema with strict validation
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().default(8000),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().optional(),

  // Optional Redis mirror; unset means memory-only operation
  REDIS_URL: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.string().url().optional()
  ),
  REDIS_CONNECT_TIMEOUT_MS: z.coerce.number().int().min(100).default(5000),

  // Worker launch
  WORKER_COMMAND: z.preprocess(
    parseCommand,
    z.array(z.string().min(1)).min(1, { message: 'WORKER_COMMAND must name an executable' })
  ),
  WORKER_CWD: z.string().optional(),
  WORKER_ENV: z.preprocess(
    parseJsonObject,
    z.record(z.string(), { message: 'WORKER_ENV must be a JSON object of strings' }).default({})
  ),
  OUTPUT_ROOT: z.string().default('./outputs'),
  // File sent by /download when the client names none
  DOWNLOAD_PREFERRED_EXTENSION: z.string().default('.osz'),
  CANCEL_GRACE_MS: z.coerce.number().int().min(0).default(5000),

  // Janitor
  JANITOR_INTERVAL_MINUTES: z.coerce
    .number()
    .int()
    .min(1, { message: 'JANITOR_INTERVAL_MINUTES must be at least 1' })
    .max(59, { message: 'JANITOR_INTERVAL_MINUTES must be at most 59' })
    .default(5),
  JOB_RETENTION_MINUTES: z.coerce.number().int().min(1).default(60),

  // Cache expiry
  PROGRESS_CACHE_TTL_SECONDS: z.coerce.number().int().min(1).default(7200),
  FILES_CACHE_TTL_SECONDS: z.coerce.number().int().min(1).default(3600),

  // Progress heuristics
  PROGRESS_QUIESCENCE_MS: z.coerce.number().int().min(0).default(5000),
  PROGRESS_ASSUMED_TOTAL_MS: z.coerce.number().int().min(1).default(180000),
  STAGE_TABLE_PATH: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails
 */
export function validateEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      console.error('\nCheck .env.example for required variables');
      process.exit(1);
    }
    throw error;
  }
}
