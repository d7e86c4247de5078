import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z, ZodError } from 'zod';
import { ConfigError } from '../errors.js';

const stageRuleSchema = z
  .object({
    keyword: z.string().trim().min(1),
    stage: z.string().min(1),
    start: z.number().min(0).max(100),
    end: z.number().min(0).max(100),
  })
  .refine((rule) => rule.start <= rule.end, {
    message: 'start must not exceed end',
  });

const stageTableSchema = z.object({
  rules: z.array(stageRuleSchema).min(1),
  errorKeywords: z.array(z.string().trim().min(1)).default([]),
  errorStage: z.string().min(1).default('error'),
  categories: z
    .object({
      generation: z.array(z.string()).default([]),
      loading: z.array(z.string()).default([]),
    })
    .default({}),
});

export type StageRule = Readonly<z.infer<typeof stageRuleSchema>>;

/**
 * Ordered keyword → stage configuration consumed by the progress estimator.
 * Keywords are stored lower-cased.
 */
export interface StageTable {
  readonly rules: readonly StageRule[];
  readonly errorKeywords: readonly string[];
  readonly errorStage: string;
  readonly categories: {
    readonly generation: readonly string[];
    readonly loading: readonly string[];
  };
}

export const DEFAULT_STAGE_TABLE_PATH = fileURLToPath(
  new URL('../../../config/stage-table.json', import.meta.url)
);

export function parseStageTable(raw: unknown): StageTable {
  const parsed = stageTableSchema.parse(raw);
  return Object.freeze({
    rules: Object.freeze(
      parsed.rules.map((rule) => Object.freeze({ ...rule, keyword: rule.keyword.toLowerCase() }))
    ),
    errorKeywords: Object.freeze(parsed.errorKeywords.map((keyword) => keyword.toLowerCase())),
    errorStage: parsed.errorStage,
    categories: Object.freeze({
      generation: Object.freeze([...parsed.categories.generation]),
      loading: Object.freeze([...parsed.categories.loading]),
    }),
  });
}

/**
 * Reads and validates a stage table JSON file.
 * Throws ConfigError when the file is missing or malformed.
 */
export function loadStageTable(filePath: string = DEFAULT_STAGE_TABLE_PATH): StageTable {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Unable to read stage table at ${filePath}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  try {
    return parseStageTable(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(`Invalid stage table at ${filePath}`, {
        issues: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    throw error;
  }
}
