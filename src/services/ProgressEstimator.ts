import type { StageRule, StageTable } from '../domain/progress/StageTable.js';

/**
 * Tuning constants for the elapsed-time fallback.
 * These are heuristics, not guarantees; all are configurable.
 */
export interface ProgressTuning {
  /** Minimum quiet time since the last update before the fallback may fire */
  quiescenceMs: number;
  /** Empirical total runtime used to extrapolate progress from elapsed time */
  assumedTotalMs: number;
  /** Upper bound of the time-based extrapolation */
  timeBasedCap: number;
  /** Upper bound of any fallback result; the rest is reserved for confirmed completion */
  fallbackCap: number;
}

export const DEFAULT_PROGRESS_TUNING: Readonly<ProgressTuning> = Object.freeze({
  quiescenceMs: 5_000,
  assumedTotalMs: 180_000,
  timeBasedCap: 90,
  fallbackCap: 95,
});

export interface PriorProgress {
  progress: number;
  stage: string;
  /** epoch milliseconds */
  lastUpdate: number;
}

export interface EstimateContext {
  /** epoch milliseconds */
  now: number;
  /** epoch milliseconds at which the job started */
  startedAt: number;
  table: StageTable;
  tuning?: ProgressTuning;
}

export interface ProgressEstimate {
  progress: number;
  stage: string;
  estimated: boolean;
}

type StructuredPattern = {
  regex: RegExp;
  extract: (match: RegExpExecArray) => number | null;
};

function percentOf(current: string, total: string): number | null {
  const denominator = Number(total);
  if (!Number.isFinite(denominator) || denominator <= 0) {
    return null;
  }
  return (Number(current) / denominator) * 100;
}

const STRUCTURED_PATTERNS: readonly StructuredPattern[] = [
  // tqdm with counter: "  50%|█████     | 1/2 [00:01<00:01]"
  {
    regex: /(\d+(?:\.\d+)?)%\|[^|]*\|\s*(\d+)\/(\d+)/,
    extract: (match) => percentOf(match[2], match[3]) ?? Number(match[1]),
  },
  // tqdm without counter: "  50%|"
  {
    regex: /^\s*(\d+(?:\.\d+)?)%\|/,
    extract: (match) => Number(match[1]),
  },
  {
    regex: /progress:\s*(\d+(?:\.\d+)?)%/i,
    extract: (match) => Number(match[1]),
  },
  {
    regex: /(\d+(?:\.\d+)?)%\s*complete/i,
    extract: (match) => Number(match[1]),
  },
  {
    regex: /step\s+(\d+)\s+of\s+(\d+)/i,
    extract: (match) => percentOf(match[1], match[2]),
  },
  // any other percentage, as long as it is not a tqdm bar: "Refining positions 42%"
  {
    regex: /(\d+(?:\.\d+)?)%(?!\|)/,
    extract: (match) => Number(match[1]),
  },
  // standalone counter: "batch 13/65"; paths, dates and ratios above 1 are not progress
  {
    regex: /(?<![\w./:-])(\d+)\/(\d+)(?![\w./:-])/,
    extract: (match) => (Number(match[1]) <= Number(match[2]) ? percentOf(match[1], match[2]) : null),
  },
];

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Extracts an exact percentage from a structured progress display.
 * Returns null when no pattern matches.
 */
export function parseStructuredProgress(line: string): number | null {
  for (const pattern of STRUCTURED_PATTERNS) {
    const match = pattern.regex.exec(line);
    if (!match) continue;
    const value = pattern.extract(match);
    if (value !== null && Number.isFinite(value)) {
      return clamp(value, 0, 100);
    }
  }
  return null;
}

/**
 * Longest keyword contained in the line wins; ties keep table order.
 */
export function matchStageRule(line: string, table: StageTable): StageRule | null {
  const lower = line.toLowerCase();
  let best: StageRule | null = null;
  for (const rule of table.rules) {
    if (lower.includes(rule.keyword) && (!best || rule.keyword.length > best.keyword.length)) {
      best = rule;
    }
  }
  return best;
}

export function matchesErrorKeyword(line: string, table: StageTable): boolean {
  const lower = line.toLowerCase();
  return table.errorKeywords.some((keyword) => lower.includes(keyword));
}

function fallbackIncrement(progress: number, stage: string, table: StageTable): number {
  if (table.categories.generation.includes(stage)) {
    return Math.min(2, (100 - progress) * 0.08);
  }
  if (table.categories.loading.includes(stage)) {
    return Math.min(5, (30 - progress) * 0.2);
  }
  return Math.min(3, (100 - progress) * 0.1);
}

/**
 * Maps one line of worker output and the prior progress to the next progress value.
 *
 * Tiers, most specific first: structured extraction, stage keywords, elapsed time.
 * The result never moves progress backward. Returns null when the line carries
 * no update.
 */
export function estimateProgress(
  line: string,
  prior: PriorProgress,
  context: EstimateContext
): ProgressEstimate | null {
  if (line.trim().length === 0) {
    return null;
  }

  const { table } = context;
  const tuning = context.tuning ?? DEFAULT_PROGRESS_TUNING;

  const structured = parseStructuredProgress(line);
  if (structured !== null) {
    const rule = matchStageRule(line, table);
    return {
      progress: Math.max(prior.progress, structured),
      stage: rule ? rule.stage : prior.stage,
      estimated: false,
    };
  }

  if (matchesErrorKeyword(line, table)) {
    return { progress: prior.progress, stage: table.errorStage, estimated: true };
  }

  const rule = matchStageRule(line, table);
  if (rule) {
    return {
      progress: Math.max(prior.progress, rule.start),
      stage: rule.stage,
      estimated: true,
    };
  }

  if (context.now - prior.lastUpdate <= tuning.quiescenceMs) {
    return null;
  }

  const totalElapsed = Math.max(0, context.now - context.startedAt);
  const timeBased = Math.min(tuning.timeBasedCap, (totalElapsed / tuning.assumedTotalMs) * 100);
  const next = Math.min(
    timeBased,
    prior.progress + fallbackIncrement(prior.progress, prior.stage, table),
    tuning.fallbackCap
  );

  if (next <= prior.progress) {
    return null;
  }

  return { progress: next, stage: prior.stage, estimated: true };
}
