import { z } from 'zod';
import { ConfigurationError } from '../types/errors';
import { LOG_LEVELS, type LogLevel } from '../utils/logger';

export const CADENCE_CHANNELS = ['call', 'email', 'combo'] as const;

export type CadenceChannel = (typeof CADENCE_CHANNELS)[number];

export interface CadenceInterval {
  attempt: number;
  minDays: number;
  maxDays: number;
  channel: CadenceChannel;
}

export interface PipelineConfig {
  databaseUrl: string | null;
  lockTimeoutMs: number;
  nameSimilarityThreshold: number;
  cadenceIntervals: readonly Readonly<CadenceInterval>[];
  logLevel: LogLevel;
}

export type PipelineConfigInput = Partial<{
  databaseUrl: string | null;
  lockTimeoutMs: number;
  nameSimilarityThreshold: number;
  cadenceIntervals: CadenceInterval[];
  logLevel: LogLevel;
}>;

export const DEFAULT_CADENCE_INTERVALS: readonly CadenceInterval[] = [
  { attempt: 1, minDays: 3, maxDays: 5, channel: 'call' },
  { attempt: 2, minDays: 5, maxDays: 7, channel: 'call' },
  { attempt: 3, minDays: 7, maxDays: 10, channel: 'email' },
  { attempt: 4, minDays: 10, maxDays: 14, channel: 'combo' },
  { attempt: 5, minDays: 14, maxDays: 21, channel: 'combo' },
];

const cadenceIntervalSchema = z.object({
  attempt: z.number().int().min(1),
  minDays: z.number().int().min(0),
  maxDays: z.number().int().min(0),
  channel: z.enum(CADENCE_CHANNELS),
});

// Attempt 1 waits the least; later attempts may only wait as long or longer.
const cadenceIntervalsSchema = z
  .array(cadenceIntervalSchema)
  .min(1, 'at least one cadence interval is required')
  .superRefine((intervals, ctx) => {
    intervals.forEach((interval, index) => {
      if (interval.minDays > interval.maxDays) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index],
          message: `attempt ${interval.attempt}: minDays ${interval.minDays} exceeds maxDays ${interval.maxDays}`,
        });
      }
      const expectedAttempt = index + 1;
      if (interval.attempt !== expectedAttempt) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index],
          message: `intervals must be ordered by attempt starting at 1; expected attempt ${expectedAttempt}, got ${interval.attempt}`,
        });
      }
      const previous = index > 0 ? intervals[index - 1] : undefined;
      if (previous && (interval.minDays < previous.minDays || interval.maxDays < previous.maxDays)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index],
          message: `attempt ${interval.attempt} interval (${interval.minDays}-${interval.maxDays}) is shorter than attempt ${previous.attempt} (${previous.minDays}-${previous.maxDays})`,
        });
      }
    });
  });

const configSchema = z.object({
  databaseUrl: z.string().min(1).nullable().default(null),
  lockTimeoutMs: z.number().int().positive().default(5000),
  nameSimilarityThreshold: z.number().min(0).max(1).default(0.85),
  cadenceIntervals: cadenceIntervalsSchema.default(() => DEFAULT_CADENCE_INTERVALS.map((interval) => ({ ...interval }))),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

const jsonText = z.string().transform((value, ctx): unknown => {
  try {
    return JSON.parse(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `not valid JSON (${error instanceof Error ? error.message : String(error)})`,
    });
    return z.NEVER;
  }
});

const envSchema = z.object({
  POSTGRES_URL: z.string().optional(),
  DATABASE_URL: z.string().optional(),
  PIPELINE_LOCK_TIMEOUT_MS: z.coerce.number().optional(),
  INTAKE_NAME_SIMILARITY_THRESHOLD: z.coerce.number().optional(),
  CADENCE_INTERVALS: jsonText.pipe(z.array(cadenceIntervalSchema)).optional(),
  PIPELINE_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

const formatIssues = (error: z.ZodError) =>
  error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message));

const deepFreeze = (config: PipelineConfig): PipelineConfig =>
  Object.freeze({
    ...config,
    cadenceIntervals: Object.freeze(config.cadenceIntervals.map((interval) => Object.freeze({ ...interval }))),
  });

/**
 * Validates and freezes a configuration. Services receive the result by
 * injection and never read the environment themselves.
 */
export const definePipelineConfig = (input: PipelineConfigInput = {}): PipelineConfig => {
  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error));
  }
  return deepFreeze(parsed.data);
};

export const loadPipelineConfig = (env: NodeJS.ProcessEnv = process.env): PipelineConfig => {
  // Blank variables count as unset.
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error));
  }

  const vars = parsed.data;
  return definePipelineConfig({
    databaseUrl: vars.POSTGRES_URL ?? vars.DATABASE_URL ?? null,
    lockTimeoutMs: vars.PIPELINE_LOCK_TIMEOUT_MS,
    nameSimilarityThreshold: vars.INTAKE_NAME_SIMILARITY_THRESHOLD,
    cadenceIntervals: vars.CADENCE_INTERVALS,
    logLevel: vars.PIPELINE_LOG_LEVEL,
  });
};
