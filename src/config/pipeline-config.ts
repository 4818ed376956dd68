/**
 * Pipeline configuration, validated with zod
 */

import { z } from 'zod';
import { ConfigurationError } from '../types/index.js';
import { isValidIsoDate, todayIso } from '../utils/dates.js';

const isoDateSchema = z
  .string()
  .refine(isValidIsoDate, { message: 'must be a calendar date in YYYY-MM-DD form' });

export const pipelineConfigSchema = z
  .object({
    /** Dates after this one are rejected for create and birth dates */
    referenceDate: isoDateSchema,
    minValidDate: isoDateSchema,
    maxValidDate: isoDateSchema,
    /** Allowed absolute difference between amount and quantity * |price| */
    measureTolerance: z.number().nonnegative(),
    surrogateKeyStrategy: z.enum(['recompute', 'persistent']),
    logToConsole: z.boolean()
  })
  .refine(config => config.minValidDate <= config.maxValidDate, {
    message: 'must not be after maxValidDate',
    path: ['minValidDate']
  });

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

export function defaultPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  return {
    referenceDate: todayIso(),
    minValidDate: '1900-01-01',
    maxValidDate: '2050-12-31',
    measureTolerance: 0.005,
    surrogateKeyStrategy: 'recompute',
    logToConsole: env.NODE_ENV === 'development'
  };
}

function parseFlag(value: string): boolean | string {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return value;
}

/**
 * Build the configuration from defaults, PIPELINE_* environment variables and overrides
 */
export function loadPipelineConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<PipelineConfig> = {}
): PipelineConfig {
  const fromEnv: Record<string, unknown> = {};

  if (env.PIPELINE_REFERENCE_DATE) fromEnv.referenceDate = env.PIPELINE_REFERENCE_DATE;
  if (env.PIPELINE_MIN_VALID_DATE) fromEnv.minValidDate = env.PIPELINE_MIN_VALID_DATE;
  if (env.PIPELINE_MAX_VALID_DATE) fromEnv.maxValidDate = env.PIPELINE_MAX_VALID_DATE;
  if (env.PIPELINE_MEASURE_TOLERANCE) fromEnv.measureTolerance = Number(env.PIPELINE_MEASURE_TOLERANCE);
  if (env.PIPELINE_SURROGATE_KEYS) fromEnv.surrogateKeyStrategy = env.PIPELINE_SURROGATE_KEYS;
  if (env.PIPELINE_LOG_TO_CONSOLE) fromEnv.logToConsole = parseFlag(env.PIPELINE_LOG_TO_CONSOLE);

  const parsed = pipelineConfigSchema.safeParse({
    ...defaultPipelineConfig(env),
    ...fromEnv,
    ...overrides
  });

  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return parsed.data;
}
