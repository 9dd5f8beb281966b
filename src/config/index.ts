import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { isTestEnv } from '../util/env.js';

export const ROUNDING_NAMES = [
  'up',
  'down',
  'ceil',
  'floor',
  'half_up',
  'half_down',
  'half_even',
  'half_ceil',
  'half_floor',
] as const;

export type RoundingName = (typeof ROUNDING_NAMES)[number];

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type DecimalSettings = {
  precision: number; // significant digits of engine results
  rounding: RoundingName;
};

export type AppConfig = DecimalSettings & {
  logLevel: LogLevel;
  logPretty: boolean;
};

// decimal.js accepts precision in 1..1e9
const precisionSchema = z.number().int().min(1).max(1e9);
const roundingSchema = z.string().trim().toLowerCase().pipe(z.enum(ROUNDING_NAMES));

const decimalSettingsSchema = z.object({
  precision: precisionSchema,
  rounding: roundingSchema,
}).strict();

const envSchema = z.object({
  DECIMAL_PRECISION: z.coerce.number().pipe(precisionSchema).default(28),
  DECIMAL_ROUNDING: roundingSchema.default('half_up'),
  LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).optional(),
  LOG_PRETTY: z.enum(['true', 'false', '1', '0']).transform((v) => v === 'true' || v === '1').default('false'),
});

const ENV_KEYS = ['DECIMAL_PRECISION', 'DECIMAL_ROUNDING', 'LOG_LEVEL', 'LOG_PRETTY'] as const;

let cfg: AppConfig | null = null;

// For testing: reset the cache
export function resetConfigCache() {
  cfg = null;
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function parseEnv(env: NodeJS.ProcessEnv): AppConfig {
  // Blank variables count as unset
  const raw: Record<string, string> = {};
  for (const key of ENV_KEYS) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') raw[key] = value;
  }

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigError(describeIssues(parsed.error));

  const { DECIMAL_PRECISION, DECIMAL_ROUNDING, LOG_LEVEL, LOG_PRETTY } = parsed.data;
  return {
    precision: DECIMAL_PRECISION,
    rounding: DECIMAL_ROUNDING,
    logLevel: LOG_LEVEL ?? (isTestEnv(env) ? 'silent' : 'info'),
    logPretty: LOG_PRETTY,
  };
}

/**
 * Resolve configuration from the environment.
 *
 * Without an argument, `.env` is loaded once (existing variables win) and the
 * result is cached until {@link resetConfigCache}. An explicit `env` is parsed
 * as given and never cached.
 */
export function loadConfig(env?: NodeJS.ProcessEnv): AppConfig {
  if (env) return parseEnv(env);
  if (cfg) return cfg;

  dotenv.config({ override: false });
  cfg = parseEnv(process.env);
  return cfg;
}

export function parseDecimalSettings(input: unknown): DecimalSettings {
  const parsed = decimalSettingsSchema.safeParse(input);
  if (!parsed.success) throw new ConfigError(describeIssues(parsed.error));
  return parsed.data;
}
