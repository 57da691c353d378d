import { config } from 'dotenv';
import { z } from 'zod';
import { LEVEL_NAMES, normalizeLevelName } from './logging/levels.js';

// Load environment variables from .env file
config();

const LogLevelSchema = z.preprocess(
  (value) => (typeof value === 'string' ? normalizeLevelName(value) : value),
  z.enum(LEVEL_NAMES)
);

// Exactly "json" selects structured output; anything else means text
const LogFormatSchema = z
  .string()
  .optional()
  .transform((value): LogFormat => (value === 'json' ? 'json' : 'text'));

const FlagSchema = z
  .string()
  .optional()
  .transform((value) => value !== undefined && ['1', 'true', 'yes'].includes(value.toLowerCase()));

const EnvSchema = z.object({
  LOG_FORMAT: LogFormatSchema,
  LOG_LEVEL: LogLevelSchema.default('info'),
  LOG_TIMESTAMP: FlagSchema,
  LOG_TIMEZONE: z.string().min(1).optional(),
});

export type Env = z.infer<typeof EnvSchema>;
export type LogFormat = 'json' | 'text';

let cachedEnv: Env | null = null;

export function getEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const result = EnvSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  cachedEnv = result.data;
  return cachedEnv;
}

/**
 * Read LOG_FORMAT on its own, for when the rest of the environment is invalid.
 */
export function getLogFormat(): LogFormat {
  return LogFormatSchema.parse(process.env.LOG_FORMAT);
}

// For testing purposes - allows resetting the cached env
export function resetEnvCache(): void {
  cachedEnv = null;
}
