import { z } from 'zod';
import { RUN_DEFAULTS } from '@sheetlift/shared';

export const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;
export type EnvLogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('log'),
  SHEETLIFT_CONFIG_SHEET: z.string().trim().min(1).default(RUN_DEFAULTS.CONFIG_SHEET),
  SHEETLIFT_SOURCE_DIRECTORY: z.string().trim().min(1).optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown> = process.env): EnvConfig {
  const result = envSchema.safeParse(config);
  if (!result.success) {
    const formatted = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${formatted}`);
  }
  return result.data;
}

/** Every Nest log level up to and including `level` */
export function logLevelsFor(level: EnvLogLevel): EnvLogLevel[] {
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);
}
