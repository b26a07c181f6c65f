import { z } from 'zod';

import { DEFAULT_RULES_DIR, DEFAULT_RULESET_PREFIX, LOG_LEVELS } from './constants.js';

const envSchema = z.object({
  /** Port the server listens on. */
  PORT: z
    .string()
    .default('3000')
    .transform((v) => parseInt(v, 10))
    .pipe(z.number().int().min(1).max(65535)),

  HOST: z.string().default('0.0.0.0'),

  /** Secret path segment in front of every route. */
  SECRET_URL: z.string().min(1).regex(/^[A-Za-z0-9_-]+$/, 'SECRET_URL must be a single path segment'),

  RULES_DIR: z.string().default(DEFAULT_RULES_DIR),

  RULESET_PREFIX: z.string().default(DEFAULT_RULESET_PREFIX),

  /** Punycode-encode internationalized domains in served rules. */
  ASCII_DOMAINS: z
    .enum(['true', 'false'])
    .default('true')
    .transform((v) => v === 'true'),

  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate environment variables.
 * Throws one error listing every invalid variable.
 */
export function parseEnv(raw: Record<string, string | undefined> = process.env): Env {
  const result = envSchema.safeParse(raw);
  if (!result.success) {
    const formatted = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${formatted}`);
  }
  return result.data;
}
