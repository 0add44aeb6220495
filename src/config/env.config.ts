import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigurationException } from '../utils/exceptions';

dotenv.config();

const intFromString = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .refine((val) => /^\d+$/.test(val), { message: 'must be a non-negative integer' })
    .transform((val) => parseInt(val, 10));

const secondsFromString = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .refine((val) => /^\d+(\.\d+)?$/.test(val), { message: 'must be a non-negative number of seconds' })
    .transform((val) => parseFloat(val));

const envSchema = z.object({
  // Upstream API
  STATS_API_BASE_URL: z.string().url().default('https://footballapi.pulselive.com/football/'),
  REQUEST_TIMEOUT_SECONDS: secondsFromString('30'),
  MAX_RETRIES: intFromString('3'),
  RETRY_DELAY_SECONDS: secondsFromString('1'),
  PAGE_SIZE: intFromString('100'),

  // Competition
  COMPETITION_ID: intFromString('1'),
  COMPETITION_CODE: z.string().min(1).default('EN_PR'),
  CLUB_PAGE_SIZE: intFromString('20'),
  PLAYER_PAGE_SIZE: intFromString('50'),

  // Output
  OUTPUT_FORMAT: z.enum(['json', 'table']).default('json'),

  // Caching is not implemented; the flag is accepted and ignored
  CACHE_ENABLED: z
    .string()
    .default('false')
    .transform((val) => val === 'true'),

  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: intFromString('5000'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  CORS_ORIGINS: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse an environment-like record. Exposed separately from `env` so callers
 * and tests can validate a source other than process.env.
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationException('Invalid environment configuration', details);
  }
  return result.data;
}

export const env = parseEnv();
