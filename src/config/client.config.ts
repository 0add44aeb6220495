import { z } from 'zod';
import { env, Env } from './env.config';
import { ConfigurationException } from '../utils/exceptions';

export const OUTPUT_FORMATS = ['json', 'table'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Immutable per-client configuration. Built once and handed to the request
 * executor and services at construction; nothing reads process.env after that.
 */
export interface ClientConfig {
  readonly baseUrl: string;
  readonly timeoutSeconds: number;
  readonly maxRetries: number;
  readonly retryDelaySeconds: number;
  /** Page size for the player list walk behind listing, search and name resolution */
  readonly pageSize: number;
  readonly competitionId: number;
  /** Competition code sent as compCodeForActivePlayer */
  readonly competitionCode: string;
  /** Page size for club rankings (one page covers every club) */
  readonly clubPageSize: number;
  /** Page size for player rankings */
  readonly playerPageSize: number;
  readonly outputFormat: OutputFormat;
  readonly cacheEnabled: boolean;
}

const overridesSchema = z
  .object({
    baseUrl: z.string().url(),
    timeoutSeconds: z.number().positive(),
    maxRetries: z.number().int().min(0),
    retryDelaySeconds: z.number().min(0),
    pageSize: z.number().int().positive(),
    competitionId: z.number().int().positive(),
    competitionCode: z.string().min(1),
    clubPageSize: z.number().int().positive(),
    playerPageSize: z.number().int().positive(),
    outputFormat: z.enum(OUTPUT_FORMATS),
    cacheEnabled: z.boolean(),
  })
  .partial()
  .strict();

export type ClientConfigOverrides = z.infer<typeof overridesSchema>;

export function defaultsFromEnv(source: Env = env): ClientConfig {
  return {
    baseUrl: source.STATS_API_BASE_URL,
    timeoutSeconds: source.REQUEST_TIMEOUT_SECONDS,
    maxRetries: source.MAX_RETRIES,
    retryDelaySeconds: source.RETRY_DELAY_SECONDS,
    pageSize: source.PAGE_SIZE,
    competitionId: source.COMPETITION_ID,
    competitionCode: source.COMPETITION_CODE,
    clubPageSize: source.CLUB_PAGE_SIZE,
    playerPageSize: source.PLAYER_PAGE_SIZE,
    outputFormat: source.OUTPUT_FORMAT,
    cacheEnabled: source.CACHE_ENABLED,
  };
}

/**
 * Build a frozen ClientConfig from environment defaults plus explicit overrides.
 *
 * @example
 * const config = createClientConfig({ timeoutSeconds: 60, maxRetries: 5 });
 */
export function createClientConfig(
  overrides: ClientConfigOverrides = {},
  source: Env = env
): ClientConfig {
  const parsed = overridesSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new ConfigurationException(
      'Invalid client configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return Object.freeze({ ...defaultsFromEnv(source), ...parsed.data });
}
