export { StatsClient } from './client';
export type { StatsClientOptions } from './client';
export { createClientConfig, OUTPUT_FORMATS } from './config/client.config';
export type { ClientConfig, ClientConfigOverrides, OutputFormat } from './config/client.config';
export {
  SCOPES,
  canonicalMetric,
  getDetailMetrics,
  getRankingMetrics,
  getStatCategories,
  isKnownMetric,
  listStatTypes,
} from './constants/stat-types';
export type { Scope } from './constants/stat-types';
export * from './domain/records';
export { matchByName, normalizeName, searchByName } from './domain/name-matching';
export type { NameMatchResult } from './domain/name-matching';
export { buildStatQuery } from './domain/stat-query';
export type { StatQuery } from './domain/stat-query';
export { PulseliveApiClient } from './integrations/pulselive/pulselive-api-client';
export type { RequestExecutor, QueryParams } from './integrations/pulselive/pulselive-api-client';
export { paginate, walkPages } from './integrations/pulselive/paginator';
export {
  normalizeClubListItem,
  normalizeDetail,
  normalizePlayerListItem,
  normalizeRanking,
  normalizeTableEntry,
} from './shared/mappers';
export * from './shared/formatters';
export * from './utils/exceptions';
