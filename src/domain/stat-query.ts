import { Scope, canonicalMetric, isKnownMetric, isScope } from '../constants/stat-types';
import { ErrorCode, QueryException } from '../utils/exceptions';
import type { SeasonId } from './records';

export interface StatQuery {
  metric: string;
  season: SeasonId;
  scope: Scope;
  pageSize: number;
  /** Maximum records to return; undefined walks every page */
  limit?: number;
}

export interface StatQueryInput {
  metric: string;
  season: SeasonId;
  scope: string;
  pageSize: number;
  limit?: number;
}

/**
 * Validate caller input into a StatQuery. The metric must belong to the
 * scope's catalog (aliases are accepted and canonicalised).
 */
export function buildStatQuery(input: StatQueryInput): StatQuery {
  const { metric, season, scope, pageSize, limit } = input;

  if (!isScope(scope)) {
    throw new QueryException(`Unknown scope '${scope}'; expected 'player' or 'club'`, { scope });
  }
  if (!isKnownMetric(metric, scope)) {
    throw new QueryException(
      `Unknown ${scope} metric '${metric}'`,
      { metric, scope, season },
      ErrorCode.UNKNOWN_METRIC
    );
  }
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new QueryException('pageSize must be a positive integer', { pageSize });
  }
  if (limit !== undefined && (!Number.isInteger(limit) || limit <= 0)) {
    throw new QueryException('limit must be a positive integer', { limit });
  }

  return { metric: canonicalMetric(metric, scope), season, scope, pageSize, limit };
}
