/**
 * Ranking Mapper
 *
 * Normalizes items of `stats/ranked/{players|teams}/{metric}` into
 * RankingRecord. Player and club owners have different shapes upstream.
 */

import type { Scope } from '../../constants/stat-types';
import { isUnrecoverableRankingMetric } from '../../constants/stat-types';
import type { RankingRecord } from '../../domain/records';
import { toIdString } from '../../domain/records';
import {
  clubOwnerSchema,
  playerOwnerSchema,
  rankingItemSchema,
} from '../../integrations/pulselive/pulselive.schemas';
import { numberOrNull, orNull, parseOrThrow } from './utils';

export class RankingMapper {
  /**
   * Convert one raw ranking item. The value is null when upstream omits it,
   * sends a non-number, or the metric is one whose values cannot be read.
   */
  static fromRaw(raw: unknown, scope: Scope, metric: string): RankingRecord {
    const context = { scope, metric };
    const item = parseOrThrow(rankingItemSchema, raw, 'ranking item', context);
    const value = isUnrecoverableRankingMetric(metric, scope) ? null : numberOrNull(item.value);

    if (scope === 'player') {
      const owner = parseOrThrow(playerOwnerSchema, item.owner, 'ranking owner', context);
      return {
        scope,
        rank: orNull(item.rank),
        entityId: owner.id != null ? toIdString(owner.id) : null,
        entityName: owner.name.display,
        club: owner.currentTeam?.name ?? null,
        nationality: owner.nationalTeam?.country ?? null,
        metric,
        value,
      };
    }

    const owner = parseOrThrow(clubOwnerSchema, item.owner, 'ranking owner', context);
    return {
      scope,
      rank: orNull(item.rank),
      entityId: owner.id != null ? toIdString(owner.id) : null,
      entityName: owner.name,
      club: null,
      nationality: null,
      metric,
      value,
    };
  }

  static fromRaws(raws: unknown[], scope: Scope, metric: string): RankingRecord[] {
    return raws.map((raw) => RankingMapper.fromRaw(raw, scope, metric));
  }
}

export const normalizeRanking = RankingMapper.fromRaw;
