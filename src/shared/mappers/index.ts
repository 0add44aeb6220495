/**
 * Record Normalizer
 *
 * Re-exports the mappers that turn upstream shapes into canonical records.
 *
 * @example
 * import { normalizeRanking, normalizeDetail } from '../shared/mappers';
 *
 * const row = normalizeRanking(item, 'player', 'goals');
 * const detail = normalizeDetail(blob, 'club');
 */

export { RankingMapper, normalizeRanking } from './ranking.mapper';

export { DetailMapper, normalizeDetail, statsFromList } from './detail.mapper';

export {
  ClubListMapper,
  PlayerListMapper,
  SeasonMapper,
  TableMapper,
  FIRST_TEAM,
  normalizeClubListItem,
  normalizePlayerListItem,
  normalizeTableEntry,
} from './listing.mapper';

export { numberOrNull, orNull, parseOrThrow } from './utils';
