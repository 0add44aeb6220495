import { ClientConfig } from '../../config/client.config';
import { logger } from '../../config/logger.config';
import { canonicalMetric, getDetailMetrics } from '../../constants/stat-types';
import { matchByName, searchByName } from '../../domain/name-matching';
import {
  ComparisonRecord,
  EntityRef,
  PlayerDetailRecord,
  PlayerListRecord,
  RecordSet,
  SeasonId,
  SeasonStats,
  recordSet,
} from '../../domain/records';
import { RequestExecutor } from '../../integrations/pulselive/pulselive-api-client';
import { paginate } from '../../integrations/pulselive/paginator';
import { playerPageSchema } from '../../integrations/pulselive/pulselive.schemas';
import { normalizeDetail, normalizePlayerListItem, parseOrThrow } from '../../shared/mappers';
import {
  AmbiguousMatchException,
  ErrorCode,
  QueryException,
  ResolutionErrors,
} from '../../utils/exceptions';
import { ClubService } from '../clubs/clubs.service';

/** A raw player id, e.g. "65970". Anything else is treated as a name. */
const PLAYER_ID_PATTERN = /^\d+$/;

export class PlayerService {
  constructor(
    private readonly executor: RequestExecutor,
    private readonly config: ClientConfig,
    private readonly clubService: ClubService
  ) {}

  /**
   * Every player whose current club is a first-team club of the season.
   * Walks the paginated players endpoint to the end.
   */
  async listPlayers(season: SeasonId): Promise<RecordSet<'player-list'>> {
    const { records: clubs } = await this.clubService.listClubs(season);
    const clubIds = new Set(clubs.map((club) => club.id));

    const path = 'players';
    const items = await paginate(
      this.executor,
      path,
      { compSeasons: season, altIds: true },
      {
        pageSize: this.config.pageSize,
        extract: (body) => {
          const page = parseOrThrow(playerPageSchema, body, 'player list page', { path, season });
          return { items: page.content, pageInfo: page.pageInfo };
        },
      }
    );

    const players = items
      .map(normalizePlayerListItem)
      .filter((player) => player.clubId !== null && clubIds.has(player.clubId));

    return recordSet('player-list', players);
  }

  /**
   * All players whose name contains `name`, case- and accent-insensitively.
   */
  async searchPlayers(name: string, season: SeasonId): Promise<RecordSet<'player-list'>> {
    const { records } = await this.listPlayers(season);
    return recordSet('player-list', searchByName<PlayerListRecord>(name, records));
  }

  /**
   * Resolve a player name within a season.
   *
   * Some players exist upstream by id but are missing from the searchable
   * list; those fail with PLAYER_NOT_FOUND and must be fetched by raw id.
   */
  async resolvePlayer(name: string, season: SeasonId): Promise<EntityRef> {
    const { records } = await this.listPlayers(season);
    const result = matchByName(
      name,
      records.map((player) => ({ id: player.id, name: player.name }))
    );

    switch (result.kind) {
      case 'matched':
        return result.ref;
      case 'ambiguous':
        logger.info('Player name is ambiguous', { name, season, candidates: result.candidates.length });
        throw new AmbiguousMatchException(
          `Player name '${name}' matches several players`,
          result.candidates,
          { name, season }
        );
      case 'not-found':
        logger.info('Player name did not resolve', { name, season });
        throw ResolutionErrors.playerNotFound(name, season);
    }
  }

  async getPlayerDetail(playerId: string, season: SeasonId): Promise<PlayerDetailRecord> {
    const body = await this.executor.execute(`stats/player/${playerId}`, {
      comps: this.config.competitionId,
      compSeasons: season,
    });
    return normalizeDetail(body, 'player');
  }

  /**
   * Compare season stats across players. Each entry may be a raw player id
   * or a name; names are resolved against one shared player list. Metrics
   * must come from the player catalog.
   */
  async comparePlayers(
    players: string[],
    season: SeasonId,
    metrics: string[]
  ): Promise<RecordSet<'comparison'>> {
    const known = getDetailMetrics('player');
    const keys = metrics.map((metric) => canonicalMetric(metric, 'player'));
    const unknown = metrics.filter((_, i) => !known.includes(keys[i]));
    if (unknown.length > 0) {
      throw new QueryException(
        `Unknown player metric(s): ${unknown.join(', ')}`,
        { metrics: unknown, season },
        ErrorCode.UNKNOWN_METRIC
      );
    }

    const ids = await this.toPlayerIds(players, season);

    const records: ComparisonRecord[] = [];
    for (const id of ids) {
      const detail = await this.getPlayerDetail(id, season);
      const stats: SeasonStats = Object.fromEntries(keys.map((key) => [key, detail.seasonStats[key]]));
      records.push({
        playerId: detail.identity.id,
        playerName: detail.identity.name,
        club: detail.biography.currentClub,
        stats,
      });
    }

    return recordSet('comparison', records);
  }

  private async toPlayerIds(players: string[], season: SeasonId): Promise<string[]> {
    const names = players.filter((p) => !PLAYER_ID_PATTERN.test(p));
    if (names.length === 0) return players;

    const { records } = await this.listPlayers(season);
    const refs = records.map((player) => ({ id: player.id, name: player.name }));

    return players.map((player) => {
      if (PLAYER_ID_PATTERN.test(player)) return player;

      const result = matchByName(player, refs);
      if (result.kind === 'matched') return result.ref.id;
      if (result.kind === 'ambiguous') {
        throw new AmbiguousMatchException(
          `Player name '${player}' matches several players`,
          result.candidates,
          { name: player, season }
        );
      }
      throw ResolutionErrors.playerNotFound(player, season);
    });
  }
}
