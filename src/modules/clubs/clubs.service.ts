import { ClientConfig } from '../../config/client.config';
import { logger } from '../../config/logger.config';
import { canonicalMetric, getDetailMetrics } from '../../constants/stat-types';
import { matchByName } from '../../domain/name-matching';
import {
  ClubDetailRecord,
  ClubListRecord,
  EntityRef,
  RecordSet,
  SeasonId,
  recordSet,
} from '../../domain/records';
import { RequestExecutor } from '../../integrations/pulselive/pulselive-api-client';
import { standingsSchema, teamListSchema } from '../../integrations/pulselive/pulselive.schemas';
import {
  ClubListMapper,
  normalizeDetail,
  normalizeTableEntry,
  parseOrThrow,
} from '../../shared/mappers';
import {
  AmbiguousMatchException,
  ErrorCode,
  QueryException,
  ResolutionErrors,
} from '../../utils/exceptions';

export class ClubService {
  constructor(
    private readonly executor: RequestExecutor,
    private readonly config: ClientConfig
  ) {}

  /**
   * First-team clubs of a season (about 20). Youth and women's sides that the
   * teams endpoint also lists are dropped.
   */
  async listClubs(season: SeasonId): Promise<RecordSet<'club-list'>> {
    const path = `compseasons/${season}/teams`;
    const body = await this.executor.execute(path);
    const teams = parseOrThrow(teamListSchema, body, 'club list', { path, season });
    return recordSet('club-list', ClubListMapper.firstTeamsOnly(teams));
  }

  /**
   * Resolve a club name within a season. Full and short names both count, so
   * "Manchester City" and "Man City" resolve to the same club.
   */
  async resolveClub(name: string, season: SeasonId): Promise<EntityRef> {
    const { records } = await this.listClubs(season);
    const result = matchByName(name, clubNameVariants(records));
    const byId = new Map(records.map((club) => [club.id, club.name]));
    const withFullName = (ref: EntityRef): EntityRef => ({ id: ref.id, name: byId.get(ref.id) ?? ref.name });

    switch (result.kind) {
      case 'matched':
        return withFullName(result.ref);
      case 'ambiguous':
        logger.info('Club name is ambiguous', { name, season, candidates: result.candidates.length });
        throw new AmbiguousMatchException(
          `Club name '${name}' matches several clubs`,
          result.candidates.map(withFullName),
          { name, season }
        );
      case 'not-found':
        logger.info('Club name did not resolve', { name, season });
        throw ResolutionErrors.clubNotFound(name, season);
    }
  }

  async getClubDetail(clubId: string, season: SeasonId): Promise<ClubDetailRecord> {
    const body = await this.executor.execute(`stats/team/${clubId}`, {
      comps: this.config.competitionId,
      compSeasons: season,
    });
    return normalizeDetail(body, 'club');
  }

  /**
   * One season stat for a club. Null when the club has no value for it.
   */
  async getClubStat(clubId: string, season: SeasonId, metric: string): Promise<number | null> {
    const key = canonicalMetric(metric, 'club');
    if (!getDetailMetrics('club').includes(key)) {
      throw new QueryException(
        `Unknown club stat '${metric}'`,
        { metric, clubId, season },
        ErrorCode.UNKNOWN_METRIC
      );
    }

    const detail = await this.getClubDetail(clubId, season);
    return detail.seasonStats[key];
  }

  /**
   * League table for a season, in upstream position order.
   */
  async getTable(season: SeasonId): Promise<RecordSet<'table'>> {
    const path = `compseasons/${season}/standings`;
    const body = await this.executor.execute(path, { altIds: true });
    const { tables } = parseOrThrow(standingsSchema, body, 'standings', { path, season });
    const rows = tables.flatMap((table) => table.entries.map(normalizeTableEntry));
    return recordSet('table', rows);
  }
}

function clubNameVariants(clubs: ClubListRecord[]): EntityRef[] {
  return clubs.flatMap((club) => {
    const refs: EntityRef[] = [{ id: club.id, name: club.name }];
    if (club.shortName && club.shortName !== club.name) {
      refs.push({ id: club.id, name: club.shortName });
    }
    return refs;
  });
}
