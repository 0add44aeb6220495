import { ClientConfig } from '../../config/client.config';
import { Scope } from '../../constants/stat-types';
import { RecordSet, SeasonId, recordSet } from '../../domain/records';
import { StatQuery, buildStatQuery } from '../../domain/stat-query';
import { RequestExecutor, QueryParams } from '../../integrations/pulselive/pulselive-api-client';
import { paginate } from '../../integrations/pulselive/paginator';
import { rankingPageSchema } from '../../integrations/pulselive/pulselive.schemas';
import { RankingMapper, parseOrThrow } from '../../shared/mappers';

export interface RankingRequest {
  metric: string;
  season: SeasonId;
  scope: string;
  /** Defaults to playerPageSize or clubPageSize from config */
  pageSize?: number;
  limit?: number;
}

const RANKING_PATHS: Record<Scope, string> = {
  player: 'stats/ranked/players',
  club: 'stats/ranked/teams',
};

export class RankingService {
  constructor(
    private readonly executor: RequestExecutor,
    private readonly config: ClientConfig
  ) {}

  /**
   * Ranking table for one metric, in upstream rank order. Walks pages until
   * the ranking is exhausted or `limit` rows are collected.
   */
  async getRankings(request: RankingRequest): Promise<RecordSet<'ranking'>> {
    const query = buildStatQuery({
      ...request,
      pageSize: request.pageSize ?? this.defaultPageSize(request.scope),
    });

    const path = `${RANKING_PATHS[query.scope]}/${query.metric}`;
    const items = await paginate(this.executor, path, this.paramsFor(query), {
      pageSize: query.pageSize,
      limit: query.limit,
      extract: (body) => {
        const { stats } = parseOrThrow(rankingPageSchema, body, 'ranking page', {
          path,
          season: query.season,
        });
        return { items: stats.content, pageInfo: stats.pageInfo };
      },
    });

    return recordSet('ranking', RankingMapper.fromRaws(items, query.scope, query.metric));
  }

  private defaultPageSize(scope: string): number {
    return scope === 'club' ? this.config.clubPageSize : this.config.playerPageSize;
  }

  private paramsFor(query: StatQuery): QueryParams {
    const params: QueryParams = {
      comps: this.config.competitionId,
      compSeasons: query.season,
      altIds: true,
    };
    if (query.scope === 'player') {
      params.compCodeForActivePlayer = this.config.competitionCode;
    }
    return params;
  }
}
