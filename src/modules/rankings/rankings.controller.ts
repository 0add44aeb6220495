import { Request, Response } from 'express';
import { StatsClient } from '../../client';
import { listStatTypes } from '../../constants/stat-types';
import {
  rankingParamsSchema,
  rankingQuerySchema,
  statTypesParamsSchema,
  statTypesQuerySchema,
} from './rankings.schemas';

export class RankingController {
  constructor(private readonly client: StatsClient) {}

  /**
   * GET /api/rankings/:scope/:metric
   */
  getRankings = async (req: Request, res: Response): Promise<void> => {
    const { scope, metric } = rankingParamsSchema.parse(req.params);
    const { season, pageSize, limit, format } = rankingQuerySchema.parse(req.query);

    const seasonId = await this.client.seasons.toSeasonId(season);
    const rankings = await this.client.rankings.getRankings({
      scope,
      metric,
      season: seasonId,
      pageSize,
      limit,
    });

    res.status(200).json(this.client.format(rankings, format));
  };

  /**
   * GET /api/stat-types/:scope
   */
  getStatTypes = async (req: Request, res: Response): Promise<void> => {
    const { scope } = statTypesParamsSchema.parse(req.params);
    const { shape } = statTypesQuerySchema.parse(req.query);
    res.status(200).json({ scope, metrics: listStatTypes(scope, shape) });
  };
}
