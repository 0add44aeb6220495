import { Request, Response } from 'express';
import { StatsClient } from '../../client';
import { resolveSeasonSchema, seasonListSchema } from './seasons.schemas';

export class SeasonController {
  constructor(private readonly client: StatsClient) {}

  /**
   * GET /api/seasons
   */
  listSeasons = async (req: Request, res: Response): Promise<void> => {
    const { format } = seasonListSchema.parse(req.query);
    const seasons = await this.client.seasons.listSeasons();
    res.status(200).json(this.client.format(seasons, format));
  };

  /**
   * GET /api/seasons/resolve?label=2024/25
   */
  resolveSeason = async (req: Request, res: Response): Promise<void> => {
    const { label } = resolveSeasonSchema.parse(req.query);
    const seasonId = await this.client.seasons.resolveSeason(label);
    res.status(200).json({ label: label ?? null, seasonId });
  };
}
