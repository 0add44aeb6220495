import { Request, Response } from 'express';
import { StatsClient } from '../../client';
import { recordSet } from '../../domain/records';
import {
  clubDetailSchema,
  clubIdParamsSchema,
  clubListSchema,
  resolveClubSchema,
} from './clubs.schemas';

export class ClubController {
  constructor(private readonly client: StatsClient) {}

  /**
   * GET /api/clubs
   */
  listClubs = async (req: Request, res: Response): Promise<void> => {
    const { season, format } = clubListSchema.parse(req.query);
    const seasonId = await this.client.seasons.toSeasonId(season);
    const clubs = await this.client.clubs.listClubs(seasonId);
    res.status(200).json(this.client.format(clubs, format));
  };

  /**
   * GET /api/clubs/table
   */
  getTable = async (req: Request, res: Response): Promise<void> => {
    const { season, format } = clubListSchema.parse(req.query);
    const seasonId = await this.client.seasons.toSeasonId(season);
    const table = await this.client.clubs.getTable(seasonId);
    res.status(200).json(this.client.format(table, format));
  };

  /**
   * GET /api/clubs/resolve?name=Arsenal
   */
  resolveClub = async (req: Request, res: Response): Promise<void> => {
    const { name, season } = resolveClubSchema.parse(req.query);
    const seasonId = await this.client.seasons.toSeasonId(season);
    const club = await this.client.clubs.resolveClub(name, seasonId);
    res.status(200).json(club);
  };

  /**
   * GET /api/clubs/:id
   * With `stat`, answers only that season stat.
   */
  getClub = async (req: Request, res: Response): Promise<void> => {
    const { id } = clubIdParamsSchema.parse(req.params);
    const { season, stat, format } = clubDetailSchema.parse(req.query);
    const seasonId = await this.client.seasons.toSeasonId(season);

    if (stat) {
      const value = await this.client.clubs.getClubStat(id, seasonId, stat);
      res.status(200).json({ clubId: id, season: seasonId, stat, value });
      return;
    }

    const detail = await this.client.clubs.getClubDetail(id, seasonId);
    res.status(200).json(this.client.format(recordSet('club-detail', [detail]), format));
  };
}
