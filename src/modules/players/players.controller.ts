import { Request, Response } from 'express';
import { StatsClient } from '../../client';
import { recordSet } from '../../domain/records';
import {
  comparePlayersSchema,
  playerDetailSchema,
  playerIdParamsSchema,
  playerListSchema,
  resolvePlayerSchema,
  searchPlayersSchema,
} from './players.schemas';

export class PlayerController {
  constructor(private readonly client: StatsClient) {}

  /**
   * GET /api/players
   */
  listPlayers = async (req: Request, res: Response): Promise<void> => {
    const { season, format } = playerListSchema.parse(req.query);
    const seasonId = await this.client.seasons.toSeasonId(season);
    const players = await this.client.players.listPlayers(seasonId);
    res.status(200).json(this.client.format(players, format));
  };

  /**
   * GET /api/players/search?q=haaland
   */
  searchPlayers = async (req: Request, res: Response): Promise<void> => {
    const { q, season, format } = searchPlayersSchema.parse(req.query);
    const seasonId = await this.client.seasons.toSeasonId(season);
    const players = await this.client.players.searchPlayers(q, seasonId);
    res.status(200).json(this.client.format(players, format));
  };

  /**
   * GET /api/players/resolve?name=Erling Haaland
   */
  resolvePlayer = async (req: Request, res: Response): Promise<void> => {
    const { name, season } = resolvePlayerSchema.parse(req.query);
    const seasonId = await this.client.seasons.toSeasonId(season);
    const player = await this.client.players.resolvePlayer(name, seasonId);
    res.status(200).json(player);
  };

  /**
   * GET /api/players/compare?players=65970,Bukayo Saka&metrics=goals,goal_assist
   */
  comparePlayers = async (req: Request, res: Response): Promise<void> => {
    const { players, metrics, season, format } = comparePlayersSchema.parse(req.query);
    const seasonId = await this.client.seasons.toSeasonId(season);
    const comparison = await this.client.players.comparePlayers(players, seasonId, metrics);
    res.status(200).json(this.client.format(comparison, format));
  };

  /**
   * GET /api/players/:id
   */
  getPlayer = async (req: Request, res: Response): Promise<void> => {
    const { id } = playerIdParamsSchema.parse(req.params);
    const { season, format } = playerDetailSchema.parse(req.query);
    const seasonId = await this.client.seasons.toSeasonId(season);
    const detail = await this.client.players.getPlayerDetail(id, seasonId);
    res.status(200).json(this.client.format(recordSet('player-detail', [detail]), format));
  };
}
