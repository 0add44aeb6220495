import { Router } from 'express';
import { StatsClient } from '../client';
import { createClubRoutes } from '../modules/clubs/clubs.routes';
import { createPlayerRoutes } from '../modules/players/players.routes';
import { createRankingRoutes } from '../modules/rankings/rankings.routes';
import { createSeasonRoutes } from '../modules/seasons/seasons.routes';

export function createRoutes(client: StatsClient): Router {
  const router = Router();

  // Health check. Does not call upstream.
  router.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      upstream: client.config.baseUrl,
      competitionId: client.config.competitionId,
    });
  });

  router.use('/seasons', createSeasonRoutes(client));
  router.use('/clubs', createClubRoutes(client));
  router.use('/players', createPlayerRoutes(client));

  // /rankings/:scope/:metric and /stat-types/:scope
  router.use('/', createRankingRoutes(client));

  return router;
}
