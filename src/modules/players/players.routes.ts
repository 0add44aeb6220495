import { Router } from 'express';
import { StatsClient } from '../../client';
import { validateRequest } from '../../middleware/validation.middleware';
import { asyncHandler } from '../../shared/async-handler';
import { PlayerController } from './players.controller';
import {
  comparePlayersSchema,
  playerDetailSchema,
  playerIdParamsSchema,
  playerListSchema,
  resolvePlayerSchema,
  searchPlayersSchema,
} from './players.schemas';

export function createPlayerRoutes(client: StatsClient): Router {
  const controller = new PlayerController(client);
  const router = Router();

  // GET /api/players
  router.get('/', validateRequest(playerListSchema), asyncHandler(controller.listPlayers));

  // GET /api/players/search?q=<query>
  router.get('/search', validateRequest(searchPlayersSchema), asyncHandler(controller.searchPlayers));

  // GET /api/players/resolve?name=<name>
  router.get('/resolve', validateRequest(resolvePlayerSchema), asyncHandler(controller.resolvePlayer));

  // GET /api/players/compare?players=<a,b>&metrics=<m1,m2>
  router.get('/compare', validateRequest(comparePlayersSchema), asyncHandler(controller.comparePlayers));

  // GET /api/players/:id
  router.get(
    '/:id',
    validateRequest(playerIdParamsSchema, 'params'),
    validateRequest(playerDetailSchema),
    asyncHandler(controller.getPlayer)
  );

  return router;
}
