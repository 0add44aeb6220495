import { Router } from 'express';
import { StatsClient } from '../../client';
import { validateRequest } from '../../middleware/validation.middleware';
import { asyncHandler } from '../../shared/async-handler';
import { SeasonController } from './seasons.controller';
import { resolveSeasonSchema, seasonListSchema } from './seasons.schemas';

export function createSeasonRoutes(client: StatsClient): Router {
  const controller = new SeasonController(client);
  const router = Router();

  // GET /api/seasons
  router.get('/', validateRequest(seasonListSchema), asyncHandler(controller.listSeasons));

  // GET /api/seasons/resolve?label=<label>
  router.get('/resolve', validateRequest(resolveSeasonSchema), asyncHandler(controller.resolveSeason));

  return router;
}
