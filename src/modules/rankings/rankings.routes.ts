import { Router } from 'express';
import { StatsClient } from '../../client';
import { validateRequest } from '../../middleware/validation.middleware';
import { asyncHandler } from '../../shared/async-handler';
import { RankingController } from './rankings.controller';
import {
  rankingParamsSchema,
  rankingQuerySchema,
  statTypesParamsSchema,
  statTypesQuerySchema,
} from './rankings.schemas';

export function createRankingRoutes(client: StatsClient): Router {
  const controller = new RankingController(client);
  const router = Router();

  // GET /api/rankings/:scope/:metric?season=<season>&limit=<n>
  router.get(
    '/rankings/:scope/:metric',
    validateRequest(rankingParamsSchema, 'params'),
    validateRequest(rankingQuerySchema),
    asyncHandler(controller.getRankings)
  );

  // GET /api/stat-types/:scope?shape=list|dict
  router.get(
    '/stat-types/:scope',
    validateRequest(statTypesParamsSchema, 'params'),
    validateRequest(statTypesQuerySchema),
    asyncHandler(controller.getStatTypes)
  );

  return router;
}
