import { Router } from 'express';
import { StatsClient } from '../../client';
import { validateRequest } from '../../middleware/validation.middleware';
import { asyncHandler } from '../../shared/async-handler';
import { ClubController } from './clubs.controller';
import {
  clubDetailSchema,
  clubIdParamsSchema,
  clubListSchema,
  resolveClubSchema,
} from './clubs.schemas';

export function createClubRoutes(client: StatsClient): Router {
  const controller = new ClubController(client);
  const router = Router();

  // GET /api/clubs
  router.get('/', validateRequest(clubListSchema), asyncHandler(controller.listClubs));

  // GET /api/clubs/table
  router.get('/table', validateRequest(clubListSchema), asyncHandler(controller.getTable));

  // GET /api/clubs/resolve?name=<name>
  router.get('/resolve', validateRequest(resolveClubSchema), asyncHandler(controller.resolveClub));

  // GET /api/clubs/:id
  router.get(
    '/:id',
    validateRequest(clubIdParamsSchema, 'params'),
    validateRequest(clubDetailSchema),
    asyncHandler(controller.getClub)
  );

  return router;
}
