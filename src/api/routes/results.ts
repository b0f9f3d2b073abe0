import { Router } from 'express';
import { requireGame } from '../../util/validation.js';
import { asyncHandler } from '../middleware.js';
import { parseInput, resultsQuerySchema } from '../schemas.js';
import type { ApiDeps } from '../server.js';

export function createResultsRouter(deps: Pick<ApiDeps, 'draws'>): Router {
  const router = Router();

  // GET /api/results/:gameId?page=1&limit=50
  router.get('/:gameId', asyncHandler(async (req, res) => {
    const game = requireGame(req.params.gameId);
    const { page, limit } = parseInput(resultsQuerySchema, req.query);

    const { draws, total } = await deps.draws.listDraws(game.id, { limit, offset: (page - 1) * limit });
    res.json({ results: draws, total, page, limit });
  }));

  return router;
}
