import { Router } from 'express';
import { STATISTICS } from '../../core/constants.js';
import { computeDistribution, computeStatistics } from '../../services/statisticsService.js';
import { requireGame } from '../../util/validation.js';
import { asyncHandler } from '../middleware.js';
import type { ApiDeps } from '../server.js';

export function createStatsRouter(deps: Pick<ApiDeps, 'draws'>): Router {
  const router = Router();

  // GET /api/stats/:gameId
  router.get('/:gameId', asyncHandler(async (req, res) => {
    const game = requireGame(req.params.gameId);
    const draws = await deps.draws.getAllDraws(game.id);
    res.json(computeStatistics(game, draws, { top: STATISTICS.TOP_N }));
  }));

  // GET /api/stats/:gameId/distribution
  router.get('/:gameId/distribution', asyncHandler(async (req, res) => {
    const game = requireGame(req.params.gameId);
    const draws = await deps.draws.getAllDraws(game.id);
    res.json({ gameId: game.id, ...computeDistribution(draws) });
  }));

  return router;
}
