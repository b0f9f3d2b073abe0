import { Router } from 'express';
import { GAME_IDS } from '../../core/games.js';
import { accuracyDiagnostics, autoCalculateAccuracy } from '../../services/accuracyService.js';
import { requireGame } from '../../util/validation.js';
import { asyncHandler } from '../middleware.js';
import { optionalGameBodySchema, parseInput } from '../schemas.js';
import type { ApiDeps } from '../server.js';

export function createAccuracyRouter(deps: Pick<ApiDeps, 'draws' | 'predictions' | 'accuracy'>): Router {
  const router = Router();

  // POST /api/accuracy/auto-calculate { gameId? }
  router.post('/auto-calculate', asyncHandler(async (req, res) => {
    const { gameId } = parseInput(optionalGameBodySchema, req.body);
    const gameIds = gameId ? [requireGame(gameId).id] : [...GAME_IDS];
    const calculated = await autoCalculateAccuracy(gameIds, deps);
    res.json({ success: true, calculated });
  }));

  // GET /api/accuracy/diagnostics/:gameId
  router.get('/diagnostics/:gameId', asyncHandler(async (req, res) => {
    const game = requireGame(req.params.gameId);
    res.json(await accuracyDiagnostics(game, deps));
  }));

  return router;
}
