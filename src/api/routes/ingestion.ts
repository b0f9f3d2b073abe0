import { Router } from 'express';
import { GAME_IDS, GAMES } from '../../core/games.js';
import { ingestGames } from '../../services/ingestionService.js';
import { requireGame } from '../../util/validation.js';
import { asyncHandler } from '../middleware.js';
import { optionalGameBodySchema, parseInput } from '../schemas.js';
import type { ApiDeps } from '../server.js';

export function createIngestionRouter(deps: ApiDeps): Router {
  const router = Router();

  // POST /api/scrape { gameId? }
  // 200 unless every requested game failed; 409 when the only requested game is already being ingested
  router.post('/', asyncHandler(async (req, res) => {
    const { gameId } = parseInput(optionalGameBodySchema, req.body);
    const games = gameId ? [requireGame(gameId)] : GAME_IDS.map(id => GAMES[id]);

    const { reports, totalAdded } = await ingestGames(games, {
      draws: deps.draws,
      publisher: deps.publisher,
      lock: deps.lock,
      fetchOptions: deps.fetchOptions,
      accuracy: { draws: deps.draws, predictions: deps.predictions, accuracy: deps.accuracy }
    });

    const failed = reports.filter(r => r.status === 'failed');
    if (failed.length === reports.length) {
      const only = reports.length === 1 ? reports[0].error : undefined;
      const status = only?.code === 'INGESTION_IN_PROGRESS' ? 409 : 500;
      res.status(status).json({
        success: false,
        reports,
        totalAdded,
        error: only ?? { code: 'INGESTION_FAILED', message: 'Ingestion failed for every requested game' }
      });
      return;
    }

    res.json({ success: true, reports, totalAdded });
  }));

  return router;
}
