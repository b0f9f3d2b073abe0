import { Router } from 'express';
import { GAME_IDS, GAMES } from '../../core/games.js';

export function createSystemRouter(): Router {
  const router = Router();

  // GET /api/health
  router.get('/health', (_req, res) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  // GET /api/games
  router.get('/games', (_req, res) => {
    res.json({
      games: GAME_IDS.map((id) => {
        const { name, minNumber, maxNumber, numbersCount } = GAMES[id];
        return { id, name, minNumber, maxNumber, numbersCount };
      })
    });
  });

  return router;
}
