import { Router } from 'express';
import { generatePredictions } from '../../services/predictionService.js';
import { scorePrediction } from '../../services/accuracyService.js';
import { isValidRecordId, requireGame, ValidationError } from '../../util/validation.js';
import { asyncHandler } from '../middleware.js';
import { accuracyQuerySchema, calculateAccuracyBodySchema, parseInput, predictionsQuerySchema } from '../schemas.js';
import type { ApiDeps } from '../server.js';

export function createPredictionsRouter(deps: ApiDeps): Router {
  const router = Router();

  // POST /api/predict/:gameId
  router.post('/predict/:gameId', asyncHandler(async (req, res) => {
    const game = requireGame(req.params.gameId);
    const run = await generatePredictions(game, {
      draws: deps.draws,
      predictions: deps.predictions,
      publisher: deps.publisher,
      adapters: deps.adapters,
      rng: deps.rng
    });
    res.json({ success: true, ...run });
  }));

  // GET /api/predictions/:gameId?limit=10
  router.get('/predictions/:gameId', asyncHandler(async (req, res) => {
    const game = requireGame(req.params.gameId);
    const { limit } = parseInput(predictionsQuerySchema, req.query);
    res.json({ predictions: await deps.predictions.listPredictions(game.id, limit) });
  }));

  // POST /api/predictions/:predictionId/calculate-accuracy { resultId, gameId }
  router.post('/predictions/:predictionId/calculate-accuracy', asyncHandler(async (req, res) => {
    const { predictionId } = req.params;
    if (!isValidRecordId(predictionId)) {
      throw new ValidationError(`Invalid prediction id: ${predictionId}`, 'predictionId');
    }
    const body = parseInput(calculateAccuracyBodySchema, req.body);
    const game = requireGame(body.gameId);

    const { accuracy, created } = await scorePrediction(predictionId, body.resultId, game.id, deps);
    res.json({
      success: true,
      created,
      numbersMatched: accuracy.numbersMatched,
      errorDistance: accuracy.errorDistance,
      metrics: accuracy.metrics
    });
  }));

  // GET /api/predictions/:gameId/accuracy?limit=100
  router.get('/predictions/:gameId/accuracy', asyncHandler(async (req, res) => {
    const game = requireGame(req.params.gameId);
    const { limit } = parseInput(accuracyQuerySchema, req.query);
    res.json({ accuracy: await deps.accuracy.listAccuracy(game.id, limit) });
  }));

  return router;
}
