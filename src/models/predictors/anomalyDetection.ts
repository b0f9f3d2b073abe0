/**
 * Anomaly detection adapter
 *
 * Each draw is reduced to the point (sum, ln product). A bivariate Gaussian is
 * fitted to the history; random candidate tickets are scored by Mahalanobis
 * distance and the most anomalous one beyond `epsilon` standard deviations is
 * returned. When no candidate is that far out, the one closest to the mean is.
 */

import { cfg } from '../../core/config.js';
import { sampleDistinct } from '../../util/random.js';
import { drawProduct, drawSum } from '../../services/statisticsService.js';
import { requireHistory, type PredictionAdapter } from './features.js';

export interface AnomalyDetectionParams {
  epsilon: number;
  candidates: number;
}

export interface Gaussian2D {
  mean: [number, number];
  /** Inverse covariance [[a, b], [b, d]] */
  inverse: [number, number, number];
}

// Keeps the covariance invertible when the history has no spread
const RIDGE = 1e-6;

export function toPoint(numbers: readonly number[]): [number, number] {
  return [drawSum(numbers), Math.log(drawProduct(numbers))];
}

export function fitGaussian(points: readonly [number, number][]): Gaussian2D {
  const n = points.length;
  const mx = points.reduce((s, p) => s + p[0], 0) / n;
  const my = points.reduce((s, p) => s + p[1], 0) / n;

  let sxx = 0;
  let sxy = 0;
  let syy = 0;
  for (const [x, y] of points) {
    sxx += (x - mx) ** 2;
    sxy += (x - mx) * (y - my);
    syy += (y - my) ** 2;
  }
  const a = sxx / n + RIDGE;
  const b = sxy / n;
  const d = syy / n + RIDGE;
  const det = a * d - b * b;

  return { mean: [mx, my], inverse: [d / det, -b / det, a / det] };
}

export function mahalanobis(g: Gaussian2D, point: readonly [number, number]): number {
  const dx = point[0] - g.mean[0];
  const dy = point[1] - g.mean[1];
  const [ia, ib, id] = g.inverse;
  return Math.sqrt(Math.max(0, ia * dx * dx + 2 * ib * dx * dy + id * dy * dy));
}

export function createAnomalyDetection(params: AnomalyDetectionParams = cfg.models.anomalyDetection): PredictionAdapter {
  return {
    kind: 'anomaly_detection',
    predict(input) {
      requireHistory('anomaly_detection', input);
      const gaussian = fitGaussian(input.history.map(toPoint));
      const { minNumber, maxNumber, numbersCount } = input.game;

      let mostAnomalous: { ticket: number[]; distance: number } | null = null;
      let closest: { ticket: number[]; distance: number } | null = null;

      for (let i = 0; i < Math.max(params.candidates, 1); i++) {
        const ticket = sampleDistinct(input.rng, minNumber, maxNumber, numbersCount);
        const distance = mahalanobis(gaussian, toPoint(ticket));
        if (distance > params.epsilon && (!mostAnomalous || distance > mostAnomalous.distance)) {
          mostAnomalous = { ticket, distance };
        }
        if (!closest || distance < closest.distance) {
          closest = { ticket, distance };
        }
      }

      const chosen = mostAnomalous ?? closest;
      return chosen ? chosen.ticket : sampleDistinct(input.rng, minNumber, maxNumber, numbersCount);
    }
  };
}
