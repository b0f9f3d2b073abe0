import { randomUUID } from 'crypto';
import type { EventPublisher } from '../../src/bus/kafkaProducer.js';
import type { IngestLock } from '../../src/cache/ingestLock.js';
import type { GameId } from '../../src/core/games.js';
import type { AccuracyStore } from '../../src/db/repositories/predictionAccuracy.js';
import type { DrawStore } from '../../src/db/repositories/drawResults.js';
import type { PredictionStore } from '../../src/db/repositories/predictions.js';
import type { ServiceEvent } from '../../src/models/messages.js';
import type { AccuracyRecord, DrawRecord, ParsedDraw, PredictionRecord } from '../../src/types/domain.js';

const EPOCH = Date.UTC(2024, 0, 1);

/**
 * In-memory stores sharing one clock, ordered the way the SQL queries order rows
 */
export function createMemoryStores() {
  let tick = 0;
  const nextDate = () => new Date(EPOCH + 1000 * tick++);

  const drawRows: DrawRecord[] = [];
  const predictionRows: Omit<PredictionRecord, 'resultId'>[] = [];
  const accuracyRows: AccuracyRecord[] = [];

  const byDrawOrder = (a: DrawRecord, b: DrawRecord) =>
    b.drawDate.localeCompare(a.drawDate) || a.createdAt.getTime() - b.createdAt.getTime();

  const withResult = (p: Omit<PredictionRecord, 'resultId'>): PredictionRecord => {
    const scored = accuracyRows.filter(a => a.predictionId === p.id);
    return { ...p, resultId: scored.length > 0 ? scored[scored.length - 1].resultId : null };
  };

  const draws: DrawStore = {
    async insertDraws(gameId, parsed) {
      const createdAt = nextDate();
      const stored = parsed.map(d => ({ ...d, gameId, id: randomUUID(), createdAt, numbers: [...d.numbers] }));
      drawRows.push(...stored);
      return stored;
    },
    async listDraws(gameId, page) {
      const all = drawRows.filter(d => d.gameId === gameId).sort(byDrawOrder);
      return { draws: all.slice(page.offset, page.offset + page.limit), total: all.length };
    },
    async getAllDraws(gameId) {
      return drawRows.filter(d => d.gameId === gameId).sort(byDrawOrder);
    },
    async getDraw(id) {
      return drawRows.find(d => d.id === id) ?? null;
    },
    async deleteDraws(gameId, ids) {
      let removed = 0;
      for (let i = drawRows.length - 1; i >= 0; i--) {
        if (drawRows[i].gameId === gameId && ids.includes(drawRows[i].id)) {
          drawRows.splice(i, 1);
          removed++;
        }
      }
      return removed;
    }
  };

  const predictions: PredictionStore = {
    async insertPrediction(p) {
      const row = { ...p, id: randomUUID(), createdAt: nextDate() };
      predictionRows.push(row);
      return withResult(row);
    },
    async listPredictions(gameId, limit) {
      return predictionRows
        .filter(p => p.gameId === gameId)
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
        .slice(0, limit)
        .map(withResult);
    },
    async getAllPredictions(gameId) {
      return predictionRows.filter(p => p.gameId === gameId).map(withResult);
    },
    async getPrediction(id) {
      const row = predictionRows.find(p => p.id === id);
      return row ? withResult(row) : null;
    }
  };

  const accuracy: AccuracyStore = {
    async insertAccuracy(a) {
      if (accuracyRows.some(r => r.predictionId === a.predictionId && r.resultId === a.resultId)) {
        return null;
      }
      const row = { ...a, id: randomUUID(), calculatedAt: nextDate() };
      accuracyRows.push(row);
      return row;
    },
    async listAccuracy(gameId, limit) {
      return accuracyRows
        .filter(a => a.gameId === gameId)
        .sort((a, b) => b.calculatedAt.getTime() - a.calculatedAt.getTime())
        .slice(0, limit);
    },
    async listScoredPairs(gameId) {
      return accuracyRows
        .filter(a => a.gameId === gameId)
        .map(a => ({ predictionId: a.predictionId, resultId: a.resultId }));
    }
  };

  return { draws, predictions, accuracy, drawRows, predictionRows, accuracyRows };
}

export function createMemoryLock(): IngestLock & { held: Set<GameId> } {
  const held = new Set<GameId>();
  return {
    held,
    async acquire(gameId) {
      if (held.has(gameId)) return null;
      held.add(gameId);
      return `token-${gameId}`;
    },
    async release(gameId) {
      held.delete(gameId);
    }
  };
}

export function createRecordingPublisher(): EventPublisher & { events: ServiceEvent[] } {
  const events: ServiceEvent[] = [];
  return {
    events,
    async start() {},
    async stop() {},
    async publish(event) {
      events.push(event);
    }
  };
}

/**
 * A parsed draw for tests; numbers are sorted like the row parser sorts them
 */
export function draw(gameId: GameId, drawDate: string, numbers: number[], extra: Partial<ParsedDraw> = {}): ParsedDraw {
  return {
    gameId,
    drawDate,
    drawNumber: null,
    numbers: [...numbers].sort((a, b) => a - b),
    jackpot: null,
    winners: null,
    ...extra
  };
}
