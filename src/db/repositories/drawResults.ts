/**
 * Draw Result Repository
 *
 * Append-only store of parsed draws. Records are inserted once and only ever
 * removed by the duplicate removal job.
 */

import { randomUUID } from 'crypto';
import { db, databaseError, withTransaction } from '../client.js';
import { drawRowSchema, validRows } from '../types.js';
import { BATCH } from '../../core/constants.js';
import { logger } from '../../core/logger.js';
import type { GameId } from '../../core/games.js';
import type { DrawRecord, Page, ParsedDraw } from '../../types/domain.js';

export interface DrawPage {
  draws: DrawRecord[];
  total: number;
}

export interface DrawStore {
  /** Appends draws; returns the stored records */
  insertDraws(gameId: GameId, draws: ParsedDraw[]): Promise<DrawRecord[]>;
  /** Newest draw date first */
  listDraws(gameId: GameId, page: Page): Promise<DrawPage>;
  /** Every stored draw of a game, newest draw date first */
  getAllDraws(gameId: GameId): Promise<DrawRecord[]>;
  getDraw(id: string): Promise<DrawRecord | null>;
  /** Returns the number of rows removed */
  deleteDraws(gameId: GameId, ids: string[]): Promise<number>;
}

const COLUMNS = 'id, game_id, draw_date, draw_number, numbers, jackpot, winners, created_at';
// Same-date rows keep ingestion order
const ORDER = 'ORDER BY draw_date DESC, created_at ASC, id ASC';

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export const pgDrawStore: DrawStore = {
  async insertDraws(gameId, draws) {
    if (draws.length === 0) return [];

    try {
      return await withTransaction(async (client) => {
        const stored: DrawRecord[] = [];
        for (const batch of chunk(draws, BATCH.INSERT_ROWS)) {
          const params: unknown[] = [];
          const tuples = batch.map((draw) => {
            const base = params.length;
            params.push(randomUUID(), gameId, draw.drawDate, draw.drawNumber, draw.numbers, draw.jackpot, draw.winners);
            return `($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4}, $${base + 5}::smallint[], $${base + 6}, $${base + 7})`;
          });

          const result = await client.query(
            `INSERT INTO draw_results (id, game_id, draw_date, draw_number, numbers, jackpot, winners)
             VALUES ${tuples.join(', ')}
             RETURNING ${COLUMNS}`,
            params
          );
          stored.push(...validRows(drawRowSchema, result.rows, 'draw_results'));
        }
        logger.info({ gameId, count: stored.length }, 'Draws inserted');
        return stored;
      });
    } catch (err) {
      throw databaseError('insert draws', err, { gameId, count: draws.length });
    }
  },

  async listDraws(gameId, page) {
    try {
      const [rows, count] = await Promise.all([
        db.query(`SELECT ${COLUMNS} FROM draw_results WHERE game_id = $1 ${ORDER} LIMIT $2 OFFSET $3`, [
          gameId,
          page.limit,
          page.offset
        ]),
        db.query('SELECT COUNT(*)::int AS total FROM draw_results WHERE game_id = $1', [gameId])
      ]);
      const total: unknown = count.rows[0]?.total;
      return {
        draws: validRows(drawRowSchema, rows.rows, 'draw_results'),
        total: typeof total === 'number' ? total : 0
      };
    } catch (err) {
      throw databaseError('list draws', err, { gameId });
    }
  },

  async getAllDraws(gameId) {
    try {
      const result = await db.query(`SELECT ${COLUMNS} FROM draw_results WHERE game_id = $1 ${ORDER}`, [gameId]);
      return validRows(drawRowSchema, result.rows, 'draw_results');
    } catch (err) {
      throw databaseError('load draws', err, { gameId });
    }
  },

  async getDraw(id) {
    try {
      const result = await db.query(`SELECT ${COLUMNS} FROM draw_results WHERE id = $1`, [id]);
      return validRows(drawRowSchema, result.rows, 'draw_results')[0] ?? null;
    } catch (err) {
      throw databaseError('get draw', err, { id });
    }
  },

  async deleteDraws(gameId, ids) {
    if (ids.length === 0) return 0;
    try {
      const result = await db.query('DELETE FROM draw_results WHERE game_id = $1 AND id = ANY($2::uuid[])', [gameId, ids]);
      return result.rowCount ?? 0;
    } catch (err) {
      throw databaseError('delete draws', err, { gameId, count: ids.length });
    }
  }
};
