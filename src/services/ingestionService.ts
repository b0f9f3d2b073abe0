/**
 * Ingestion Service
 *
 * Fetch → parse → deduplicate → append, per game. A failure in one game
 * produces a failed report for that game and never aborts the others.
 */

import { logger } from '../core/logger.js';
import type { GameConfig, GameId } from '../core/games.js';
import type { EventPublisher } from '../bus/kafkaProducer.js';
import { withIngestLock, type IngestLock } from '../cache/ingestLock.js';
import type { DrawStore } from '../db/repositories/drawResults.js';
import { AppError, toError } from '../errors/index.js';
import { filterNewDraws } from '../ingest/dedupFilter.js';
import { parseSheet } from '../ingest/rowParser.js';
import { fetchSheet, type FetchSheetOptions } from '../ingest/sheetFetcher.js';
import { autoCalculateAccuracy, type AccuracyDeps } from './accuracyService.js';

export interface IngestionReport {
  gameId: GameId;
  gameName: string;
  status: 'ok' | 'failed';
  rowCount: number;
  parsed: number;
  rejected: number;
  skipped: number;
  /** Draws already stored before this run */
  existing: number;
  /** Parsed draws that passed the duplicate filter */
  newDraws: number;
  added: number;
  systemicFailure: boolean;
  error?: { code: string; message: string };
}

export interface IngestionDeps {
  draws: Pick<DrawStore, 'getAllDraws' | 'insertDraws'>;
  publisher: Pick<EventPublisher, 'publish'>;
  fetchOptions?: FetchSheetOptions;
}

export interface IngestRunDeps extends IngestionDeps {
  lock: IngestLock;
  /** When given, accuracy is recalculated for games that received new draws */
  accuracy?: AccuracyDeps;
}

export interface IngestRunResult {
  reports: IngestionReport[];
  totalAdded: number;
}

function emptyReport(game: GameConfig): IngestionReport {
  return {
    gameId: game.id,
    gameName: game.name,
    status: 'ok',
    rowCount: 0,
    parsed: 0,
    rejected: 0,
    skipped: 0,
    existing: 0,
    newDraws: 0,
    added: 0,
    systemicFailure: false
  };
}

function describeError(err: unknown): { code: string; message: string } {
  if (err instanceof AppError) {
    return { code: err.code, message: err.message };
  }
  return { code: 'INTERNAL_ERROR', message: toError(err).message };
}

/**
 * Runs one ingestion pass for a game
 *
 * Callers must serialize runs for the same game (see ingestGames).
 */
export async function ingestGame(game: GameConfig, deps: IngestionDeps): Promise<IngestionReport> {
  const report = emptyReport(game);
  const log = logger.child({ gameId: game.id });

  try {
    const fetched = await fetchSheet(game, deps.fetchOptions);
    if (!fetched.ok) {
      return { ...report, status: 'failed', error: describeError(fetched.error) };
    }

    const parsed = parseSheet(game, fetched.table);
    Object.assign(report, {
      rowCount: parsed.rowCount,
      parsed: parsed.draws.length,
      rejected: parsed.rejected,
      skipped: parsed.skipped,
      systemicFailure: parsed.systemicFailure
    });

    const existing = await deps.draws.getAllDraws(game.id);
    const { fresh } = filterNewDraws(parsed.draws, existing);
    report.existing = existing.length;
    report.newDraws = fresh.length;

    const stored = await deps.draws.insertDraws(game.id, fresh);
    report.added = stored.length;

    if (stored.length > 0) {
      await deps.publisher.publish({
        eventType: 'draws.ingested',
        gameId: game.id,
        version: 'v1',
        occurredAt: new Date().toISOString(),
        payload: {
          added: stored.length,
          drawDates: stored.map(d => d.drawDate).sort((a, b) => b.localeCompare(a))
        }
      });
    }

    log.info({ ...report }, 'Ingestion finished');
    return report;
  } catch (err) {
    log.error({ err }, 'Ingestion failed');
    return { ...report, status: 'failed', error: describeError(err) };
  }
}

/**
 * Ingests several games one after another, each under its ingestion lock
 */
export async function ingestGames(games: readonly GameConfig[], deps: IngestRunDeps): Promise<IngestRunResult> {
  const reports: IngestionReport[] = [];

  for (const game of games) {
    try {
      reports.push(await withIngestLock(deps.lock, game.id, () => ingestGame(game, deps)));
    } catch (err) {
      logger.warn({ err, gameId: game.id }, 'Ingestion skipped');
      reports.push({ ...emptyReport(game), status: 'failed', error: describeError(err) });
    }
  }

  const affected = reports.filter(r => r.added > 0).map(r => r.gameId);
  if (deps.accuracy && affected.length > 0) {
    try {
      await autoCalculateAccuracy(affected, deps.accuracy);
    } catch (err) {
      logger.warn({ err, games: affected }, 'Accuracy auto-calculation after ingestion failed');
    }
  }

  return {
    reports,
    totalAdded: reports.reduce((sum, r) => sum + r.added, 0)
  };
}
