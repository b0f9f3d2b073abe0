/**
 * Sheet Fetcher
 *
 * Downloads a game's spreadsheet as CSV and decodes it into a header row plus
 * data rows. Every failure mode is returned as a structured outcome so the
 * caller can abandon one game without affecting the others.
 */

import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import type { GameConfig } from '../core/games.js';
import { SourceUnavailableError, toError } from '../errors/index.js';
import { sheetCsvUrl, type SheetSource } from '../http/sheetsClient.js';
import { httpGet } from '../util/http.js';

export interface SheetTable {
  header: string[];
  rows: string[][];
}

export type SheetFetchResult =
  | { ok: true; url: string; table: SheetTable }
  | { ok: false; error: SourceUnavailableError };

export interface FetchSheetOptions {
  source?: SheetSource;
  timeoutMs?: number;
}

const csvRowsSchema = z.array(z.array(z.string()));

/**
 * Decodes CSV text into a table
 *
 * @throws Error when the text is not valid CSV
 */
export function decodeCsv(text: string): SheetTable {
  const decoded = csvRowsSchema.parse(parse(text, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true
  }));

  const [header = [], ...rows] = decoded;
  return { header, rows };
}

/**
 * Fetches and decodes the CSV export of a game's spreadsheet
 *
 * Failure outcomes:
 * - network error or timeout
 * - non-2xx status (a 4xx usually means the sheet is not publicly readable)
 * - an HTML page instead of CSV (sign-in interstitial for private sheets)
 * - text that fails CSV decoding
 * - CSV without a header row
 */
export async function fetchSheet(game: GameConfig, options: FetchSheetOptions = {}): Promise<SheetFetchResult> {
  const url = sheetCsvUrl(game, options.source);
  const fail = (message: string, cause?: Error): SheetFetchResult => {
    logger.warn({ gameId: game.id, url, err: cause }, message);
    return { ok: false, error: new SourceUnavailableError(message, game.id, url, cause) };
  };

  let res;
  try {
    res = await httpGet<string>(url, {
      responseType: 'text',
      timeoutMs: options.timeoutMs ?? cfg.sheets.timeoutMs
    });
  } catch (err) {
    return fail(`Could not reach sheet for ${game.id}`, toError(err));
  }

  if (res.status < 200 || res.status >= 300) {
    return fail(`Sheet for ${game.id} returned HTTP ${res.status}; make sure it is publicly readable`);
  }

  const text = typeof res.data === 'string' ? res.data : '';
  if (res.contentType?.includes('text/html') || text.trimStart().startsWith('<')) {
    return fail(`Sheet for ${game.id} returned HTML instead of CSV`);
  }

  let table: SheetTable;
  try {
    table = decodeCsv(text);
  } catch (err) {
    return fail(`Sheet for ${game.id} is not valid CSV`, toError(err));
  }
  if (table.header.length === 0) {
    return fail(`Sheet for ${game.id} returned no header row`);
  }

  logger.info({ gameId: game.id, rows: table.rows.length, columns: table.header }, 'sheet fetched');
  return { ok: true, url, table };
}
