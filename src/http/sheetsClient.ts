/**
 * Spreadsheet Client Module
 *
 * Constructs CSV export URLs for the public spreadsheets that carry each
 * game's draw history.
 */

import { cfg } from '../core/config.js';
import type { GameConfig } from '../core/games.js';
import { isValidUrl, ValidationError } from '../util/validation.js';

export interface SheetSource {
  baseUrl: string;
  sheetName: string;
}

const defaultSource: SheetSource = {
  baseUrl: cfg.sheets.baseUrl,
  sheetName: cfg.sheets.sheetName
};

/**
 * Constructs the CSV export URL for a game's spreadsheet
 *
 * Endpoint: {baseUrl}/{sheetId}/gviz/tq?tqx=out:csv&sheet={sheetName}
 *
 * @throws ValidationError if the configured base URL is invalid
 *
 * @example
 * sheetCsvUrl(GAMES.lotto_6_42)
 * // Returns: https://docs.google.com/spreadsheets/d/<sheetId>/gviz/tq?tqx=out:csv&sheet=Sheet1
 */
export function sheetCsvUrl(game: Pick<GameConfig, 'sheetId'>, source: SheetSource = defaultSource): string {
  if (!isValidUrl(source.baseUrl)) {
    throw new ValidationError(`Invalid sheets base URL: ${source.baseUrl}`, 'baseUrl');
  }
  const base = source.baseUrl.replace(/\/+$/, '');
  const query = new URLSearchParams({ tqx: 'out:csv', sheet: source.sheetName });
  return `${base}/${encodeURIComponent(game.sheetId)}/gviz/tq?${query.toString()}`;
}
