/**
 * Validation Utilities
 *
 * Functions for validating external inputs to prevent invalid data
 * from propagating through the system.
 */

import { GAMES, isGameId, type GameConfig } from '../core/games.js';
import { ValidationError } from '../errors/index.js';

export { ValidationError } from '../errors/index.js';

/**
 * Checks that year/month/day name a real calendar day
 *
 * JavaScript Date is lenient ('2025-02-30' rolls over to March), so the
 * components are compared after construction.
 */
function isCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    !isNaN(date.getTime()) &&
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

function toDateISO(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Parses a month/day/year date as printed in the draw sheets
 *
 * @param text - Date like '4/1/2015' or '04/01/2015'
 * @returns ISO date string, or null when the text is not a real M/D/YYYY date
 *
 * @example
 * parseMonthDayYear('4/1/2015') // '2015-04-01'
 * parseMonthDayYear('2/30/2015') // null
 */
export function parseMonthDayYear(text: string): string | null {
  const match = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(text.trim());
  if (!match) {
    return null;
  }
  const [month, day, year] = [Number(match[1]), Number(match[2]), Number(match[3])];
  return isCalendarDate(year, month, day) ? toDateISO(year, month, day) : null;
}

/**
 * Resolves a game identifier against the registry
 *
 * @throws ValidationError if the game is unknown
 */
export function requireGame(gameId: string): GameConfig {
  if (!isGameId(gameId)) {
    throw new ValidationError(`Invalid game type: ${gameId}`, 'gameId');
  }
  return GAMES[gameId];
}

/**
 * Validates a record identifier (UUID format)
 */
export function isValidRecordId(id: string): boolean {
  const uuidRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
  return uuidRegex.test(id);
}

/**
 * Validates a URL string
 *
 * @param url - URL to validate
 * @returns True if valid URL, false otherwise
 */
export function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}
