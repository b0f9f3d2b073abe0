/**
 * Row Parser
 *
 * Turns the decoded rows of a game's sheet into normalized draws. Rows for a
 * different game are skipped; rows that cannot be normalized are rejected
 * individually. Neither stops the batch.
 */

import { logger } from '../core/logger.js';
import type { GameConfig } from '../core/games.js';
import type { ParsedDraw } from '../types/domain.js';
import { parseMonthDayYear } from '../util/validation.js';
import type { SheetTable } from './sheetFetcher.js';

export interface ParseOutcome {
  draws: ParsedDraw[];
  /** Data rows examined (header excluded) */
  rowCount: number;
  rejected: number;
  /** Rows whose game column names another game */
  skipped: number;
  /** Rows were present but none produced a draw; usually a layout change in the sheet */
  systemicFailure: boolean;
}

interface ColumnRule {
  exact: string[];
  contains?: string;
}

const COLUMN_RULES = {
  game: { exact: ['LOTTO GAME', 'GAME'], contains: 'GAME' },
  combination: { exact: ['COMBINATIONS', 'COMBINATION'], contains: 'COMBINATION' },
  drawDate: { exact: ['DRAW DATE', 'DATE'], contains: 'DATE' },
  jackpot: { exact: ['JACKPOT'], contains: 'JACKPOT' },
  winners: { exact: ['WINNERS', 'WINNER'], contains: 'WINNER' },
  drawNumber: { exact: ['DRAW NUMBER', 'DRAW NO', 'DRAW NO.', 'DRAW #'] }
} satisfies Record<string, ColumnRule>;

type ColumnName = keyof typeof COLUMN_RULES;
const COLUMN_NAMES: ColumnName[] = ['game', 'combination', 'drawDate', 'jackpot', 'winners', 'drawNumber'];
type ColumnMap = Partial<Record<ColumnName, number>>;

// Upper bounds of the jackpot NUMERIC(15, 2) and winners INTEGER columns
const MAX_JACKPOT = 1e13;
const MAX_WINNERS = 2147483647;

const SNIFF_SAMPLE = 5;

function findColumn(header: string[], rule: ColumnRule): number | undefined {
  const names = header.map(h => h.trim().toUpperCase());
  for (const candidate of rule.exact) {
    const idx = names.indexOf(candidate);
    if (idx !== -1) return idx;
  }
  if (rule.contains) {
    const needle = rule.contains;
    const idx = names.findIndex(n => n.includes(needle));
    if (idx !== -1) return idx;
  }
  return undefined;
}

/**
 * Locates each known column by header name, case-insensitively
 */
export function resolveColumns(header: string[]): ColumnMap {
  const map: ColumnMap = {};
  for (const name of COLUMN_NAMES) {
    const idx = findColumn(header, COLUMN_RULES[name]);
    if (idx !== undefined) map[name] = idx;
  }
  return map;
}

function looksLikeCombination(text: string): boolean {
  const parts = text.split('-').map(p => p.trim());
  return parts.length === 6 && parts.every(p => /^\d+$/.test(p));
}

function looksLikeDrawDate(text: string): boolean {
  return /^\d{1,2}\/\d{1,2}\/(19|20)\d{2}$/.test(text);
}

function sampleColumn(rows: string[][], idx: number): string[] {
  const sample: string[] = [];
  for (const row of rows) {
    const value = (row[idx] ?? '').trim();
    if (value !== '') sample.push(value);
    if (sample.length === SNIFF_SAMPLE) break;
  }
  return sample;
}

/**
 * Fills in the combination and draw date columns from cell contents when
 * the header names did not match
 *
 * A column qualifies when every sampled non-empty cell has the expected shape.
 */
export function detectColumnsByContent(table: SheetTable, columns: ColumnMap): ColumnMap {
  const detected: ColumnMap = { ...columns };
  const width = table.rows.reduce((max, row) => Math.max(max, row.length), table.header.length);
  const taken = new Set(Object.values(detected));
  const shapes: [ColumnName, (text: string) => boolean][] = [
    ['combination', looksLikeCombination],
    ['drawDate', looksLikeDrawDate]
  ];

  for (const [name, matches] of shapes) {
    if (detected[name] !== undefined) continue;
    for (let idx = 0; idx < width; idx++) {
      if (taken.has(idx)) continue;
      const sample = sampleColumn(table.rows, idx);
      if (sample.length > 0 && sample.every(matches)) {
        detected[name] = idx;
        taken.add(idx);
        logger.info({ column: name, index: idx }, 'column detected by content');
        break;
      }
    }
  }
  return detected;
}

function normalizeGameName(name: string): string {
  return name.toLowerCase().replace(/\s+/g, '');
}

/**
 * Parses a dash-separated combination like '40-11-14-39-04-32'
 *
 * @returns The numbers ascending, or a rejection reason
 */
export function parseCombination(text: string, game: GameConfig): number[] | string {
  const tokens = text.split('-').map(t => t.trim());
  if (tokens.length !== game.numbersCount) {
    return `expected ${game.numbersCount} numbers, got ${tokens.length}`;
  }

  const numbers: number[] = [];
  for (const token of tokens) {
    if (!/^\d+$/.test(token)) return `non-integer token '${token}'`;
    const n = Number(token);
    if (n < game.minNumber || n > game.maxNumber) {
      return `number ${n} outside ${game.minNumber}..${game.maxNumber}`;
    }
    numbers.push(n);
  }

  if (new Set(numbers).size !== numbers.length) return 'repeated number';
  return numbers.sort((a, b) => a - b);
}

/**
 * Parses a jackpot amount, ignoring thousands separators and currency marks
 *
 * Amounts the jackpot column cannot store come back null.
 *
 * @example
 * parseJackpot('129,835,788.00') // 129835788
 * parseJackpot('PHP 49,500,000') // 49500000
 * parseJackpot('P49,500,000') // 49500000
 * parseJackpot('-') // null
 */
export function parseJackpot(text: string): number | null {
  const cleaned = text.replace(/php|₱|\$|,|\s/gi, '').replace(/^p/i, '');
  if (!/^\d+(\.\d+)?$/.test(cleaned)) return null;
  const amount = Number(cleaned);
  return Number.isFinite(amount) && amount < MAX_JACKPOT ? amount : null;
}

export function parseWinners(text: string): number | null {
  const cleaned = text.replace(/,|\s/g, '');
  if (!/^\d+$/.test(cleaned)) return null;
  const winners = Number(cleaned);
  return winners <= MAX_WINNERS ? winners : null;
}

/**
 * Parses every data row of a sheet for one game
 */
export function parseSheet(game: GameConfig, table: SheetTable): ParseOutcome {
  const columns = detectColumnsByContent(table, resolveColumns(table.header));
  const wanted = normalizeGameName(game.name);
  const draws: ParsedDraw[] = [];
  let rejected = 0;
  let skipped = 0;

  if (columns.combination === undefined || columns.drawDate === undefined) {
    logger.warn({ gameId: game.id, header: table.header }, 'sheet has no combination or date column');
  }

  table.rows.forEach((row, i) => {
    const cell = (idx: number | undefined): string => (idx === undefined ? '' : (row[idx] ?? '').trim());
    const reject = (reason: string): void => {
      rejected++;
      logger.debug({ gameId: game.id, row: i + 2, reason }, 'row rejected');
    };

    const gameCell = cell(columns.game);
    if (gameCell !== '' && normalizeGameName(gameCell) !== wanted) {
      skipped++;
      return;
    }

    const combination = cell(columns.combination);
    if (combination === '') return reject('missing combination');
    const numbers = parseCombination(combination, game);
    if (typeof numbers === 'string') return reject(numbers);

    const drawDate = parseMonthDayYear(cell(columns.drawDate));
    if (drawDate === null) return reject(`invalid draw date '${cell(columns.drawDate)}'`);

    const drawNumber = cell(columns.drawNumber);
    draws.push({
      gameId: game.id,
      drawDate,
      drawNumber: drawNumber === '' ? null : drawNumber,
      numbers,
      jackpot: parseJackpot(cell(columns.jackpot)),
      winners: parseWinners(cell(columns.winners))
    });
  });

  const rowCount = table.rows.length;
  const systemicFailure = rowCount > 0 && draws.length === 0;
  if (systemicFailure) {
    logger.warn({ gameId: game.id, rowCount, rejected, skipped }, 'no row of the sheet produced a draw');
  }

  return { draws, rowCount, rejected, skipped, systemicFailure };
}
