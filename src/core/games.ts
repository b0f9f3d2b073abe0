/**
 * Game Registry
 *
 * Static description of every supported lottery game: display name, number
 * range and the spreadsheet that carries its draw history. Built once at
 * process start and frozen; components receive a GameConfig explicitly.
 */

import { NUMBERS_PER_DRAW } from './constants.js';

export const GAME_IDS = [
  'ultra_lotto_6_58',
  'grand_lotto_6_55',
  'super_lotto_6_49',
  'mega_lotto_6_45',
  'lotto_6_42'
] as const;

export type GameId = typeof GAME_IDS[number];

export interface GameConfig {
  id: GameId;
  name: string;
  minNumber: number;
  maxNumber: number;
  numbersCount: number;
  /** Spreadsheet identifier used to build the CSV export URL */
  sheetId: string;
}

const DEFAULTS: Record<GameId, { name: string; maxNumber: number; sheetId: string }> = {
  ultra_lotto_6_58: { name: 'Ultra Lotto 6/58', maxNumber: 58, sheetId: '1gh6yxZuaaCdx1imvJuk0-wXtMic4fcdm' },
  grand_lotto_6_55: { name: 'Grand Lotto 6/55', maxNumber: 55, sheetId: '1kuWordaccnhHATdaZr-qRhDPhPzxhcSU' },
  super_lotto_6_49: { name: 'Super Lotto 6/49', maxNumber: 49, sheetId: '1tlAyfbtRTMXVWP-sk6V4jVW1fteZtMmq' },
  mega_lotto_6_45: { name: 'Mega Lotto 6/45', maxNumber: 45, sheetId: '1ydlcaUk_DG3XLPRcHk23tXBWvC83uPxH' },
  lotto_6_42: { name: 'Lotto 6/42', maxNumber: 42, sheetId: '1E7_PnmkJc5wDL8OnEd1aljoUm5iDzEf3' }
};

export type GameRegistry = Readonly<Record<GameId, Readonly<GameConfig>>>;

/**
 * Builds the frozen registry, applying `SHEET_ID_<GAME_ID>` overrides
 *
 * @example
 * loadGameRegistry({ SHEET_ID_LOTTO_6_42: 'abc' }).lotto_6_42.sheetId // 'abc'
 */
export function loadGameRegistry(env: NodeJS.ProcessEnv = process.env): GameRegistry {
  const build = (id: GameId): Readonly<GameConfig> => {
    const d = DEFAULTS[id];
    const override = env[`SHEET_ID_${id.toUpperCase()}`]?.trim();
    return Object.freeze({
      id,
      name: d.name,
      minNumber: 1,
      maxNumber: d.maxNumber,
      numbersCount: NUMBERS_PER_DRAW,
      sheetId: override || d.sheetId
    });
  };

  return Object.freeze({
    ultra_lotto_6_58: build('ultra_lotto_6_58'),
    grand_lotto_6_55: build('grand_lotto_6_55'),
    super_lotto_6_49: build('super_lotto_6_49'),
    mega_lotto_6_45: build('mega_lotto_6_45'),
    lotto_6_42: build('lotto_6_42')
  });
}

export const GAMES: GameRegistry = loadGameRegistry();

export function isGameId(value: string): value is GameId {
  return GAME_IDS.some(id => id === value);
}
