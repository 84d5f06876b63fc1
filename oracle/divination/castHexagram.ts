/**
 * Coin-toss hexagram casting (金钱卦).
 *
 * Three coins per line, heads 3 and tails 2, summed to 6..9. Lines are
 * built bottom to top; old lines (6, 9) move and flip in the future
 * hexagram.
 */

import { engineLogHelpers } from "../lib/engineLog.js";
import type { LogLevel } from "../lib/engineConfig.js";
import { freezeRecord } from "../lib/freezeRecord.js";
import { randomCoinSource, type CoinFace, type CoinSource } from "./coinSource.js";
import {
  HEXAGRAM_COUNT,
  hexagramByCode,
  trigramOf,
  type HexagramEntry,
  type Trigram,
} from "./hexagramTable.js";

export type LineValue = 6 | 7 | 8 | 9;

export const LINE_COUNT = 6;
export const COINS_PER_LINE = 3;

const FACE_VALUES: Record<CoinFace, 2 | 3> = { heads: 3, tails: 2 };

const LINE_KINDS: Record<LineValue, { yang: boolean; moving: boolean; label: string }> = {
  6: { yang: false, moving: true, label: "老阴" },
  7: { yang: true, moving: false, label: "少阳" },
  8: { yang: false, moving: false, label: "少阴" },
  9: { yang: true, moving: true, label: "老阳" },
};

export interface HexagramLine {
  /** 1 = bottom */
  readonly position: number;
  readonly value: LineValue;
  readonly yang: boolean;
  readonly moving: boolean;
  readonly label: string;
}

export interface HexagramFigure {
  readonly code: number;
  readonly lower_trigram: Trigram;
  readonly upper_trigram: Trigram;
  readonly hexagram: HexagramEntry;
}

export interface DerivedHexagrams {
  /** 互卦: lines 2-4 below, 3-5 above */
  readonly nuclear: HexagramFigure;
  /** 错卦: every line inverted */
  readonly shadow: HexagramFigure;
  /** 综卦: turned upside down */
  readonly mirror: HexagramFigure;
}

export interface Hexagram extends HexagramFigure {
  readonly lines: readonly HexagramLine[];
  /** Positions of moving lines, bottom first */
  readonly moving_lines: readonly number[];
  /** 变卦; null when no line moves */
  readonly future: HexagramFigure | null;
  readonly derived: DerivedHexagrams;
}

export function isLineValue(n: number): n is LineValue {
  return n === 6 || n === 7 || n === 8 || n === 9;
}

export function lineValueFromFaces(faces: readonly CoinFace[]): LineValue {
  const total = faces.reduce((sum, face) => sum + FACE_VALUES[face], 0);
  if (faces.length !== COINS_PER_LINE || !isLineValue(total)) {
    throw new RangeError(`A line takes ${COINS_PER_LINE} coins, got ${faces.length}`);
  }
  return total;
}

export function tossLine(coins: CoinSource): LineValue {
  const faces: CoinFace[] = [];
  for (let i = 0; i < COINS_PER_LINE; i++) faces.push(coins.flip());
  return lineValueFromFaces(faces);
}

export function figureOf(code: number): HexagramFigure {
  const normalized = code & (HEXAGRAM_COUNT - 1);
  return {
    code: normalized,
    lower_trigram: trigramOf(normalized),
    upper_trigram: trigramOf(normalized >> 3),
    hexagram: hexagramByCode(normalized),
  };
}

export function nuclearCode(code: number): number {
  const lower = (code >> 1) & 7;
  const upper = (code >> 2) & 7;
  return lower | (upper << 3);
}

export function shadowCode(code: number): number {
  return code ^ (HEXAGRAM_COUNT - 1);
}

export function mirrorCode(code: number): number {
  let out = 0;
  for (let i = 0; i < LINE_COUNT; i++) {
    if (code & (1 << i)) out |= 1 << (LINE_COUNT - 1 - i);
  }
  return out;
}

/**
 * Build the hexagram record from six line values, bottom first.
 * Deterministic; castHexagram feeds it from coin tosses.
 */
export function hexagramFromLineValues(values: readonly LineValue[]): Hexagram {
  if (values.length !== LINE_COUNT) {
    throw new RangeError(`A hexagram has ${LINE_COUNT} lines, got ${values.length}`);
  }

  const lines: HexagramLine[] = values.map((value, i) => ({
    position: i + 1,
    value,
    ...LINE_KINDS[value],
  }));

  let code = 0;
  let movingMask = 0;
  for (const line of lines) {
    const bit = 1 << (line.position - 1);
    if (line.yang) code |= bit;
    if (line.moving) movingMask |= bit;
  }

  return freezeRecord({
    ...figureOf(code),
    lines,
    moving_lines: lines.filter((l) => l.moving).map((l) => l.position),
    future: movingMask === 0 ? null : figureOf(code ^ movingMask),
    derived: {
      nuclear: figureOf(nuclearCode(code)),
      shadow: figureOf(shadowCode(code)),
      mirror: figureOf(mirrorCode(code)),
    },
  });
}

export interface CastHexagramOptions {
  /** Defaults to a fresh crypto-backed source per cast */
  coins?: CoinSource;
  logLevel?: LogLevel;
}

export function castHexagram(options: CastHexagramOptions = {}): Hexagram {
  const coins = options.coins ?? randomCoinSource();

  const values: LineValue[] = [];
  for (let i = 0; i < LINE_COUNT; i++) values.push(tossLine(coins));

  const hexagram = hexagramFromLineValues(values);

  engineLogHelpers.castSucceeded(
    {
      hexagram: hexagram.hexagram.number,
      future_hexagram: hexagram.future ? hexagram.future.hexagram.number : null,
      moving_lines: hexagram.moving_lines.length,
    },
    options.logLevel
  );

  return hexagram;
}
