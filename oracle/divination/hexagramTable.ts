import { z } from "zod";
import type { FiveElement } from "../../bazi/elementCycle.js";
import { CanonDataError } from "../chart/errors.js";
import { loadCanonTable } from "../lib/loadCanonTable.js";

export const HEXAGRAM_COUNT = 64;

export const HexagramEntrySchema = z.object({
  number: z.number().int().min(1).max(HEXAGRAM_COUNT),
  /** Bit i is line i+1, counted from the bottom; 1 is yang */
  code: z.number().int().min(0).max(HEXAGRAM_COUNT - 1),
  /** Lines bottom → top as "0"/"1" */
  lines: z.string().regex(/^[01]{6}$/),
  name: z.string().min(1),
  short_name: z.string().min(1),
  pinyin: z.string().min(1),
  symbol: z.string().min(1),
});

export const HexagramTableSchema = z.object({
  version: z.string(),
  hexagrams: z.array(HexagramEntrySchema).length(HEXAGRAM_COUNT),
});

export type HexagramEntry = z.infer<typeof HexagramEntrySchema>;

export interface Trigram {
  readonly code: number;
  readonly name: string;
  readonly image: string;
  readonly symbol: string;
  readonly element: FiveElement;
}

/** Keyed by the three-bit code, bottom line least significant. */
export const TRIGRAMS: readonly Trigram[] = [
  { code: 0, name: "坤", image: "地", symbol: "☷", element: "earth" },
  { code: 1, name: "震", image: "雷", symbol: "☳", element: "wood" },
  { code: 2, name: "坎", image: "水", symbol: "☵", element: "water" },
  { code: 3, name: "兑", image: "泽", symbol: "☱", element: "metal" },
  { code: 4, name: "艮", image: "山", symbol: "☶", element: "earth" },
  { code: 5, name: "离", image: "火", symbol: "☲", element: "fire" },
  { code: 6, name: "巽", image: "风", symbol: "☴", element: "wood" },
  { code: 7, name: "乾", image: "天", symbol: "☰", element: "metal" },
];

function linesToCode(lines: string): number {
  return [...lines].reduce((code, bit, i) => (bit === "1" ? code | (1 << i) : code), 0);
}

let cachedByCode: ReadonlyMap<number, HexagramEntry> | null = null;

export function loadHexagramTable(): ReadonlyMap<number, HexagramEntry> {
  if (cachedByCode) return cachedByCode;

  const table = loadCanonTable("hexagrams.v1.json", HexagramTableSchema);
  const byCode = new Map<number, HexagramEntry>();
  for (const entry of table.hexagrams) {
    if (linesToCode(entry.lines) !== entry.code) {
      throw new CanonDataError("hexagrams.v1.json", `lines of #${entry.number} do not match its code`);
    }
    if (byCode.has(entry.code)) {
      throw new CanonDataError("hexagrams.v1.json", `code ${entry.code} appears twice`);
    }
    byCode.set(entry.code, entry);
  }

  cachedByCode = byCode;
  return byCode;
}

export function hexagramByCode(code: number): HexagramEntry {
  const entry = loadHexagramTable().get(code & (HEXAGRAM_COUNT - 1));
  if (!entry) {
    // unreachable once the table validated: 64 distinct codes in 0..63
    throw new CanonDataError("hexagrams.v1.json", `no entry for code ${code}`);
  }
  return entry;
}

export function trigramOf(code: number): Trigram {
  return TRIGRAMS[code & 7];
}
