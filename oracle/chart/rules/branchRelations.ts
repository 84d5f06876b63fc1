import type { Branch, FiveElement } from "../../../bazi/elementCycle.js";

/**
 * Fixed branch relation tables. Pairs are unordered; self-punishment pairs
 * repeat the same branch.
 */

export interface BranchTriplet {
  readonly branches: readonly [Branch, Branch, Branch];
  readonly element: FiveElement;
}

export interface BranchPair {
  readonly branches: readonly [Branch, Branch];
  readonly element: FiveElement | null;
}

/** 三会: directional seasons. */
export const THREE_ASSEMBLIES: readonly BranchTriplet[] = [
  { branches: ["亥", "子", "丑"], element: "water" },
  { branches: ["寅", "卯", "辰"], element: "wood" },
  { branches: ["巳", "午", "未"], element: "fire" },
  { branches: ["申", "酉", "戌"], element: "metal" },
];

/** 三合: birth, peak and tomb of one element. */
export const THREE_HARMONIES: readonly BranchTriplet[] = [
  { branches: ["申", "子", "辰"], element: "water" },
  { branches: ["亥", "卯", "未"], element: "wood" },
  { branches: ["寅", "午", "戌"], element: "fire" },
  { branches: ["巳", "酉", "丑"], element: "metal" },
];

function pair(a: Branch, b: Branch, element: FiveElement | null = null): BranchPair {
  return { branches: [a, b], element };
}

/** 六合 */
export const SIX_HARMONIES: readonly BranchPair[] = [
  pair("子", "丑", "earth"),
  pair("寅", "亥", "wood"),
  pair("卯", "戌", "fire"),
  pair("辰", "酉", "metal"),
  pair("巳", "申", "water"),
  pair("午", "未", "earth"),
];

/** 六冲 */
export const SIX_CLASHES: readonly BranchPair[] = [
  pair("子", "午"),
  pair("丑", "未"),
  pair("寅", "申"),
  pair("卯", "酉"),
  pair("辰", "戌"),
  pair("巳", "亥"),
];

/** 六害 */
export const SIX_HARMS: readonly BranchPair[] = [
  pair("子", "未"),
  pair("丑", "午"),
  pair("寅", "巳"),
  pair("卯", "辰"),
  pair("申", "亥"),
  pair("酉", "戌"),
];

/** 刑: 无礼, 无恩, 恃势 and 自刑. */
export const PUNISHMENTS: readonly BranchPair[] = [
  pair("子", "卯"),
  pair("寅", "巳"),
  pair("巳", "申"),
  pair("申", "寅"),
  pair("丑", "戌"),
  pair("戌", "未"),
  pair("未", "丑"),
  pair("辰", "辰"),
  pair("午", "午"),
  pair("酉", "酉"),
  pair("亥", "亥"),
];

/** 破 */
export const BREAKS: readonly BranchPair[] = [
  pair("子", "酉"),
  pair("卯", "午"),
  pair("辰", "丑"),
  pair("未", "戌"),
  pair("寅", "亥"),
  pair("巳", "申"),
];

export function isPair(relation: BranchPair, a: Branch, b: Branch): boolean {
  const [x, y] = relation.branches;
  return (x === a && y === b) || (x === b && y === a);
}

export function findPair(table: readonly BranchPair[], a: Branch, b: Branch): BranchPair | undefined {
  return table.find((relation) => isPair(relation, a, b));
}
