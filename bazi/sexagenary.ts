/**
 * The sixty-term stem-branch cycle (六十甲子).
 * Layer 0: position, decade void and nayin lookup only.
 */

import {
  BRANCHES,
  STEMS,
  branchIndex,
  stemIndex,
  type Branch,
  type FiveElement,
  type Stem,
} from "./elementCycle.js";

export const CYCLE_LENGTH = 60;

/**
 * Nayin names, one per consecutive pair of the cycle (甲子/乙丑 → 海中金 …).
 */
const NAYIN: ReadonlyArray<{ label: string; element: FiveElement }> = [
  { label: "海中金", element: "metal" },
  { label: "炉中火", element: "fire" },
  { label: "大林木", element: "wood" },
  { label: "路旁土", element: "earth" },
  { label: "剑锋金", element: "metal" },
  { label: "山头火", element: "fire" },
  { label: "涧下水", element: "water" },
  { label: "城头土", element: "earth" },
  { label: "白蜡金", element: "metal" },
  { label: "杨柳木", element: "wood" },
  { label: "泉中水", element: "water" },
  { label: "屋上土", element: "earth" },
  { label: "霹雳火", element: "fire" },
  { label: "松柏木", element: "wood" },
  { label: "长流水", element: "water" },
  { label: "沙中金", element: "metal" },
  { label: "山下火", element: "fire" },
  { label: "平地木", element: "wood" },
  { label: "壁上土", element: "earth" },
  { label: "金箔金", element: "metal" },
  { label: "覆灯火", element: "fire" },
  { label: "天河水", element: "water" },
  { label: "大驿土", element: "earth" },
  { label: "钗钏金", element: "metal" },
  { label: "桑柘木", element: "wood" },
  { label: "大溪水", element: "water" },
  { label: "沙中土", element: "earth" },
  { label: "天上火", element: "fire" },
  { label: "石榴木", element: "wood" },
  { label: "大海水", element: "water" },
];

export interface Nayin {
  label: string;
  element: FiveElement;
}

/** A stem and branch form a cycle term only when they share polarity. */
export function isSexagenaryPair(stem: Stem, branch: Branch): boolean {
  return stemIndex(stem) % 2 === branchIndex(branch) % 2;
}

/**
 * Zero-based position in the sixty cycle (甲子 = 0, 癸亥 = 59).
 * Callers must pass a valid pair; see isSexagenaryPair.
 */
export function cycleIndex(stem: Stem, branch: Branch): number {
  const s = stemIndex(stem);
  const b = branchIndex(branch);
  // smallest n with n ≡ s (mod 10) and n ≡ b (mod 12)
  return (6 * s - 5 * b + CYCLE_LENGTH * 5) % CYCLE_LENGTH;
}

export function pillarAt(index: number): { stem: Stem; branch: Branch } {
  const n = ((index % CYCLE_LENGTH) + CYCLE_LENGTH) % CYCLE_LENGTH;
  return { stem: STEMS[n % 10], branch: BRANCHES[n % 12] };
}

/**
 * The two branches left over by the ten-day decade containing the pillar
 * (甲子 decade → 戌亥).
 */
export function decadeVoid(stem: Stem, branch: Branch): [Branch, Branch] {
  const diff = (branchIndex(branch) - stemIndex(stem) + 12) % 12;
  return [BRANCHES[(diff + 10) % 12], BRANCHES[(diff + 11) % 12]];
}

export function nayinOf(stem: Stem, branch: Branch): Nayin {
  const entry = NAYIN[Math.floor(cycleIndex(stem, branch) / 2)];
  return { label: entry.label, element: entry.element };
}
