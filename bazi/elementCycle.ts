/**
 * Pure tables for the ten stems, twelve branches and the five-element cycles.
 * Layer 0: no interpretation, only the fixed alphabet the engine classifies.
 */

export const STEMS = ["甲", "乙", "丙", "丁", "戊", "己", "庚", "辛", "壬", "癸"] as const;

export const BRANCHES = [
  "子",
  "丑",
  "寅",
  "卯",
  "辰",
  "巳",
  "午",
  "未",
  "申",
  "酉",
  "戌",
  "亥",
] as const;

export const ELEMENTS = ["wood", "fire", "earth", "metal", "water"] as const;

export type Stem = (typeof STEMS)[number];
export type Branch = (typeof BRANCHES)[number];
export type FiveElement = (typeof ELEMENTS)[number];
export type Polarity = "yang" | "yin";

export type HiddenStemRank = "primary" | "secondary" | "tertiary";

export interface HiddenStem {
  stem: Stem;
  rank: HiddenStemRank;
  weight: number;
}

/** Hidden-stem weights of every branch sum to this value. */
export const HIDDEN_STEM_SCALE = 10;

export const ELEMENT_LABELS: Record<FiveElement, string> = {
  wood: "木",
  fire: "火",
  earth: "土",
  metal: "金",
  water: "水",
};

const STEM_ELEMENTS: Record<Stem, FiveElement> = {
  甲: "wood",
  乙: "wood",
  丙: "fire",
  丁: "fire",
  戊: "earth",
  己: "earth",
  庚: "metal",
  辛: "metal",
  壬: "water",
  癸: "water",
};

const BRANCH_ELEMENTS: Record<Branch, FiveElement> = {
  子: "water",
  丑: "earth",
  寅: "wood",
  卯: "wood",
  辰: "earth",
  巳: "fire",
  午: "fire",
  未: "earth",
  申: "metal",
  酉: "metal",
  戌: "earth",
  亥: "water",
};

const RANKS: readonly HiddenStemRank[] = ["primary", "secondary", "tertiary"];

function hidden(...entries: Array<[Stem, number]>): readonly HiddenStem[] {
  return entries.map(([stem, weight], i) => ({ stem, weight, rank: RANKS[i] ?? "tertiary" }));
}

/**
 * Hidden stems per branch, ordered primary → secondary → tertiary.
 * Order matters: pattern classification reads the primary entry.
 */
const BRANCH_HIDDEN_STEMS: Record<Branch, readonly HiddenStem[]> = {
  子: hidden(["癸", 10]),
  丑: hidden(["己", 6], ["癸", 3], ["辛", 1]),
  寅: hidden(["甲", 6], ["丙", 3], ["戊", 1]),
  卯: hidden(["乙", 10]),
  辰: hidden(["戊", 6], ["乙", 3], ["癸", 1]),
  巳: hidden(["丙", 6], ["戊", 3], ["庚", 1]),
  午: hidden(["丁", 7], ["己", 3]),
  未: hidden(["己", 6], ["丁", 3], ["乙", 1]),
  申: hidden(["庚", 6], ["壬", 3], ["戊", 1]),
  酉: hidden(["辛", 10]),
  戌: hidden(["戊", 6], ["辛", 3], ["丁", 1]),
  亥: hidden(["壬", 7], ["甲", 3]),
};

const GENERATES: Record<FiveElement, FiveElement> = {
  wood: "fire",
  fire: "earth",
  earth: "metal",
  metal: "water",
  water: "wood",
};

const CONTROLS: Record<FiveElement, FiveElement> = {
  wood: "earth",
  earth: "water",
  water: "fire",
  fire: "metal",
  metal: "wood",
};

function invert(map: Record<FiveElement, FiveElement>): Record<FiveElement, FiveElement> {
  const out = { ...map };
  for (const element of ELEMENTS) {
    out[map[element]] = element;
  }
  return out;
}

const GENERATED_BY = invert(GENERATES);
const CONTROLLED_BY = invert(CONTROLS);

const STEM_SET: ReadonlySet<string> = new Set<Stem>(STEMS);
const BRANCH_SET: ReadonlySet<string> = new Set<Branch>(BRANCHES);

export function isStem(value: unknown): value is Stem {
  return typeof value === "string" && STEM_SET.has(value);
}

export function isBranch(value: unknown): value is Branch {
  return typeof value === "string" && BRANCH_SET.has(value);
}

export function stemIndex(stem: Stem): number {
  return STEMS.indexOf(stem);
}

export function branchIndex(branch: Branch): number {
  return BRANCHES.indexOf(branch);
}

export function stemElement(stem: Stem): FiveElement {
  return STEM_ELEMENTS[stem];
}

export function branchElement(branch: Branch): FiveElement {
  return BRANCH_ELEMENTS[branch];
}

export function stemPolarity(stem: Stem): Polarity {
  return stemIndex(stem) % 2 === 0 ? "yang" : "yin";
}

export function branchPolarity(branch: Branch): Polarity {
  return branchIndex(branch) % 2 === 0 ? "yang" : "yin";
}

export function hiddenStems(branch: Branch): readonly HiddenStem[] {
  return BRANCH_HIDDEN_STEMS[branch];
}

export function primaryHiddenStem(branch: Branch): Stem {
  return BRANCH_HIDDEN_STEMS[branch][0].stem;
}

/** The element `element` generates (wood → fire). */
export function generates(element: FiveElement): FiveElement {
  return GENERATES[element];
}

/** The element that generates `element` (fire → wood). */
export function generatedBy(element: FiveElement): FiveElement {
  return GENERATED_BY[element];
}

/** The element `element` controls (wood → earth). */
export function controls(element: FiveElement): FiveElement {
  return CONTROLS[element];
}

/** The element that controls `element` (wood → metal). */
export function controlledBy(element: FiveElement): FiveElement {
  return CONTROLLED_BY[element];
}

export type ElementRelation = "same" | "generates" | "generated_by" | "controls" | "controlled_by";

/**
 * Relation of `target` as seen from `reference`.
 * "generates" means the reference generates the target.
 */
export function elementRelation(reference: FiveElement, target: FiveElement): ElementRelation {
  if (reference === target) return "same";
  if (GENERATES[reference] === target) return "generates";
  if (GENERATED_BY[reference] === target) return "generated_by";
  if (CONTROLS[reference] === target) return "controls";
  return "controlled_by";
}

/** 禄: the branch where each stem holds office. */
const PROSPERITY_BRANCH: Record<Stem, Branch> = {
  甲: "寅",
  乙: "卯",
  丙: "巳",
  丁: "午",
  戊: "巳",
  己: "午",
  庚: "申",
  辛: "酉",
  壬: "亥",
  癸: "子",
};

export function prosperityBranch(stem: Stem): Branch {
  return PROSPERITY_BRANCH[stem];
}

/** 五合: stems five apart combine; the pair transforms into this element. */
const COMBINED_ELEMENT: readonly FiveElement[] = ["earth", "metal", "water", "wood", "fire"];

export function stemCombination(a: Stem, b: Stem): FiveElement | null {
  const i = stemIndex(a);
  const j = stemIndex(b);
  if (Math.abs(i - j) !== 5) return null;
  return COMBINED_ELEMENT[Math.min(i, j)];
}
