import { ELEMENT_LABELS, stemCombination } from "../../bazi/elementCycle.js";
import type { Chart } from "../../bazi/schemas/chart.schema.js";
import { SIX_CLASHES, SIX_HARMONIES, findPair } from "./rules/branchRelations.js";

export type CompatibilityFindingKind =
  | "day_stem_combination"
  | "day_branch_harmony"
  | "day_branch_clash";

export interface CompatibilityFinding {
  readonly kind: CompatibilityFindingKind;
  readonly label: string;
  readonly delta: number;
}

export interface CompatibilityResult {
  /** 0-100 */
  readonly score: number;
  readonly findings: readonly CompatibilityFinding[];
  readonly same_gender: boolean;
}

export const COMPATIBILITY_BASE_SCORE = 60;

/**
 * Day-pillar comparison (夫妻宫) of two charts: stem five-combination and
 * branch six-harmony raise the score, a branch clash lowers it.
 */
export function analyzeCompatibility(a: Chart, b: Chart): CompatibilityResult {
  const findings: CompatibilityFinding[] = [];

  const stemA = a.day.stem;
  const stemB = b.day.stem;
  const combined = stemCombination(stemA, stemB);
  if (combined !== null) {
    findings.push({
      kind: "day_stem_combination",
      label: `${stemA}${stemB}合${ELEMENT_LABELS[combined]}`,
      delta: 30,
    });
  }

  const branchA = a.day.branch;
  const branchB = b.day.branch;
  if (findPair(SIX_HARMONIES, branchA, branchB)) {
    findings.push({ kind: "day_branch_harmony", label: `${branchA}${branchB}六合`, delta: 20 });
  } else if (findPair(SIX_CLASHES, branchA, branchB)) {
    findings.push({ kind: "day_branch_clash", label: `${branchA}${branchB}相冲`, delta: -10 });
  }

  const raw = findings.reduce((sum, f) => sum + f.delta, COMPATIBILITY_BASE_SCORE);

  return {
    score: Math.min(100, Math.max(0, raw)),
    findings,
    same_gender: a.gender === b.gender,
  };
}
