import {
  controlledBy,
  generatedBy,
  generates,
  HIDDEN_STEM_SCALE,
  branchElement,
  stemElement,
  type FiveElement,
  type Stem,
} from "../../bazi/elementCycle.js";
import { PILLAR_ROLES, type Chart, type PillarRole } from "../../bazi/schemas/chart.schema.js";
import { STRENGTH_POLICY_V1, type StrengthPolicyV1 } from "./policy/strengthPolicy.v1.js";
import {
  SELF_PARTY_GODS,
  hiddenTenGodsOf,
  type TenGod,
  type TenGodMapping,
} from "./resolveTenGods.js";

export type StrengthLabel = "strong" | "weak";

export interface StrengthContribution {
  readonly role: PillarRole;
  readonly position: "stem" | "branch";
  readonly stem: Stem;
  readonly ten_god: TenGod;
  readonly points: number;
}

export interface StrengthResult {
  readonly label: StrengthLabel;
  readonly score: number;
  readonly threshold: number;
  readonly in_season: boolean;
  readonly favorable_elements: readonly FiveElement[];
  readonly contributions: readonly StrengthContribution[];
  readonly policy_version: string;
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/** 得令: the month branch is the day master's element or its resource. */
export function isInSeason(chart: Chart): boolean {
  const self = stemElement(chart.day.stem);
  const month = branchElement(chart.month.branch);
  return month === self || month === generatedBy(self);
}

export function favorableElements(dayMaster: Stem, label: StrengthLabel): FiveElement[] {
  const self = stemElement(dayMaster);
  return label === "weak" ? [self, generatedBy(self)] : [controlledBy(self), generates(self)];
}

export function scoreStrength(
  chart: Chart,
  tenGods: TenGodMapping,
  policy: StrengthPolicyV1 = STRENGTH_POLICY_V1
): StrengthResult {
  const contributions: StrengthContribution[] = [];

  for (const role of PILLAR_ROLES) {
    const stemWeight = policy.weights.stems[role];
    const visible = tenGods.visible[role];
    if (stemWeight > 0 && SELF_PARTY_GODS.has(visible)) {
      contributions.push({
        role,
        position: "stem",
        stem: chart[role].stem,
        ten_god: visible,
        points: stemWeight,
      });
    }

    const branchWeight = policy.weights.branches[role];
    for (const hidden of hiddenTenGodsOf(chart, tenGods, role)) {
      if (branchWeight > 0 && SELF_PARTY_GODS.has(hidden.ten_god)) {
        contributions.push({
          role,
          position: "branch",
          stem: hidden.stem,
          ten_god: hidden.ten_god,
          points: round2((branchWeight * hidden.weight) / HIDDEN_STEM_SCALE),
        });
      }
    }
  }

  const score = round2(contributions.reduce((sum, c) => sum + c.points, 0));
  const inSeason = isInSeason(chart);
  const threshold = inSeason ? policy.thresholds.in_season : policy.thresholds.out_of_season;
  const label: StrengthLabel = score >= threshold ? "strong" : "weak";

  return {
    label,
    score,
    threshold,
    in_season: inSeason,
    favorable_elements: favorableElements(chart.day.stem, label),
    contributions,
    policy_version: policy.strength_policy_version,
  };
}
