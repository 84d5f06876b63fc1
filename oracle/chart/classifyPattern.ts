import { stemPolarity } from "../../bazi/elementCycle.js";
import type { Chart } from "../../bazi/schemas/chart.schema.js";
import { hiddenTenGodsOf, tenGodOf, type TenGod, type TenGodMapping } from "./resolveTenGods.js";
import { regularPatternFor } from "./rules/regularPatterns.v1.js";
import {
  SPECIAL_PATTERN_RULES_V1,
  chartFacts,
  type SpecialPatternFamily,
  type SpecialPatternRule,
} from "./rules/specialPatterns.v1.js";

export interface PatternResult {
  readonly id: string;
  readonly label: string;
  readonly kind: "special" | "regular";
  readonly family: SpecialPatternFamily | "regular";
  readonly rule_id: string;
  /** Month-branch ten god behind a regular pattern. */
  readonly ten_god?: TenGod;
  readonly fallback: boolean;
}

export interface ClassifyPatternOptions {
  specialRules?: readonly SpecialPatternRule[];
}

/**
 * Exactly one pattern per chart: the first special rule that matches, else
 * the regular pattern of the month branch's primary hidden stem.
 */
export function classifyPattern(
  chart: Chart,
  tenGods: TenGodMapping,
  options: ClassifyPatternOptions = {}
): PatternResult {
  const rules = options.specialRules ?? SPECIAL_PATTERN_RULES_V1;
  const facts = chartFacts(chart);

  for (const rule of rules) {
    const match = rule.detect(facts);
    if (match) {
      return {
        id: match.id,
        label: match.label,
        kind: "special",
        family: rule.family,
        rule_id: rule.rule_id,
        fallback: false,
      };
    }
  }

  const primary = hiddenTenGodsOf(chart, tenGods, "month")[0];
  const tenGod = primary ? primary.ten_god : tenGodOf(chart.day.stem, chart.month.stem);
  const entry = regularPatternFor(tenGod, stemPolarity(chart.day.stem));

  return {
    id: entry.id,
    label: entry.label,
    kind: "regular",
    family: "regular",
    rule_id: entry.fallback ? "regular.peer_fallback" : "regular.month_primary",
    ten_god: tenGod,
    fallback: entry.fallback,
  };
}
