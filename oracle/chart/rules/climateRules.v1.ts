/**
 * Climate Rules v1 (调候)
 *
 * Month-branch buckets and the advice shown for each day-master element.
 * Only the extreme seasons produce an urgent need.
 */

import type { Branch, FiveElement } from "../../../bazi/elementCycle.js";

export type ClimateBucket = "winter" | "summer" | "balanced";
export type CalendarSeason = "spring" | "summer" | "autumn" | "winter";

export interface ClimateRule {
  bucket: ClimateBucket;
  urgent: boolean;
  needed_element: FiveElement | null;
  /** Prefix for the status string, e.g. "cold" → "cold_wood" */
  condition: string;
  advice: string;
  advice_by_element: Partial<Record<FiveElement, string>>;
}

export const CALENDAR_SEASONS: Record<Branch, CalendarSeason> = {
  寅: "spring",
  卯: "spring",
  辰: "spring",
  巳: "summer",
  午: "summer",
  未: "summer",
  申: "autumn",
  酉: "autumn",
  戌: "autumn",
  亥: "winter",
  子: "winter",
  丑: "winter",
};

const WINTER: ClimateRule = {
  bucket: "winter",
  urgent: true,
  needed_element: "fire",
  condition: "cold",
  advice: "The chart is born in the cold months; fire is needed to warm it.",
  advice_by_element: {
    wood: "Frozen wood cannot sprout; warmth from fire comes first.",
    fire: "A winter fire goes out easily; keep fire close and feed it with wood.",
    earth: "Frozen earth grows nothing; fire has to thaw it before anything else helps.",
    metal: "Cold metal turns brittle; fire tempers it.",
    water: "Winter water freezes solid; fire keeps it moving.",
  },
};

const SUMMER: ClimateRule = {
  bucket: "summer",
  urgent: true,
  needed_element: "water",
  condition: "hot",
  advice: "The chart is born in the hot months; water is needed to cool it.",
  advice_by_element: {
    wood: "Wood withers in summer heat; water keeps its roots alive.",
    fire: "Fire at its peak burns itself out; water restrains it.",
    earth: "Parched earth cracks; water moistens it.",
    metal: "Metal softens in the summer furnace; water cools it.",
    water: "Summer water runs dry; more water is needed at its source.",
  },
};

const BALANCED: ClimateRule = {
  bucket: "balanced",
  urgent: false,
  needed_element: null,
  condition: "temperate",
  advice: "The season is temperate; follow the favorable elements of the strength verdict.",
  advice_by_element: {},
};

export const CLIMATE_RULES_V1: Record<ClimateBucket, ClimateRule> = {
  winter: WINTER,
  summer: SUMMER,
  balanced: BALANCED,
};

export function climateBucketOf(monthBranch: Branch): ClimateBucket {
  switch (CALENDAR_SEASONS[monthBranch]) {
    case "winter":
      return "winter";
    case "summer":
      return "summer";
    default:
      return "balanced";
  }
}
