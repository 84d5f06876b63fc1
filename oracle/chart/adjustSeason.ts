import { stemElement, type Branch, type FiveElement, type Stem } from "../../bazi/elementCycle.js";
import {
  CALENDAR_SEASONS,
  CLIMATE_RULES_V1,
  climateBucketOf,
  type CalendarSeason,
  type ClimateBucket,
} from "./rules/climateRules.v1.js";

export interface SeasonalNeed {
  readonly season: ClimateBucket;
  readonly calendar_season: CalendarSeason;
  readonly urgent: boolean;
  readonly needed_element: FiveElement | null;
  readonly status: string;
  readonly advice: string;
  /** Balanced months leave the recommendation to the strength verdict */
  readonly deferred_to_strength: boolean;
}

export function adjustSeason(monthBranch: Branch, dayMaster?: Stem): SeasonalNeed {
  const rule = CLIMATE_RULES_V1[climateBucketOf(monthBranch)];
  const element = dayMaster === undefined ? undefined : stemElement(dayMaster);

  return {
    season: rule.bucket,
    calendar_season: CALENDAR_SEASONS[monthBranch],
    urgent: rule.urgent,
    needed_element: rule.needed_element,
    status: element ? `${rule.condition}_${element}` : rule.condition,
    advice: (element && rule.advice_by_element[element]) || rule.advice,
    deferred_to_strength: !rule.urgent,
  };
}
