/**
 * Special Patterns v1
 *
 * Predicates for the 外格 families. Families are checked in the order of
 * SPECIAL_PATTERN_RULES_V1 and the first match wins, so a chart that is both
 * 魁罡 and 日禄归时 reports the day_hour pattern.
 */

import {
  branchElement,
  prosperityBranch,
  stemCombination,
  stemElement,
  type Branch,
  type FiveElement,
  type Stem,
  ELEMENT_LABELS,
} from "../../../bazi/elementCycle.js";
import type { Chart } from "../../../bazi/schemas/chart.schema.js";
import { pillarsOf } from "../parseChart.js";

export type SpecialPatternFamily =
  | "chong_ben"
  | "yao_he"
  | "day_hour"
  | "pure_image"
  | "transformation";

export interface ChartFacts {
  readonly chart: Chart;
  readonly dayMaster: Stem;
  readonly stems: readonly Stem[];
  readonly branches: readonly Branch[];
  count(branch: Branch): number;
  has(branch: Branch): boolean;
  hasStem(stem: Stem): boolean;
}

export function chartFacts(chart: Chart): ChartFacts {
  const pillars = pillarsOf(chart);
  const stems = pillars.map((p) => p.stem);
  const branches = pillars.map((p) => p.branch);
  const count = (branch: Branch) => branches.filter((b) => b === branch).length;

  return {
    chart,
    dayMaster: chart.day.stem,
    stems,
    branches,
    count,
    has: (branch) => count(branch) > 0,
    hasStem: (stem) => stems.includes(stem),
  };
}

export interface SpecialPatternMatch {
  id: string;
  label: string;
}

export interface SpecialPatternRule {
  rule_id: string;
  family: SpecialPatternFamily;
  detect(facts: ChartFacts): SpecialPatternMatch | null;
}

function rule(
  family: SpecialPatternFamily,
  id: string,
  label: string,
  predicate: (facts: ChartFacts) => boolean
): SpecialPatternRule {
  return {
    rule_id: `special.${family}.${id}`,
    family,
    detect: (facts) => (predicate(facts) ? { id, label } : null),
  };
}

function dayHourPair(facts: ChartFacts, a: Branch, b: Branch): boolean {
  const day = facts.chart.day.branch;
  const hour = facts.chart.hour.branch;
  return (day === a && hour === b) || (day === b && hour === a);
}

function allEqual<T>(values: readonly T[]): boolean {
  return values.every((v) => v === values[0]);
}

// 冲奔
const CHONG_BEN: SpecialPatternRule[] = [
  rule("chong_ben", "fei_tian_lu_ma", "飞天禄马格", (f) => {
    const { dayMaster, chart } = f;
    if ((dayMaster === "庚" || dayMaster === "壬") && chart.day.branch === "子") {
      return f.count("子") >= 3 && !f.has("午");
    }
    if ((dayMaster === "辛" || dayMaster === "癸") && chart.day.branch === "亥") {
      return f.count("亥") >= 3 && !f.has("巳");
    }
    return false;
  }),
  rule(
    "chong_ben",
    "jing_lan_cha_ma",
    "井栏叉马格",
    (f) =>
      f.dayMaster === "庚" &&
      f.has("申") &&
      f.has("子") &&
      f.has("辰") &&
      !f.has("午") &&
      !f.hasStem("丙") &&
      !f.hasStem("丁")
  ),
  rule("chong_ben", "ren_qi_long_bei", "壬骑龙背格", (f) => {
    const { chart } = f;
    if (chart.day.stem !== "壬" || chart.day.branch !== "辰" || f.has("戌")) return false;
    const chen = f.count("辰");
    const yin = f.count("寅");
    return chen >= 3 || (yin >= 1 && chen >= 2) || yin >= 3;
  }),
];

// 遥合
const YAO_HE: SpecialPatternRule[] = [
  rule(
    "yao_he",
    "zi_yao_si",
    "子遥巳格",
    (f) =>
      f.chart.day.stem === "甲" &&
      f.chart.day.branch === "子" &&
      f.chart.hour.branch === "子" &&
      !f.has("午") &&
      !f.has("丑")
  ),
  rule(
    "yao_he",
    "chou_yao_si",
    "丑遥巳格",
    (f) =>
      (f.chart.day.stem === "辛" || f.chart.day.stem === "癸") &&
      f.chart.day.branch === "丑" &&
      f.chart.hour.branch === "丑" &&
      !f.has("巳") &&
      !f.has("子")
  ),
];

const DAY_HOUR: SpecialPatternRule[] = [
  rule("day_hour", "liu_yi_shu_gui", "六乙鼠贵格", (f) => f.dayMaster === "乙" && f.chart.hour.branch === "子"),
  rule("day_hour", "liu_yin_chao_yang", "六阴朝阳格", (f) => f.dayMaster === "辛" && f.chart.hour.branch === "子"),
  rule(
    "day_hour",
    "xing_he",
    "刑合格",
    (f) => f.dayMaster === "癸" && f.chart.hour.stem === "甲" && f.chart.hour.branch === "寅"
  ),
  rule("day_hour", "gong_lu", "拱禄格", (f) => {
    if (f.dayMaster === "癸") return dayHourPair(f, "亥", "丑");
    if (f.dayMaster === "丁" || f.dayMaster === "己") return dayHourPair(f, "巳", "未");
    return false;
  }),
  rule("day_hour", "gong_gui", "拱贵格", (f) => f.dayMaster === "甲" && dayHourPair(f, "申", "戌")),
  rule(
    "day_hour",
    "ri_lu_gui_shi",
    "日禄归时格",
    (f) => f.chart.hour.branch === prosperityBranch(f.dayMaster)
  ),
];

const KUI_GANG_DAYS = new Set(["戊戌", "庚戌", "庚辰", "壬辰"]);
const JIN_SHEN_HOURS = new Set(["癸酉", "己巳", "乙丑"]);

const PURE_IMAGE: SpecialPatternRule[] = [
  rule("pure_image", "tian_yuan_yi_qi", "天元一气格", (f) => allEqual(f.stems)),
  rule("pure_image", "di_yuan_yi_qi", "地元一气格", (f) => allEqual(f.branches)),
  rule("pure_image", "yi_xing_de_qi", "一行得气格", (f) => {
    const element = stemElement(f.dayMaster);
    return (
      f.stems.every((s) => stemElement(s) === element) &&
      f.branches.every((b) => branchElement(b) === element)
    );
  }),
  rule("pure_image", "kui_gang", "魁罡格", (f) =>
    KUI_GANG_DAYS.has(f.chart.day.stem + f.chart.day.branch)
  ),
  rule("pure_image", "jin_shen", "金神格", (f) =>
    JIN_SHEN_HOURS.has(f.chart.hour.stem + f.chart.hour.branch)
  ),
];

/** The day master must combine with the month stem, in a month of the combined element. */
function transformedElement(facts: ChartFacts): FiveElement | null {
  const { chart, dayMaster } = facts;
  const element = stemCombination(dayMaster, chart.month.stem);
  return element !== null && element === branchElement(chart.month.branch) ? element : null;
}

// 化气
const TRANSFORMATION: SpecialPatternRule[] = [
  {
    rule_id: "special.transformation.hua_qi",
    family: "transformation",
    detect: (facts) => {
      const element = transformedElement(facts);
      if (element === null) return null;
      return { id: `hua_qi_${element}`, label: `化${ELEMENT_LABELS[element]}格` };
    },
  },
];

export const SPECIAL_PATTERN_RULES_V1: readonly SpecialPatternRule[] = [
  ...CHONG_BEN,
  ...YAO_HE,
  ...DAY_HOUR,
  ...PURE_IMAGE,
  ...TRANSFORMATION,
];
