import type { Polarity } from "../../../bazi/elementCycle.js";
import type { TenGod } from "../resolveTenGods.js";

/**
 * Regular Patterns v1
 *
 * 正格 named after the ten god of the month branch's primary hidden stem.
 * Peer gods (比劫) have no pattern of their own; they fall back to 建禄 and
 * 羊刃/月劫 and are flagged as fallbacks.
 */

export interface RegularPatternEntry {
  id: string;
  label: string;
  fallback: boolean;
}

const REGULAR_PATTERNS: Record<Exclude<TenGod, "friend" | "rob_wealth">, RegularPatternEntry> = {
  direct_officer: { id: "zheng_guan", label: "正官格", fallback: false },
  seven_killings: { id: "qi_sha", label: "七杀格", fallback: false },
  direct_wealth: { id: "zheng_cai", label: "正财格", fallback: false },
  indirect_wealth: { id: "pian_cai", label: "偏财格", fallback: false },
  direct_resource: { id: "zheng_yin", label: "正印格", fallback: false },
  indirect_resource: { id: "pian_yin", label: "偏印格", fallback: false },
  eating_god: { id: "shi_shen", label: "食神格", fallback: false },
  hurting_officer: { id: "shang_guan", label: "伤官格", fallback: false },
};

const JIAN_LU: RegularPatternEntry = { id: "jian_lu", label: "建禄格", fallback: true };
const YANG_REN: RegularPatternEntry = { id: "yang_ren", label: "羊刃格", fallback: true };
const YUE_JIE: RegularPatternEntry = { id: "yue_jie", label: "月劫格", fallback: true };

export function regularPatternFor(tenGod: TenGod, dayMasterPolarity: Polarity): RegularPatternEntry {
  switch (tenGod) {
    case "friend":
      return JIAN_LU;
    case "rob_wealth":
      return dayMasterPolarity === "yang" ? YANG_REN : YUE_JIE;
    default:
      return REGULAR_PATTERNS[tenGod];
  }
}
