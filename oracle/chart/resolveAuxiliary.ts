import {
  branchIndex,
  stemPolarity,
  type Branch,
  type Stem,
} from "../../bazi/elementCycle.js";
import { PILLAR_ROLES, type Chart, type PillarRole } from "../../bazi/schemas/chart.schema.js";
import { decadeVoid, nayinOf, type Nayin } from "../../bazi/sexagenary.js";
import { byRole, pillarsOf } from "./parseChart.js";
import {
  BREAKS,
  PUNISHMENTS,
  SIX_CLASHES,
  SIX_HARMONIES,
  SIX_HARMS,
  findPair,
  type BranchPair,
} from "./rules/branchRelations.js";
import { loadSpiritTable, type SpiritKey, type SpiritRule } from "./rules/spiritRules.js";

// ---------- Twelve stages (十二长生) ----------

export const TWELVE_STAGES = [
  { id: "chang_sheng", label: "长生" },
  { id: "mu_yu", label: "沐浴" },
  { id: "guan_dai", label: "冠带" },
  { id: "lin_guan", label: "临官" },
  { id: "di_wang", label: "帝旺" },
  { id: "shuai", label: "衰" },
  { id: "bing", label: "病" },
  { id: "si", label: "死" },
  { id: "mu", label: "墓" },
  { id: "jue", label: "绝" },
  { id: "tai", label: "胎" },
  { id: "yang", label: "养" },
] as const;

export type TwelveStageId = (typeof TWELVE_STAGES)[number]["id"];

const STAGE_START: Record<Stem, Branch> = {
  甲: "亥",
  丙: "寅",
  戊: "寅",
  庚: "巳",
  壬: "申",
  乙: "午",
  丁: "酉",
  己: "酉",
  辛: "子",
  癸: "卯",
};

export interface TwelveStage {
  readonly branch: Branch;
  readonly stage: TwelveStageId;
  readonly label: string;
}

/** Yang stems walk the branches forward from 长生, yin stems backward. */
export function twelveStageOf(dayMaster: Stem, branch: Branch): TwelveStage {
  const start = branchIndex(STAGE_START[dayMaster]);
  const at = branchIndex(branch);
  const step = stemPolarity(dayMaster) === "yang" ? at - start : start - at;
  const entry = TWELVE_STAGES[(step + 12) % 12];
  return { branch, stage: entry.id, label: entry.label };
}

// ---------- Spirits (神煞) ----------

export interface SpiritHit {
  readonly role: PillarRole;
  readonly symbol: Stem | Branch;
  readonly keyed_on: SpiritKey;
}

export interface SpiritResult {
  readonly id: string;
  readonly label: string;
  readonly nature: SpiritRule["nature"];
  readonly hits: readonly SpiritHit[];
}

function keySymbol(chart: Chart, key: SpiritKey): Stem | Branch {
  switch (key) {
    case "day_stem":
      return chart.day.stem;
    case "day_branch":
      return chart.day.branch;
    case "year_branch":
      return chart.year.branch;
    case "month_branch":
      return chart.month.branch;
  }
}

function evaluateSpirit(chart: Chart, rule: SpiritRule): SpiritResult | null {
  const hits: SpiritHit[] = [];
  const seen = new Set<string>();

  for (const key of rule.keyed_on) {
    const targets = rule.table[keySymbol(chart, key)] ?? [];

    // every pillar is a candidate, the keying one included
    for (const pillar of pillarsOf(chart)) {
      const candidates: Array<Stem | Branch> = [];
      if (rule.match !== "branch") candidates.push(pillar.stem);
      if (rule.match !== "stem") candidates.push(pillar.branch);

      for (const symbol of candidates) {
        if (!targets.includes(symbol)) continue;

        const id = `${pillar.role}:${symbol}`;
        if (seen.has(id)) continue;
        seen.add(id);
        hits.push({ role: pillar.role, symbol, keyed_on: key });
      }
    }
  }

  if (hits.length === 0) return null;
  return { id: rule.id, label: rule.label, nature: rule.nature, hits };
}

export function resolveSpirits(chart: Chart): SpiritResult[] {
  return loadSpiritTable()
    .spirits.map((rule) => evaluateSpirit(chart, rule))
    .filter((result): result is SpiritResult => result !== null);
}

// ---------- Cross relations (刑冲合害破) ----------

export type CrossRelationKind = "six_harmony" | "six_clash" | "six_harm" | "punishment" | "break";

export interface CrossRelation {
  readonly roles: readonly [PillarRole, PillarRole];
  readonly branches: readonly [Branch, Branch];
  readonly relations: readonly { kind: CrossRelationKind; label: string }[];
}

const CROSS_TABLES: ReadonlyArray<{
  kind: CrossRelationKind;
  table: readonly BranchPair[];
  label: string;
}> = [
  { kind: "six_harmony", table: SIX_HARMONIES, label: "合" },
  { kind: "six_clash", table: SIX_CLASHES, label: "冲" },
  { kind: "six_harm", table: SIX_HARMS, label: "害" },
  { kind: "punishment", table: PUNISHMENTS, label: "刑" },
  { kind: "break", table: BREAKS, label: "破" },
];

/** All six pillar pairs; a pair may carry several relations and is omitted when it has none. */
export function resolveCrossRelations(chart: Chart): CrossRelation[] {
  const found: CrossRelation[] = [];

  for (let i = 0; i < PILLAR_ROLES.length; i++) {
    for (let j = i + 1; j < PILLAR_ROLES.length; j++) {
      const roleA = PILLAR_ROLES[i];
      const roleB = PILLAR_ROLES[j];
      const a = chart[roleA].branch;
      const b = chart[roleB].branch;

      const relations = CROSS_TABLES.filter((t) => findPair(t.table, a, b) !== undefined).map(
        (t) => ({
          kind: t.kind,
          label: t.kind === "punishment" && a === b ? "自刑" : `${a}${b}${t.label}`,
        })
      );

      if (relations.length > 0) {
        found.push({ roles: [roleA, roleB], branches: [a, b], relations });
      }
    }
  }

  return found;
}

// ---------- Aggregate ----------

export interface AuxiliarySet {
  readonly twelve_stages: Readonly<Record<PillarRole, TwelveStage>>;
  /** 空亡 of the day pillar */
  readonly void_branches: readonly [Branch, Branch];
  /** Pillars whose branch is void for the day */
  readonly void_hits: readonly PillarRole[];
  /** 空亡 computed from every pillar's own decade */
  readonly pillar_voids: Readonly<Record<PillarRole, readonly [Branch, Branch]>>;
  readonly spirits: readonly SpiritResult[];
  readonly cross_relations: readonly CrossRelation[];
  readonly nayin: Readonly<Record<PillarRole, Nayin>>;
}

export function resolveAuxiliary(chart: Chart): AuxiliarySet {
  const dayMaster = chart.day.stem;
  const voidBranches = decadeVoid(chart.day.stem, chart.day.branch);

  return {
    twelve_stages: byRole((role) => twelveStageOf(dayMaster, chart[role].branch)),
    void_branches: voidBranches,
    void_hits: PILLAR_ROLES.filter((role) => voidBranches.includes(chart[role].branch)),
    pillar_voids: byRole((role) => decadeVoid(chart[role].stem, chart[role].branch)),
    spirits: resolveSpirits(chart),
    cross_relations: resolveCrossRelations(chart),
    nayin: byRole((role) => nayinOf(chart[role].stem, chart[role].branch)),
  };
}
