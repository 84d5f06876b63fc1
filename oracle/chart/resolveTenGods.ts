import {
  STEMS,
  elementRelation,
  hiddenStems,
  stemElement,
  stemPolarity,
  type ElementRelation,
  type HiddenStemRank,
  type Stem,
} from "../../bazi/elementCycle.js";
import type { Chart, PillarRole } from "../../bazi/schemas/chart.schema.js";
import { byRole } from "./parseChart.js";

export const TEN_GODS = [
  "friend",
  "rob_wealth",
  "eating_god",
  "hurting_officer",
  "indirect_wealth",
  "direct_wealth",
  "seven_killings",
  "direct_officer",
  "indirect_resource",
  "direct_resource",
] as const;

export type TenGod = (typeof TEN_GODS)[number];

export const TEN_GOD_LABELS: Record<TenGod, string> = {
  friend: "比肩",
  rob_wealth: "劫财",
  eating_god: "食神",
  hurting_officer: "伤官",
  indirect_wealth: "偏财",
  direct_wealth: "正财",
  seven_killings: "七杀",
  direct_officer: "正官",
  indirect_resource: "偏印",
  direct_resource: "正印",
};

/** Peer (same element) and resource (generating element) gods. */
export const SELF_PARTY_GODS: ReadonlySet<TenGod> = new Set<TenGod>([
  "friend",
  "rob_wealth",
  "indirect_resource",
  "direct_resource",
]);

/**
 * Each relation splits in two by polarity: same polarity is the "indirect"
 * (偏) god, opposite polarity the "direct" (正) one.
 */
const RELATION_GODS: Record<ElementRelation, { same: TenGod; opposite: TenGod }> = {
  same: { same: "friend", opposite: "rob_wealth" },
  generates: { same: "eating_god", opposite: "hurting_officer" },
  controls: { same: "indirect_wealth", opposite: "direct_wealth" },
  controlled_by: { same: "seven_killings", opposite: "direct_officer" },
  generated_by: { same: "indirect_resource", opposite: "direct_resource" },
};

function relate(dayMaster: Stem, target: Stem): TenGod {
  const relation = elementRelation(stemElement(dayMaster), stemElement(target));
  const pair = RELATION_GODS[relation];
  return stemPolarity(dayMaster) === stemPolarity(target) ? pair.same : pair.opposite;
}

const TEN_GOD_MATRIX: ReadonlyMap<Stem, ReadonlyMap<Stem, TenGod>> = new Map(
  STEMS.map((dayMaster) => [
    dayMaster,
    new Map(STEMS.map((target) => [target, relate(dayMaster, target)])),
  ])
);

export function tenGodOf(dayMaster: Stem, target: Stem): TenGod {
  return TEN_GOD_MATRIX.get(dayMaster)?.get(target) ?? relate(dayMaster, target);
}

export interface HiddenTenGod {
  readonly role: PillarRole;
  readonly position: number;
  readonly rank: HiddenStemRank;
  readonly stem: Stem;
  readonly weight: number;
  readonly ten_god: TenGod;
}

export interface TenGodMapping {
  readonly day_master: Stem;
  readonly visible: Readonly<Record<PillarRole, TenGod>>;
  /** Indexed by hidden-stem position; empty when hidden stems were not requested. */
  readonly hidden: Readonly<Record<PillarRole, readonly HiddenTenGod[]>>;
}

export interface ResolveTenGodsOptions {
  includeHidden?: boolean;
}

function hiddenFor(chart: Chart, role: PillarRole): HiddenTenGod[] {
  const dayMaster = chart.day.stem;
  return hiddenStems(chart[role].branch).map((h, position) => ({
    role,
    position,
    rank: h.rank,
    stem: h.stem,
    weight: h.weight,
    ten_god: tenGodOf(dayMaster, h.stem),
  }));
}

export function resolveTenGods(
  chart: Chart,
  options: ResolveTenGodsOptions = {}
): TenGodMapping {
  const includeHidden = options.includeHidden ?? true;
  const dayMaster = chart.day.stem;

  return {
    day_master: dayMaster,
    visible: byRole((role) => tenGodOf(dayMaster, chart[role].stem)),
    hidden: byRole((role) => (includeHidden ? hiddenFor(chart, role) : [])),
  };
}

/**
 * Hidden-stem gods for one pillar, taken from the mapping when it carries
 * them and computed otherwise.
 */
export function hiddenTenGodsOf(
  chart: Chart,
  mapping: TenGodMapping,
  role: PillarRole
): readonly HiddenTenGod[] {
  const known = mapping.hidden[role];
  return known.length > 0 ? known : hiddenFor(chart, role);
}
