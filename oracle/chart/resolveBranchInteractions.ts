/**
 * Branch interactions among the four pillar branches.
 * Non-exclusive: every matching relation is reported, ordered by strength.
 */

import { ELEMENT_LABELS, type Branch, type FiveElement } from "../../bazi/elementCycle.js";
import { PILLAR_ROLES, type PillarRole } from "../../bazi/schemas/chart.schema.js";
import {
  SIX_CLASHES,
  SIX_HARMONIES,
  THREE_ASSEMBLIES,
  THREE_HARMONIES,
  type BranchPair,
} from "./rules/branchRelations.js";

export type InteractionKind = "three_assembly" | "three_harmony" | "six_harmony" | "six_clash";

export interface BranchInteraction {
  readonly kind: InteractionKind;
  readonly category: "harmonious" | "destructive";
  readonly label: string;
  readonly element: FiveElement | null;
  /** Designated branches that are present, in table order */
  readonly branches: readonly Branch[];
  /** Every pillar whose branch takes part */
  readonly roles: readonly PillarRole[];
  readonly completeness: "full" | "partial";
  readonly strength_rank: number;
}

export const INTERACTION_STRENGTH_RANKS = {
  three_assembly: 5,
  three_harmony_full: 4,
  six_clash: 3,
  six_harmony: 2,
  three_harmony_partial: 1,
} as const;

interface Slot {
  role: PillarRole;
  branch: Branch;
}

function rolesOf(slots: readonly Slot[], branches: readonly Branch[]): PillarRole[] {
  return slots.filter((s) => branches.includes(s.branch)).map((s) => s.role);
}

function detectAssemblies(slots: readonly Slot[], present: ReadonlySet<Branch>): BranchInteraction[] {
  return THREE_ASSEMBLIES.filter((t) => t.branches.every((b) => present.has(b))).map(
    (t): BranchInteraction => ({
      kind: "three_assembly",
      category: "harmonious",
      label: `${t.branches.join("")}三会${ELEMENT_LABELS[t.element]}局`,
      element: t.element,
      branches: [...t.branches],
      roles: rolesOf(slots, t.branches),
      completeness: "full",
      strength_rank: INTERACTION_STRENGTH_RANKS.three_assembly,
    })
  );
}

function detectHarmonies(slots: readonly Slot[], present: ReadonlySet<Branch>): BranchInteraction[] {
  const found: BranchInteraction[] = [];

  for (const triplet of THREE_HARMONIES) {
    const members = triplet.branches.filter((b) => present.has(b));
    if (members.length < 2) continue;

    const full = members.length === 3;
    const element = ELEMENT_LABELS[triplet.element];
    found.push({
      kind: "three_harmony",
      category: "harmonious",
      label: full ? `${members.join("")}三合${element}局` : `${members.join("")}半合${element}局`,
      element: triplet.element,
      branches: members,
      roles: rolesOf(slots, members),
      completeness: full ? "full" : "partial",
      strength_rank: full
        ? INTERACTION_STRENGTH_RANKS.three_harmony_full
        : INTERACTION_STRENGTH_RANKS.three_harmony_partial,
    });
  }

  return found;
}

function detectPairs(
  slots: readonly Slot[],
  present: ReadonlySet<Branch>,
  table: readonly BranchPair[],
  kind: "six_harmony" | "six_clash"
): BranchInteraction[] {
  return table
    .filter((p) => p.branches.every((b) => present.has(b)))
    .map((p): BranchInteraction => {
      const [a, b] = p.branches;
      const harmony = kind === "six_harmony";
      return {
        kind,
        category: harmony ? "harmonious" : "destructive",
        label: harmony && p.element ? `${a}${b}合${ELEMENT_LABELS[p.element]}` : `${a}${b}相冲`,
        element: p.element,
        branches: [a, b],
        roles: rolesOf(slots, p.branches),
        completeness: "full",
        strength_rank: INTERACTION_STRENGTH_RANKS[kind],
      };
    });
}

/**
 * Detect 三会, 三合 (full or half), 六合 and 六冲 among the given branches.
 * `roles` labels each branch by position; detection ignores order.
 */
export function resolveBranchInteractions(
  branches: readonly Branch[],
  roles: readonly PillarRole[] = PILLAR_ROLES
): BranchInteraction[] {
  const slots: Slot[] = branches.map((branch, i) => ({
    branch,
    role: roles[i] ?? PILLAR_ROLES[i % PILLAR_ROLES.length],
  }));
  const present = new Set(branches);

  const detected = [
    ...detectAssemblies(slots, present),
    ...detectHarmonies(slots, present),
    ...detectPairs(slots, present, SIX_HARMONIES, "six_harmony"),
    ...detectPairs(slots, present, SIX_CLASHES, "six_clash"),
  ];

  // Array.prototype.sort is stable: ties keep detection order.
  return detected.sort((a, b) => b.strength_rank - a.strength_rank);
}
