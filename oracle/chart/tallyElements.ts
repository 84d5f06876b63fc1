import {
  ELEMENTS,
  hiddenStems,
  stemElement,
  type FiveElement,
} from "../../bazi/elementCycle.js";
import type { Chart } from "../../bazi/schemas/chart.schema.js";
import { pillarsOf } from "./parseChart.js";

export interface ElementTally {
  /** Weighted points per element; each stem adds 10, each branch 10 spread over its hidden stems */
  readonly points: Readonly<Record<FiveElement, number>>;
  readonly percentages: Readonly<Record<FiveElement, number>>;
  readonly total: number;
  /** Elements sharing the highest score */
  readonly dominant: readonly FiveElement[];
  readonly missing: readonly FiveElement[];
}

const STEM_POINTS = 10;

export function tallyElements(chart: Chart): ElementTally {
  const points: Record<FiveElement, number> = { wood: 0, fire: 0, earth: 0, metal: 0, water: 0 };

  for (const pillar of pillarsOf(chart)) {
    points[stemElement(pillar.stem)] += STEM_POINTS;
    for (const hidden of hiddenStems(pillar.branch)) {
      points[stemElement(hidden.stem)] += hidden.weight;
    }
  }

  const total = ELEMENTS.reduce((sum, e) => sum + points[e], 0);
  const percentages: Record<FiveElement, number> = { wood: 0, fire: 0, earth: 0, metal: 0, water: 0 };
  for (const element of ELEMENTS) {
    percentages[element] = Math.round((points[element] / total) * 1000) / 10;
  }

  const max = Math.max(...ELEMENTS.map((e) => points[e]));

  return {
    points,
    percentages,
    total,
    dominant: ELEMENTS.filter((e) => points[e] === max),
    missing: ELEMENTS.filter((e) => points[e] === 0),
  };
}
