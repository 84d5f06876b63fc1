import type { ZodIssue } from "zod";
import {
  ChartInputSchema,
  PILLAR_ROLES,
  type Chart,
  type Gender,
  type Pillar,
  type PillarRole,
} from "../../bazi/schemas/chart.schema.js";
import { InvalidChartError } from "./errors.js";

function formatIssue(issue: ZodIssue): string {
  const where = issue.path.length ? issue.path.join(".") : "chart";
  return `${where}: ${issue.message}`;
}

/**
 * Validate raw input into a Chart, or throw InvalidChartError listing every
 * problem found. Nothing downstream runs on a partially valid chart.
 */
export function parseChart(input: unknown): Chart {
  const result = ChartInputSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidChartError(result.error.issues.map(formatIssue));
  }

  const data = result.data;
  return {
    ...byRole((role): Pillar => ({ role, stem: data[role].stem, branch: data[role].branch })),
    gender: data.gender,
  };
}

/**
 * Convenience for the "甲子"-style strings a calendar module usually emits,
 * ordered year, month, day, hour.
 */
export function parseChartFromGanZhi(
  pillars: readonly string[],
  gender: Gender
): Chart {
  if (pillars.length !== PILLAR_ROLES.length) {
    throw new InvalidChartError([
      `chart: expected ${PILLAR_ROLES.length} pillars, got ${pillars.length}`,
    ]);
  }

  const raw: Record<string, unknown> = { gender };
  PILLAR_ROLES.forEach((role, i) => {
    const text = pillars[i] ?? "";
    raw[role] = [...text].length === 2 ? { stem: [...text][0], branch: [...text][1] } : text;
  });

  return parseChart(raw);
}

export function pillarsOf(chart: Chart): Pillar[] {
  return PILLAR_ROLES.map((role) => chart[role]);
}

export function byRole<T>(fn: (role: PillarRole) => T): Record<PillarRole, T> {
  return { year: fn("year"), month: fn("month"), day: fn("day"), hour: fn("hour") };
}
