/**
 * Strength Policy v1
 *
 * Weights and thresholds for judging the day master strong (身强) or weak
 * (身弱). The month branch carries 40 of 100 points; the five remaining
 * scoring positions carry 10 each. The day stem is the reference and never
 * scores.
 */

import type { PillarRole } from "../../../bazi/schemas/chart.schema.js";

export interface PositionWeights {
  /** Weight of the visible stem in each pillar */
  stems: Record<PillarRole, number>;
  /** Weight of each pillar's branch, spread across its hidden stems */
  branches: Record<PillarRole, number>;
}

export interface StrengthThresholds {
  /** Minimum score for "strong" when the month branch supports the day master */
  in_season: number;
  /** Minimum score for "strong" otherwise */
  out_of_season: number;
}

export interface StrengthPolicyV1 {
  /** Policy version identifier (e.g., "strength_v1") */
  strength_policy_version: string;

  weights: PositionWeights;

  thresholds: StrengthThresholds;
}

export const STRENGTH_POLICY_V1: StrengthPolicyV1 = {
  strength_policy_version: "strength_v1",

  weights: {
    stems: {
      year: 10,
      month: 10,
      day: 0,
      hour: 10,
    },
    branches: {
      year: 10,
      month: 40,
      day: 10,
      hour: 10,
    },
  },

  thresholds: {
    in_season: 38,
    out_of_season: 48,
  },
};
