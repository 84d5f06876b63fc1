import type { Chart } from "../../bazi/schemas/chart.schema.js";
import { loadEngineConfig, type EngineConfig } from "../lib/engineConfig.js";
import { engineLogHelpers } from "../lib/engineLog.js";
import { freezeRecord } from "../lib/freezeRecord.js";
import { adjustSeason, type SeasonalNeed } from "./adjustSeason.js";
import { classifyPattern, type PatternResult } from "./classifyPattern.js";
import { parseChart, pillarsOf } from "./parseChart.js";
import { STRENGTH_POLICY_V1, type StrengthPolicyV1 } from "./policy/strengthPolicy.v1.js";
import { resolveAuxiliary, type AuxiliarySet } from "./resolveAuxiliary.js";
import { resolveBranchInteractions, type BranchInteraction } from "./resolveBranchInteractions.js";
import { resolveTenGods, type TenGodMapping } from "./resolveTenGods.js";
import { scoreStrength, type StrengthResult } from "./scoreStrength.js";
import { tallyElements, type ElementTally } from "./tallyElements.js";

export interface ChartReading {
  readonly chart: Chart;
  readonly day_master: Chart["day"]["stem"];
  readonly ten_gods: TenGodMapping;
  readonly pattern: PatternResult;
  readonly strength: StrengthResult;
  readonly interactions: readonly BranchInteraction[];
  readonly auxiliary: AuxiliarySet;
  readonly seasonal: SeasonalNeed;
  readonly elements: ElementTally;
}

export interface AnalyzeChartOptions {
  /** Defaults to loadEngineConfig() */
  config?: EngineConfig;
  strengthPolicy?: StrengthPolicyV1;
}

function errorCodeOf(err: unknown): string {
  return err instanceof Error ? err.name : "UnknownError";
}

/**
 * Validate a chart and run every stage over it, in order. Invalid input
 * throws InvalidChartError before any stage runs; the reading returned is
 * deeply frozen.
 */
export function analyzeChart(input: unknown, options: AnalyzeChartOptions = {}): ChartReading {
  const config = options.config ?? loadEngineConfig();
  const started = Date.now();

  let chart: Chart;
  try {
    chart = parseChart(input);
  } catch (err) {
    engineLogHelpers.analyzeFailed(
      {
        error_code: errorCodeOf(err),
        error_message: err instanceof Error ? err.message : String(err),
      },
      config.log_level
    );
    throw err;
  }

  engineLogHelpers.analyzeStarted({ day_master: chart.day.stem }, config.log_level);

  const stage = (name: string, detail: string) =>
    engineLogHelpers.stageCompleted({ stage: name, detail }, config.log_level);

  const tenGods = resolveTenGods(chart, { includeHidden: config.include_hidden_ten_gods });
  stage("ten_gods", `month stem ${tenGods.visible.month}`);
  const pattern = classifyPattern(chart, tenGods);
  stage("pattern", pattern.rule_id);
  const strength = scoreStrength(chart, tenGods, options.strengthPolicy ?? STRENGTH_POLICY_V1);
  stage("strength", `${strength.label} ${strength.score}/${strength.threshold}`);
  const pillars = pillarsOf(chart);
  const interactions = resolveBranchInteractions(
    pillars.map((p) => p.branch),
    pillars.map((p) => p.role)
  );
  stage("interactions", interactions.map((i) => i.label).join(",") || "none");
  const auxiliary = resolveAuxiliary(chart);
  stage("auxiliary", `${auxiliary.spirits.length} spirits, ${auxiliary.cross_relations.length} relations`);
  const seasonal = adjustSeason(chart.month.branch, chart.day.stem);
  stage("seasonal", seasonal.status);
  const elements = tallyElements(chart);

  const reading = freezeRecord({
    chart,
    day_master: chart.day.stem,
    ten_gods: tenGods,
    pattern,
    strength,
    interactions,
    auxiliary,
    seasonal,
    elements,
  });

  engineLogHelpers.analyzeSucceeded(
    {
      day_master: reading.day_master,
      pattern_id: pattern.id,
      strength: strength.label,
      duration_ms: Date.now() - started,
    },
    config.log_level
  );

  return reading;
}
