export * from "../bazi/elementCycle.js";
export * from "../bazi/sexagenary.js";
export * from "../bazi/schemas/chart.schema.js";

export { InvalidChartError, CanonDataError } from "./chart/errors.js";
export { parseChart, parseChartFromGanZhi, pillarsOf } from "./chart/parseChart.js";
export {
  TEN_GODS,
  TEN_GOD_LABELS,
  tenGodOf,
  resolveTenGods,
  hiddenTenGodsOf,
  type TenGod,
  type TenGodMapping,
  type HiddenTenGod,
} from "./chart/resolveTenGods.js";
export { classifyPattern, type PatternResult } from "./chart/classifyPattern.js";
export { STRENGTH_POLICY_V1, type StrengthPolicyV1 } from "./chart/policy/strengthPolicy.v1.js";
export { scoreStrength, type StrengthResult, type StrengthContribution } from "./chart/scoreStrength.js";
export {
  resolveBranchInteractions,
  type BranchInteraction,
  type InteractionKind,
} from "./chart/resolveBranchInteractions.js";
export {
  resolveAuxiliary,
  twelveStageOf,
  resolveSpirits,
  resolveCrossRelations,
  type AuxiliarySet,
  type SpiritResult,
  type CrossRelation,
  type TwelveStage,
} from "./chart/resolveAuxiliary.js";
export { adjustSeason, type SeasonalNeed } from "./chart/adjustSeason.js";
export { tallyElements, type ElementTally } from "./chart/tallyElements.js";
export { analyzeCompatibility, type CompatibilityResult } from "./chart/analyzeCompatibility.js";
export { analyzeChart, type ChartReading, type AnalyzeChartOptions } from "./chart/analyzeChart.js";

export {
  castHexagram,
  hexagramFromLineValues,
  lineValueFromFaces,
  type Hexagram,
  type HexagramFigure,
  type HexagramLine,
  type LineValue,
} from "./divination/castHexagram.js";
export {
  randomCoinSource,
  seededCoinSource,
  scriptedCoinSource,
  type CoinFace,
  type CoinSource,
} from "./divination/coinSource.js";
export { TRIGRAMS, hexagramByCode, type HexagramEntry, type Trigram } from "./divination/hexagramTable.js";

export { loadEngineConfig, EngineConfigError, type EngineConfig, type LogLevel } from "./lib/engineConfig.js";
