export { loadConfig, parseCliOverrides, parsePairs, formatConfigSummary, type Overrides } from "./loadConfig";
export {
  RISK_PRESETS,
  DEFAULT_RISK_PRESET,
  ENGINE_DEFAULTS,
  isRiskProfileName,
  type RiskProfileName,
} from "./presets";
export type { EngineConfig, BudgetLimits } from "./schema";
