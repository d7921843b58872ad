export const RISK_PRESETS = {
  conservative: {
    KELLY_FRACTION: 0.1,
  },
  balanced: {
    KELLY_FRACTION: 0.25,
  },
  aggressive: {
    KELLY_FRACTION: 0.5,
  },
} as const;

export type RiskProfileName = keyof typeof RISK_PRESETS;

export const DEFAULT_RISK_PRESET: RiskProfileName = "balanced";

export const RISK_PROFILE_NAMES = Object.keys(RISK_PRESETS).filter(
  (name): name is RiskProfileName => name in RISK_PRESETS,
);

export function isRiskProfileName(value: string): value is RiskProfileName {
  return RISK_PROFILE_NAMES.some((name) => name === value);
}

export const ENGINE_DEFAULTS = {
  BANKROLL: 1000,
  MAX_DAILY_LOSS_PCT: 0.1,
  MAX_EXPOSURE_PCT: 0.2,
  MAX_OPEN_EXPOSURE_PCT: 0.5,
  ACTIVE_SPORTS: ["NFL", "NBA", "NHL", "MLB"],
  MIN_EDGE: 0.05,
  MAX_LEGS: 3,
  TOP_N: 10,
  MAX_BETS_PER_CYCLE: 5,
  CIRCADIAN_ENABLED: true,
  DEFAULT_BROKER: "paper",
  CYCLE_INTERVAL_MS: 86_400_000,
  SETTLE_INTERVAL_MS: 3_600_000,
} as const;
