import { ConfigurationError } from "../errors/app.errors";
import {
  DEFAULT_RISK_PRESET,
  ENGINE_DEFAULTS,
  RISK_PRESETS,
  RISK_PROFILE_NAMES,
  isRiskProfileName,
} from "./presets";
import type { BudgetLimits, EngineConfig } from "./schema";

export type Overrides = Record<string, string | undefined>;

const readEnv = (
  key: string,
  overrides?: Overrides,
  env: Overrides = process.env,
): string | undefined => {
  const raw =
    overrides?.[key] ??
    overrides?.[key.toLowerCase()] ??
    env[key] ??
    env[key.toLowerCase()];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

type Reader = {
  string: (key: string) => string | undefined;
  bool: (key: string, fallback: boolean) => boolean;
  number: (key: string, fallback: number) => number;
  list: (key: string, fallback: readonly string[]) => string[];
};

const createReader = (overrides: Overrides, env: Overrides): Reader => {
  const string = (key: string): string | undefined => readEnv(key, overrides, env);

  const bool = (key: string, fallback: boolean): boolean => {
    const raw = string(key);
    if (raw === undefined) return fallback;
    const normalized = raw.toLowerCase();
    if (normalized === "true" || normalized === "1") return true;
    if (normalized === "false" || normalized === "0") return false;
    throw new ConfigurationError(`${key} must be true or false, got "${raw}"`, key);
  };

  const number = (key: string, fallback: number): number => {
    const raw = string(key);
    if (raw === undefined) return fallback;
    const parsed = Number(raw);
    if (!Number.isFinite(parsed)) {
      throw new ConfigurationError(`${key} must be a number, got "${raw}"`, key);
    }
    return parsed;
  };

  const list = (key: string, fallback: readonly string[]): string[] => {
    const raw = string(key);
    if (raw === undefined) return [...fallback];
    return raw
      .split(",")
      .map((item) => item.trim())
      .filter(Boolean);
  };

  return { string, bool, number, list };
};

/**
 * Parses `KEY:value` pairs from either a JSON object or a comma separated
 * list such as `NBA:50,NFL:80`.
 */
export function parsePairs(key: string, raw: string | undefined): Record<string, string> {
  if (raw === undefined) return {};
  if (raw.startsWith("{")) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ConfigurationError(
        `${key} is not valid JSON`,
        key,
        err instanceof Error ? err : undefined,
      );
    }
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new ConfigurationError(`${key} must be a JSON object`, key);
    }
    return Object.fromEntries(Object.entries(parsed).map(([name, value]) => [name, String(value)]));
  }
  const pairs: Record<string, string> = {};
  for (const entry of raw.split(",").map((item) => item.trim()).filter(Boolean)) {
    const separator = entry.indexOf(":");
    if (separator <= 0 || separator === entry.length - 1) {
      throw new ConfigurationError(`${key} entry "${entry}" must look like NAME:VALUE`, key);
    }
    pairs[entry.slice(0, separator).trim()] = entry.slice(separator + 1).trim();
  }
  return pairs;
}

const toAmounts = (key: string, pairs: Record<string, string>): Record<string, number> => {
  const amounts: Record<string, number> = {};
  for (const [name, value] of Object.entries(pairs)) {
    const amount = Number(value);
    if (!Number.isFinite(amount) || amount < 0) {
      throw new ConfigurationError(`${key} value for ${name} must be a non-negative number, got "${value}"`, key);
    }
    amounts[name] = amount;
  }
  return amounts;
};

const requireFraction = (key: string, value: number): void => {
  if (!(value > 0 && value <= 1)) {
    throw new ConfigurationError(`${key} must be within (0, 1], got ${value}`, key);
  }
};

const requireInteger = (key: string, value: number, min: number): void => {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${key} must be an integer >= ${min}, got ${value}`, key);
  }
};

const requirePositive = (key: string, value: number): void => {
  if (!(value > 0)) {
    throw new ConfigurationError(`${key} must be positive, got ${value}`, key);
  }
};

export function loadConfig(overrides: Overrides = {}, env: Overrides = process.env): Readonly<EngineConfig> {
  const read = createReader(overrides, env);

  const profileRaw = (read.string("RISK_PROFILE") ?? DEFAULT_RISK_PRESET).toLowerCase();
  if (!isRiskProfileName(profileRaw)) {
    throw new ConfigurationError(
      `Unknown RISK_PROFILE="${profileRaw}". Valid values: ${RISK_PROFILE_NAMES.join(", ")}`,
      "RISK_PROFILE",
    );
  }
  const preset = RISK_PRESETS[profileRaw];

  const budgetLimits: BudgetLimits = {};
  for (const [period, key] of [
    ["daily", "BUDGET_DAILY_LIMIT"],
    ["weekly", "BUDGET_WEEKLY_LIMIT"],
    ["monthly", "BUDGET_MONTHLY_LIMIT"],
  ] as const) {
    const limit = read.number(key, 0);
    if (limit < 0) throw new ConfigurationError(`${key} must not be negative, got ${limit}`, key);
    if (limit > 0) budgetLimits[period] = limit;
  }

  const categoryLimits = toAmounts(
    "BUDGET_CATEGORY_LIMITS",
    parsePairs("BUDGET_CATEGORY_LIMITS", read.string("BUDGET_CATEGORY_LIMITS")),
  );
  if (Object.keys(categoryLimits).length > 0 && budgetLimits.daily === undefined) {
    throw new ConfigurationError(
      "BUDGET_CATEGORY_LIMITS requires BUDGET_DAILY_LIMIT to be set",
      "BUDGET_CATEGORY_LIMITS",
    );
  }

  const brokerRoutes = Object.fromEntries(
    Object.entries(parsePairs("BROKER_ROUTES", read.string("BROKER_ROUTES"))).map(
      ([sport, broker]) => [sport.toUpperCase(), broker],
    ),
  );

  const config: EngineConfig = {
    riskProfile: profileRaw,
    bankroll: read.number("BANKROLL", ENGINE_DEFAULTS.BANKROLL),
    maxDailyLossPct: read.number("MAX_DAILY_LOSS_PCT", ENGINE_DEFAULTS.MAX_DAILY_LOSS_PCT),
    maxExposurePct: read.number("MAX_EXPOSURE_PCT", ENGINE_DEFAULTS.MAX_EXPOSURE_PCT),
    maxOpenExposurePct: read.number("MAX_OPEN_EXPOSURE_PCT", ENGINE_DEFAULTS.MAX_OPEN_EXPOSURE_PCT),
    kellyFraction: read.number("KELLY_FRACTION", preset.KELLY_FRACTION),
    activeSports: read.list("ACTIVE_SPORTS", ENGINE_DEFAULTS.ACTIVE_SPORTS).map((sport) => sport.toUpperCase()),
    minEdge: read.number("MIN_EDGE", ENGINE_DEFAULTS.MIN_EDGE),
    maxLegs: read.number("MAX_LEGS", ENGINE_DEFAULTS.MAX_LEGS),
    topN: read.number("TOP_N", ENGINE_DEFAULTS.TOP_N),
    maxBetsPerCycle: read.number("MAX_BETS_PER_CYCLE", ENGINE_DEFAULTS.MAX_BETS_PER_CYCLE),
    circadianEnabled: read.bool("CIRCADIAN_ENABLED", ENGINE_DEFAULTS.CIRCADIAN_ENABLED),
    budgetLimits,
    categoryLimits,
    brokerRoutes,
    defaultBroker: read.string("DEFAULT_BROKER") ?? ENGINE_DEFAULTS.DEFAULT_BROKER,
    marketBaseUrl: read.string("MARKET_BASE_URL"),
    marketApiKey: read.string("MARKET_API_KEY"),
    accounts: toAmounts("ACCOUNTS", parsePairs("ACCOUNTS", read.string("ACCOUNTS"))),
    cycleIntervalMs: read.number("CYCLE_INTERVAL_MS", ENGINE_DEFAULTS.CYCLE_INTERVAL_MS),
    settleIntervalMs: read.number("SETTLE_INTERVAL_MS", ENGINE_DEFAULTS.SETTLE_INTERVAL_MS),
    decisionsLog: read.string("DECISIONS_LOG"),
    legPoolFile: read.string("LEG_POOL_FILE"),
    dryRun: read.bool("DRY_RUN", false),
    overridesApplied: Object.keys(overrides)
      .filter((key) => overrides[key] !== undefined)
      .map((key) => key.toUpperCase()),
  };

  requirePositive("BANKROLL", config.bankroll);
  requireFraction("MAX_DAILY_LOSS_PCT", config.maxDailyLossPct);
  requireFraction("MAX_EXPOSURE_PCT", config.maxExposurePct);
  requireFraction("MAX_OPEN_EXPOSURE_PCT", config.maxOpenExposurePct);
  requireFraction("KELLY_FRACTION", config.kellyFraction);
  requireInteger("MAX_LEGS", config.maxLegs, 1);
  requireInteger("TOP_N", config.topN, 0);
  requireInteger("MAX_BETS_PER_CYCLE", config.maxBetsPerCycle, 0);
  requirePositive("CYCLE_INTERVAL_MS", config.cycleIntervalMs);
  requirePositive("SETTLE_INTERVAL_MS", config.settleIntervalMs);
  if (config.activeSports.length === 0) {
    throw new ConfigurationError("ACTIVE_SPORTS must name at least one sport", "ACTIVE_SPORTS");
  }

  return Object.freeze(config);
}

export function parseCliOverrides(argv: string[]): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith("--")) continue;
    const [rawKey, ...rest] = arg.slice(2).split("=");
    const key = rawKey.replace(/-/g, "_").toUpperCase();
    if (rest.length > 0) {
      overrides[key] = rest.join("=");
      continue;
    }
    const next = argv[i + 1];
    if (next && !next.startsWith("--")) {
      overrides[key] = next;
      i += 1;
    } else {
      overrides[key] = "true";
    }
  }
  return overrides;
}

/** One line per setting, for startup logs. */
export function formatConfigSummary(config: Readonly<EngineConfig>): string {
  const budgets = Object.entries(config.budgetLimits)
    .map(([period, limit]) => `${period}=$${limit}`)
    .join(",");
  return [
    `profile=${config.riskProfile}`,
    `bankroll=$${config.bankroll}`,
    `kelly_fraction=${config.kellyFraction}`,
    `max_daily_loss_pct=${config.maxDailyLossPct}`,
    `max_exposure_pct=${config.maxExposurePct}`,
    `sports=${config.activeSports.join(",")}`,
    `min_edge=${config.minEdge}`,
    `max_legs=${config.maxLegs}`,
    `top_n=${config.topN}`,
    `circadian=${config.circadianEnabled}`,
    `budgets=${budgets || "off"}`,
    `default_broker=${config.defaultBroker}`,
    `dry_run=${config.dryRun}`,
  ].join(" ");
}
