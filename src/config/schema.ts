/**
 * Configuration types. Values are resolved once at startup by loadConfig()
 * and handed to components explicitly; nothing reads the environment later.
 */

import type { BudgetPeriod } from "../budget/period";
import type { RiskProfileName } from "./presets";

export type BudgetLimits = Partial<Record<BudgetPeriod, number>>;

export type EngineConfig = {
  riskProfile: RiskProfileName;

  // Bankroll and risk
  bankroll: number;
  maxDailyLossPct: number;
  maxExposurePct: number;
  maxOpenExposurePct: number;
  kellyFraction: number;

  // Candidate generation
  activeSports: string[];
  minEdge: number;
  maxLegs: number;
  topN: number;
  maxBetsPerCycle: number;
  circadianEnabled: boolean;

  // Budget; a period is absent when its limit is 0
  budgetLimits: BudgetLimits;
  /** Applied to the daily budget */
  categoryLimits: Record<string, number>;

  // Brokers
  brokerRoutes: Record<string, string>;
  defaultBroker: string;
  /** Empty means every broker is a paper market */
  marketBaseUrl?: string;
  marketApiKey?: string;
  /** Sportsbook account name -> starting balance */
  accounts: Record<string, number>;

  // Runtime
  cycleIntervalMs: number;
  settleIntervalMs: number;
  decisionsLog?: string;
  legPoolFile?: string;
  dryRun: boolean;

  /** Keys taken from CLI overrides rather than the environment */
  overridesApplied: string[];
};
