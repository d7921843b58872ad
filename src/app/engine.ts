import { AccountTracker } from "../accounts/account-tracker";
import { BudgetLedger } from "../budget/budget-ledger";
import { CircadianModel } from "../circadian/circadian-model";
import type { EngineConfig } from "../config/schema";
import { BrokerRouter } from "../market/broker-router";
import { HttpMarket } from "../market/http-market";
import { PaperMarket } from "../market/paper-market";
import type { Market, PriceMap } from "../market/types";
import { DecisionCycle } from "../orchestrator/decision-cycle";
import { DecisionLogger } from "../orchestrator/decision-logger";
import { Runtime, type LegSource } from "../orchestrator/runtime";
import { SettlementCycle } from "../orchestrator/settlement-cycle";
import { CandidateComposer } from "../parlay/candidate-composer";
import { ParlayOptimizer } from "../parlay/optimizer";
import { RiskGate } from "../risk/risk-gate";
import type { Logger } from "../utils/logger.util";

export type Engine = {
  riskGate: RiskGate;
  budget: BudgetLedger;
  accounts: AccountTracker;
  optimizer: ParlayOptimizer;
  router: BrokerRouter;
  decisionCycle: DecisionCycle;
  settlementCycle: SettlementCycle;
  runtime: Runtime;
};

export function brokerNames(config: Readonly<EngineConfig>): string[] {
  return [...new Set([config.defaultBroker, ...Object.values(config.brokerRoutes)])];
}

/** HTTP markets under MARKET_BASE_URL/<broker>, paper markets otherwise. */
export function createMarkets(
  config: Readonly<EngineConfig>,
  logger: Logger,
  paperPrices: PriceMap = {},
): Market[] {
  const base = config.marketBaseUrl?.replace(/\/+$/, "");
  return brokerNames(config).map((name): Market =>
    base
      ? new HttpMarket({ name, baseURL: `${base}/${name}`, apiKey: config.marketApiKey, logger })
      : new PaperMarket({ name, prices: { ...paperPrices }, logger }),
  );
}

export function createEngine(params: {
  config: Readonly<EngineConfig>;
  logger: Logger;
  legSource: LegSource;
  markets: Market[];
}): Engine {
  const { config, logger, legSource, markets } = params;

  const riskGate = new RiskGate({
    config: {
      bankroll: config.bankroll,
      maxDailyLossPct: config.maxDailyLossPct,
      maxExposurePct: config.maxExposurePct,
      maxOpenExposurePct: config.maxOpenExposurePct,
      kellyFraction: config.kellyFraction,
    },
    logger,
  });

  const budget = new BudgetLedger({ logger });
  for (const [period, limit] of Object.entries(config.budgetLimits)) {
    if (period !== "daily" && period !== "weekly" && period !== "monthly") continue;
    if (limit === undefined) continue;
    budget.configure(period, limit, period === "daily" ? config.categoryLimits : {});
  }

  const accounts = new AccountTracker({ logger });
  for (const [name, balance] of Object.entries(config.accounts)) {
    accounts.addAccount(name, { initialBalance: balance });
  }

  const composer = new CandidateComposer({
    circadian: new CircadianModel(),
    useCircadian: config.circadianEnabled,
    logger,
  });
  const optimizer = new ParlayOptimizer({
    composer,
    kellyFraction: config.kellyFraction,
    maxExposurePct: config.maxExposurePct,
    logger,
  });

  const router = new BrokerRouter({
    markets,
    routes: config.brokerRoutes,
    defaultBroker: config.defaultBroker,
  });

  const decisionCycle = new DecisionCycle({
    optimizer,
    riskGate,
    budget,
    router,
    config: {
      sports: config.activeSports,
      minEdge: config.minEdge,
      maxLegs: config.maxLegs,
      topN: config.topN,
      maxBetsPerCycle: config.maxBetsPerCycle,
      dryRun: config.dryRun,
    },
    decisionLogger: config.decisionsLog ? new DecisionLogger(config.decisionsLog) : undefined,
    logger,
  });

  const settlementCycle = new SettlementCycle({ riskGate, router, accounts, logger });

  const runtime = new Runtime({
    decisionCycle,
    settlementCycle,
    riskGate,
    legSource,
    config: { cycleIntervalMs: config.cycleIntervalMs, settleIntervalMs: config.settleIntervalMs },
    logger,
  });

  return { riskGate, budget, accounts, optimizer, router, decisionCycle, settlementCycle, runtime };
}
