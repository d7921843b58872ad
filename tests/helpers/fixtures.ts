import { BudgetLedger } from "../../src/budget/budget-ledger";
import { BrokerRouter } from "../../src/market/broker-router";
import { PaperMarket } from "../../src/market/paper-market";
import type { Market } from "../../src/market/types";
import { DecisionCycle, type DecisionCycleConfig } from "../../src/orchestrator/decision-cycle";
import type { DecisionLogger } from "../../src/orchestrator/decision-logger";
import { CandidateComposer } from "../../src/parlay/candidate-composer";
import { ParlayOptimizer } from "../../src/parlay/optimizer";
import type { PoolLeg } from "../../src/parlay/types";
import { RiskGate } from "../../src/risk/risk-gate";
import type { RiskGateConfig } from "../../src/risk/types";
import { ConsoleLogger } from "../../src/utils/logger.util";

export const silentLogger = new ConsoleLogger({ level: "silent" });

export const NOW = new Date("2024-03-06T12:00:00Z");

export const nbaPool: PoolLeg[] = [
  { sport: "NBA", eventId: "e1", selection: "BOS", price: 2.0, winProbability: 0.6 },
  { sport: "NBA", eventId: "e2", selection: "LAL", price: 1.8, winProbability: 0.65 },
];

export const riskConfig: RiskGateConfig = {
  bankroll: 1000,
  maxDailyLossPct: 0.1,
  maxExposurePct: 0.2,
  maxOpenExposurePct: 0.5,
  kellyFraction: 0.25,
};

export const cycleConfig: DecisionCycleConfig = {
  sports: ["NBA"],
  minEdge: 0.05,
  maxLegs: 2,
  topN: 10,
  maxBetsPerCycle: 5,
  dryRun: false,
};

export function createHarness(options: {
  market?: Market;
  risk?: Partial<RiskGateConfig>;
  cycle?: Partial<DecisionCycleConfig>;
  decisionLogger?: DecisionLogger;
} = {}) {
  const market = options.market ?? new PaperMarket({ prices: { e1: { BOS: 2.0 }, e2: { LAL: 1.8 } } });
  const riskGate = new RiskGate({ config: { ...riskConfig, ...options.risk }, logger: silentLogger });
  const budget = new BudgetLedger({ logger: silentLogger });
  const router = new BrokerRouter({ markets: [market], defaultBroker: market.name });
  const optimizer = new ParlayOptimizer({
    composer: new CandidateComposer({ logger: silentLogger }),
    kellyFraction: riskGate.getConfig().kellyFraction,
    maxExposurePct: riskGate.getConfig().maxExposurePct,
    logger: silentLogger,
  });
  const cycle = new DecisionCycle({
    optimizer,
    riskGate,
    budget,
    router,
    config: { ...cycleConfig, ...options.cycle },
    decisionLogger: options.decisionLogger,
    logger: silentLogger,
  });
  return { market, riskGate, budget, router, optimizer, cycle };
}
