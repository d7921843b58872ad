/**
 * Parlay stake engine
 *
 * Builds multi-leg parlay candidates from a priced leg pool, adjusts their
 * edge for circadian disruption, sizes them with fractional Kelly and gates
 * every order through a daily stop-loss and period budgets.
 */

export { CircadianModel, applyAdjustment, NEUTRAL_ADJUSTMENT } from "./circadian/circadian-model";
export type { CircadianAdjustment, GameContext } from "./circadian/circadian-model";

export { CandidateComposer } from "./parlay/candidate-composer";
export { ParlayOptimizer, compareCandidates } from "./parlay/optimizer";
export type { OptimizerDiagnostics, SkipReason } from "./parlay/optimizer";
export type { Candidate, Leg, LegContext, PoolLeg } from "./parlay/types";
export { computeKellyStake, expectedValue, fullKellyFraction } from "./parlay/utils/kelly";

export { RiskGate } from "./risk/risk-gate";
export type { Bet, BetResult, Exposure, RiskGateConfig, RiskState, SettlementOutcome } from "./risk/types";

export { BudgetLedger } from "./budget/budget-ledger";
export type { Budget, BudgetEntry, BudgetSummary } from "./budget/budget-ledger";
export { periodBounds, type BudgetPeriod } from "./budget/period";

export { AccountTracker } from "./accounts/account-tracker";
export type { AccountHealth, AccountSummary, SportsbookAccount } from "./accounts/account-tracker";

export { PaperMarket } from "./market/paper-market";
export { HttpMarket } from "./market/http-market";
export { BrokerRouter } from "./market/broker-router";
export type { Market, OrderPoll, PriceMap } from "./market/types";

export { DecisionCycle } from "./orchestrator/decision-cycle";
export type { CycleReport } from "./orchestrator/decision-cycle";
export { SettlementCycle } from "./orchestrator/settlement-cycle";
export { Runtime } from "./orchestrator/runtime";
export { DecisionLogger } from "./orchestrator/decision-logger";
export { createEdgeCheck, type EdgeCheck } from "./orchestrator/edge-check";

export { createEngine, createMarkets, type Engine } from "./app/engine";
export { loadConfig, parseCliOverrides } from "./config/loadConfig";
export type { EngineConfig } from "./config/schema";

export * from "./errors/app.errors";
export { ConsoleLogger, type Logger } from "./utils/logger.util";
