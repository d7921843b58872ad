/**
 * Decision Cycle
 *
 * One pass from leg pool to placed orders. Candidates are handled strictly one
 * after another so every exposure and budget check sees the bets placed
 * before it in the same cycle.
 */

import type { BudgetLedger } from "../budget/budget-ledger";
import { MarketError, toError } from "../errors/app.errors";
import type { BrokerRouter } from "../market/broker-router";
import type { PriceMap } from "../market/types";
import type { ParlayOptimizer } from "../parlay/optimizer";
import type { Candidate, PoolLeg } from "../parlay/types";
import type { RiskGate } from "../risk/risk-gate";
import type { Logger } from "../utils/logger.util";
import type { DecisionAction, DecisionLogger } from "./decision-logger";
import { createEdgeCheck, type EdgeCheck } from "./edge-check";

export type DecisionCycleConfig = {
  sports: readonly string[];
  minEdge: number;
  maxLegs: number;
  topN: number;
  maxBetsPerCycle: number;
  /** Run every check but submit nothing */
  dryRun: boolean;
};

export type PlacedBet = {
  candidateId: string;
  betId?: string;
  confirmationId?: string;
  brokerName: string;
  stake: number;
  dryRun: boolean;
};

export type SkippedCandidate = {
  candidateId: string;
  reason: string;
};

export type CycleStatus = "completed" | "cooling_down" | "busy";

export type CycleReport = {
  status: CycleStatus;
  startedAt: Date;
  candidates: Candidate[];
  placed: PlacedBet[];
  skipped: SkippedCandidate[];
};

export class DecisionCycle {
  private readonly optimizer: ParlayOptimizer;
  private readonly riskGate: RiskGate;
  private readonly budget: BudgetLedger;
  private readonly router: BrokerRouter;
  private readonly config: Readonly<DecisionCycleConfig>;
  private readonly edgeCheck: EdgeCheck;
  private readonly decisionLogger?: DecisionLogger;
  private readonly logger: Logger;
  private running = false;

  constructor(params: {
    optimizer: ParlayOptimizer;
    riskGate: RiskGate;
    budget: BudgetLedger;
    router: BrokerRouter;
    config: DecisionCycleConfig;
    logger: Logger;
    edgeCheck?: EdgeCheck;
    decisionLogger?: DecisionLogger;
  }) {
    this.optimizer = params.optimizer;
    this.riskGate = params.riskGate;
    this.budget = params.budget;
    this.router = params.router;
    this.config = Object.freeze({ ...params.config });
    this.edgeCheck = params.edgeCheck ?? createEdgeCheck(params.config.minEdge);
    this.decisionLogger = params.decisionLogger;
    this.logger = params.logger;
  }

  isRunning(): boolean {
    return this.running;
  }

  async runOnce(legPool: readonly PoolLeg[], now: Date = new Date()): Promise<CycleReport> {
    const report: CycleReport = { status: "completed", startedAt: now, candidates: [], placed: [], skipped: [] };
    if (this.running) {
      this.logger.warn("[CYCLE] Refused: previous cycle still running");
      return { ...report, status: "busy" };
    }
    if (this.riskGate.checkStopLoss()) {
      this.logger.warn("[CYCLE] Skipped: cool-down active");
      return { ...report, status: "cooling_down" };
    }

    this.running = true;
    try {
      report.candidates = this.optimizer.generate(
        legPool,
        this.config.sports,
        this.config.minEdge,
        this.config.maxLegs,
        this.riskGate.getBankroll(),
        this.config.topN,
      );
      for (const candidate of report.candidates.slice(0, this.config.maxBetsPerCycle)) {
        await this.handleCandidate(candidate, now, report);
      }
    } finally {
      this.running = false;
    }

    this.logger.info(
      `[CYCLE] Complete: candidates=${report.candidates.length} placed=${report.placed.length} skipped=${report.skipped.length}${this.config.dryRun ? " (dry run)" : ""}`,
    );
    return report;
  }

  private async handleCandidate(candidate: Candidate, now: Date, report: CycleReport): Promise<void> {
    const skip = async (reason: string, stake?: number): Promise<void> => {
      this.logger.info(
        `[CYCLE] Skip ${candidate.id} reason=${reason} ev=${candidate.expectedValue} price=${candidate.combinedPrice}`,
      );
      report.skipped.push({ candidateId: candidate.id, reason });
      await this.logDecision(candidate, "skip", now, { reason, stake });
    };

    const market = this.router.marketFor(candidate.sport);

    let prices: PriceMap;
    try {
      prices = await market.fetchPrices(
        candidate.sport,
        candidate.legs.map((leg) => leg.eventId),
      );
    } catch (err) {
      if (!(err instanceof MarketError)) throw err;
      this.logger.warn(`[CYCLE] Price fetch failed on ${market.name}: ${err.message}`);
      await skip("price_fetch_failed");
      return;
    }

    const edge = this.edgeCheck(candidate, prices);
    if (!edge.allowed) {
      await skip(edge.reason ?? "edge_check_failed");
      return;
    }

    const stake = this.riskGate.kellyStake(candidate.combinedWinProbability ?? 0, candidate.combinedPrice);
    if (stake <= 0) {
      await skip("no_stake");
      return;
    }

    const exposure = this.riskGate.checkExposure(stake);
    if (!exposure.allowed) {
      await skip(exposure.reason ?? "exposure", stake);
      return;
    }

    if (!this.budget.canSpend(stake, candidate.sport, now)) {
      await skip("budget_exhausted", stake);
      return;
    }

    if (this.config.dryRun) {
      report.placed.push({ candidateId: candidate.id, brokerName: market.name, stake, dryRun: true });
      await this.logDecision(candidate, "dry_run", now, { stake, broker: market.name });
      return;
    }

    let confirmationId: string;
    try {
      confirmationId = await market.submitOrder(candidate.legs, stake, candidate.combinedPrice);
    } catch (err) {
      if (!(err instanceof MarketError)) throw err;
      this.logger.error(`[CYCLE] Order submission failed for ${candidate.id} on ${market.name}`, err);
      await skip("submit_failed", stake);
      return;
    }

    const bet = this.riskGate.recordBet(candidate, confirmationId, market.name, { stake, now });
    this.budget.recordSpend(bet.id, stake, candidate.sport, market.name, now);
    report.placed.push({
      candidateId: candidate.id,
      betId: bet.id,
      confirmationId,
      brokerName: market.name,
      stake,
      dryRun: false,
    });
    this.logger.info(
      `[CYCLE] Placed ${candidate.id} on ${market.name} confirmation=${confirmationId} stake=$${stake.toFixed(2)}`,
    );
    await this.logDecision(candidate, "bet", now, { stake, broker: market.name, confirmationId });
  }

  private async logDecision(
    candidate: Candidate,
    action: DecisionAction,
    now: Date,
    extra: { reason?: string; stake?: number; broker?: string; confirmationId?: string },
  ): Promise<void> {
    if (!this.decisionLogger) return;
    try {
      await this.decisionLogger.append({
        ts: now.toISOString(),
        candidate_id: candidate.id,
        sport: candidate.sport,
        legs: candidate.legs.length,
        price: candidate.combinedPrice,
        ev: candidate.expectedValue,
        action,
        reason: extra.reason,
        stake: extra.stake,
        broker: extra.broker,
        confirmation_id: extra.confirmationId,
      });
    } catch (err) {
      this.logger.warn(`[CYCLE] Decision log write failed for ${candidate.id}: ${toError(err).message}`);
    }
  }
}
