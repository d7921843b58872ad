/**
 * Risk Gate - bankroll state machine
 *
 * STATES:
 * - normal: sizing allowed
 * - cooling_down: entered once daily P&L <= -(bankroll * maxDailyLossPct);
 *   every sizing call returns 0 until resetDailyLimits() runs
 *
 * The gate also owns the bet audit trail. Bets are appended on placement,
 * mutated only by settlement and never removed.
 */

import { randomUUID } from "node:crypto";
import { ValidationError } from "../errors/app.errors";
import type { Candidate } from "../parlay/types";
import { computeKellyStake } from "../parlay/utils/kelly";
import { ConsoleLogger, type Logger } from "../utils/logger.util";
import { round2 } from "../utils/math.util";
import {
  BET_RESULTS,
  type Bet,
  type BetResult,
  type Exposure,
  type RiskDecision,
  type RiskGateConfig,
  type RiskState,
  type SettlementOutcome,
} from "./types";

export class RiskGate {
  private readonly config: Readonly<RiskGateConfig>;
  private readonly logger: Logger;
  private readonly bets: Map<string, Bet> = new Map();
  private bankroll: number;
  private dailyPnl = 0;
  private state: RiskState = "normal";

  constructor(params: { config: RiskGateConfig; logger?: Logger }) {
    const { config } = params;
    if (!Number.isFinite(config.bankroll)) {
      throw new ValidationError(`Bankroll must be a finite number, got ${config.bankroll}`, "bankroll", config.bankroll);
    }
    for (const key of ["maxDailyLossPct", "maxExposurePct", "maxOpenExposurePct", "kellyFraction"] as const) {
      const value = config[key];
      if (!Number.isFinite(value) || value <= 0 || value > 1) {
        throw new ValidationError(`${key} must be within (0, 1], got ${value}`, key, value);
      }
    }
    this.config = Object.freeze({ ...config });
    this.bankroll = config.bankroll;
    this.logger = params.logger ?? new ConsoleLogger();
    this.logger.info(
      `[RISK] Gate ready bankroll=$${this.bankroll.toFixed(2)} max_daily_loss_pct=${(config.maxDailyLossPct * 100).toFixed(0)}% kelly_fraction=${config.kellyFraction}`,
    );
  }

  getState(): RiskState {
    return this.state;
  }

  getBankroll(): number {
    return round2(this.bankroll);
  }

  getDailyPnl(): number {
    return round2(this.dailyPnl);
  }

  getConfig(): Readonly<RiskGateConfig> {
    return this.config;
  }

  /**
   * Fractional-Kelly stake for a standalone probability/price pair, capped at
   * maxExposurePct of the current bankroll. Returns 0 while cooling down.
   */
  kellyStake(winProbability: number, price: number): number {
    if (this.checkStopLoss()) {
      this.logger.debug("[RISK] Sizing refused: cool-down active");
      return 0;
    }
    const stake = computeKellyStake({
      winProbability,
      price,
      bankroll: this.bankroll,
      kellyFraction: this.config.kellyFraction,
      maxExposurePct: this.config.maxExposurePct,
    });
    this.logger.debug(
      `[RISK] Kelly stake p=${winProbability.toFixed(3)} price=${price.toFixed(2)} stake=$${stake.toFixed(2)}`,
    );
    return stake;
  }

  /**
   * True while the daily stop-loss is breached. Performs the
   * normal -> cooling_down transition the first time the threshold is crossed.
   */
  checkStopLoss(): boolean {
    if (this.state === "cooling_down") {
      return true;
    }
    const lossLimit = this.bankroll * this.config.maxDailyLossPct;
    if (this.dailyPnl <= -lossLimit) {
      this.state = "cooling_down";
      this.logger.warn(
        `[RISK] Stop-loss triggered: daily_pnl=$${this.dailyPnl.toFixed(2)} limit=$${lossLimit.toFixed(2)}; cool-down active`,
      );
      return true;
    }
    return false;
  }

  /** Start of a new trading day: clears cool-down and zeroes daily P&L. */
  resetDailyLimits(): void {
    const wasCooling = this.state === "cooling_down";
    this.dailyPnl = 0;
    this.state = "normal";
    this.logger.info(`[RISK] Daily limits reset${wasCooling ? " (cool-down cleared)" : ""}`);
  }

  getExposure(): Exposure {
    const open = this.getPendingBets();
    const byBroker: Record<string, number> = {};
    const bySport: Record<string, number> = {};
    let total = 0;
    for (const bet of open) {
      total += bet.stake;
      byBroker[bet.brokerName] = round2((byBroker[bet.brokerName] ?? 0) + bet.stake);
      bySport[bet.sport] = round2((bySport[bet.sport] ?? 0) + bet.stake);
    }
    return {
      totalOpenStake: round2(total),
      openCount: open.length,
      byBroker,
      bySport,
      exposurePct: this.bankroll > 0 ? round2((total / this.bankroll) * 100) : 0,
    };
  }

  /** Whether `stake` more of open exposure is acceptable right now. */
  checkExposure(stake: number): RiskDecision {
    if (this.checkStopLoss()) {
      return { allowed: false, reason: "cooling_down" };
    }
    if (this.bankroll <= 0) {
      return { allowed: false, reason: "no_bankroll" };
    }
    const open = this.getExposure().totalOpenStake;
    const cap = this.bankroll * this.config.maxOpenExposurePct;
    if (open + stake > cap) {
      return {
        allowed: false,
        reason: `open_exposure_cap (open=$${open.toFixed(2)} stake=$${stake.toFixed(2)} cap=$${cap.toFixed(2)})`,
      };
    }
    return { allowed: true };
  }

  recordBet(
    candidate: Candidate,
    confirmationId: string,
    brokerName: string,
    options: { stake?: number; now?: Date } = {},
  ): Readonly<Bet> {
    const stake = options.stake ?? candidate.recommendedStake;
    if (!Number.isFinite(stake) || stake <= 0) {
      throw new ValidationError(`Bet stake must be positive, got ${stake}`, "stake", stake);
    }
    const bet: Bet = {
      id: randomUUID(),
      confirmationId,
      brokerName,
      sport: candidate.sport,
      legs: candidate.legs.map((leg) => ({ ...leg })),
      stake: round2(stake),
      price: candidate.combinedPrice,
      expectedValue: candidate.expectedValue,
      status: "pending",
      placedAt: options.now ?? new Date(),
    };
    this.bets.set(bet.id, bet);
    this.logger.info(
      `[RISK] Bet recorded id=${bet.id} confirmation=${confirmationId} broker=${brokerName} sport=${bet.sport} stake=$${bet.stake.toFixed(2)} price=${bet.price}`,
    );
    return bet;
  }

  settleBet(betId: string, result: BetResult, now: Date = new Date()): SettlementOutcome {
    if (!BET_RESULTS.includes(result)) {
      throw new ValidationError(`Unknown bet result: ${String(result)}`, "result", result);
    }
    const bet = this.bets.get(betId);
    if (!bet) {
      this.logger.warn(`[RISK] settleBet: unknown bet id ${betId}`);
      return { ok: false, reason: "not_found", betId };
    }
    if (bet.status !== "pending") {
      this.logger.warn(`[RISK] settleBet: bet ${betId} already settled as ${bet.status}`);
      return { ok: false, reason: "already_settled", betId };
    }

    bet.status = result;
    bet.settledAt = now;

    let pnl = 0;
    if (result === "won") {
      pnl = bet.stake * (bet.price - 1);
      this.bankroll += pnl;
      this.dailyPnl += pnl;
      this.logger.info(
        `[RISK] Bet ${bet.confirmationId} WON profit=$${pnl.toFixed(2)} bankroll=$${this.bankroll.toFixed(2)}`,
      );
    } else if (result === "lost") {
      pnl = -bet.stake;
      this.bankroll -= bet.stake;
      this.dailyPnl -= bet.stake;
      this.logger.info(
        `[RISK] Bet ${bet.confirmationId} LOST stake=$${bet.stake.toFixed(2)} bankroll=$${this.bankroll.toFixed(2)}`,
      );
      this.checkStopLoss();
    } else {
      this.logger.info(`[RISK] Bet ${bet.confirmationId} VOID; no P&L change`);
    }

    return { ok: true, bet, pnl: round2(pnl) };
  }

  getBet(betId: string): Readonly<Bet> | undefined {
    return this.bets.get(betId);
  }

  getPendingBets(): Readonly<Bet>[] {
    return [...this.bets.values()].filter((bet) => bet.status === "pending");
  }

  listBets(): Readonly<Bet>[] {
    return [...this.bets.values()];
  }
}
