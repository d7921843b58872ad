/**
 * Runtime - drives the decision and settlement cycles on their own intervals
 * and resets the risk gate's daily limits when the UTC date rolls over.
 */

import { toUtcDateKey } from "../budget/period";
import { toError } from "../errors/app.errors";
import type { PoolLeg } from "../parlay/types";
import type { RiskGate } from "../risk/risk-gate";
import type { Logger } from "../utils/logger.util";
import type { CycleReport, DecisionCycle } from "./decision-cycle";
import type { SettlementCycle, SettlementReport } from "./settlement-cycle";

export type LegSource = (now: Date) => Promise<PoolLeg[]>;

export type RuntimeConfig = {
  cycleIntervalMs: number;
  settleIntervalMs: number;
};

export class Runtime {
  private readonly decisionCycle: DecisionCycle;
  private readonly settlementCycle: SettlementCycle;
  private readonly riskGate: RiskGate;
  private readonly legSource: LegSource;
  private readonly config: Readonly<RuntimeConfig>;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly timers: Set<NodeJS.Timeout> = new Set();
  private running = false;
  private dateKey?: string;

  constructor(params: {
    decisionCycle: DecisionCycle;
    settlementCycle: SettlementCycle;
    riskGate: RiskGate;
    legSource: LegSource;
    config: RuntimeConfig;
    logger: Logger;
    clock?: () => Date;
  }) {
    this.decisionCycle = params.decisionCycle;
    this.settlementCycle = params.settlementCycle;
    this.riskGate = params.riskGate;
    this.legSource = params.legSource;
    this.config = Object.freeze({ ...params.config });
    this.logger = params.logger;
    this.clock = params.clock ?? (() => new Date());
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Resets daily limits the first time it sees a new UTC date. Returns true when it did. */
  rolloverIfNeeded(now: Date): boolean {
    const key = toUtcDateKey(now);
    if (this.dateKey === undefined) {
      this.dateKey = key;
      return false;
    }
    if (key === this.dateKey) return false;
    this.logger.info(`[RUNTIME] UTC date rolled over ${this.dateKey} -> ${key}`);
    this.dateKey = key;
    this.riskGate.resetDailyLimits();
    return true;
  }

  async decide(now: Date = this.clock()): Promise<CycleReport> {
    this.rolloverIfNeeded(now);
    const legs = await this.legSource(now);
    return this.decisionCycle.runOnce(legs, now);
  }

  async settle(now: Date = this.clock()): Promise<SettlementReport> {
    this.rolloverIfNeeded(now);
    return this.settlementCycle.runOnce(now);
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.logger.info(
      `[RUNTIME] Started cycle_interval_ms=${this.config.cycleIntervalMs} settle_interval_ms=${this.config.settleIntervalMs}`,
    );
    this.loop("decide", this.config.cycleIntervalMs, () => this.decide());
    this.loop("settle", this.config.settleIntervalMs, () => this.settle());
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
    this.logger.info("[RUNTIME] Stopped");
  }

  /** Runs `task` now, then again `intervalMs` after each run finishes, until stop(). */
  private loop(label: string, intervalMs: number, task: () => Promise<unknown>): void {
    const run = async (): Promise<void> => {
      if (!this.running) return;
      try {
        await task();
      } catch (err) {
        this.logger.error(`[RUNTIME] ${label} failed`, toError(err));
      }
      if (!this.running) return;
      const timer = setTimeout(() => {
        this.timers.delete(timer);
        void run();
      }, intervalMs);
      this.timers.add(timer);
    };
    void run();
  }
}
