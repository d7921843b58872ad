import type { Leg } from "../parlay/types";

export type RiskState = "normal" | "cooling_down";

export type BetStatus = "pending" | "won" | "lost" | "void";

export type BetResult = Exclude<BetStatus, "pending">;

export const BET_RESULTS: readonly BetResult[] = ["won", "lost", "void"];

export type Bet = {
  /** Internal audit id */
  readonly id: string;
  /** Broker-assigned confirmation id */
  readonly confirmationId: string;
  readonly brokerName: string;
  readonly sport: string;
  readonly legs: readonly Leg[];
  readonly stake: number;
  readonly price: number;
  /** EV at placement time */
  readonly expectedValue: number;
  status: BetStatus;
  readonly placedAt: Date;
  settledAt?: Date;
};

export type Exposure = {
  totalOpenStake: number;
  openCount: number;
  byBroker: Record<string, number>;
  bySport: Record<string, number>;
  /** Open stake as a percentage of bankroll; 0 when bankroll <= 0 */
  exposurePct: number;
};

export type SettlementOutcome =
  | { ok: true; bet: Readonly<Bet>; pnl: number }
  | { ok: false; reason: "not_found" | "already_settled"; betId: string };

export type RiskDecision = { allowed: boolean; reason?: string };

export type RiskGateConfig = {
  bankroll: number;
  /** Fraction of bankroll lost in a day that triggers cool-down, e.g. 0.10 */
  maxDailyLossPct: number;
  /** Cap on a single stake as a fraction of bankroll */
  maxExposurePct: number;
  /** Cap on all open stake as a fraction of bankroll */
  maxOpenExposurePct: number;
  kellyFraction: number;
};
