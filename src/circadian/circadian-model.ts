/**
 * Circadian Model
 *
 * Scales a wager's edge for time-of-day, schedule and travel effects on the
 * teams involved. Pure and deterministic: the same context always yields the
 * same adjustment.
 *
 * RULES (applied in order, deltas summed):
 * 1. Sports outside the sensitive set -> no adjustment
 * 2. Local tip-off hour at the home venue:
 *    - 21:00 or later: late-night penalty
 *    - 14:00-20:59: optimal-window bonus
 * 3. Back-to-back: full penalty for the away side, half for the home side
 * 4. Away travel shift (home offset - away offset):
 *    - eastward beyond 1.5h: shift * perHourPenalty, capped at 20%
 *    - westward beyond 1.5h: |shift| * perHourPenalty / 2 bonus, capped at 5%
 *
 * adjustedEdge = max(0, rawEdge * (1 + factor))
 */

import { round4 } from "../utils/math.util";

export const CIRCADIAN_SENSITIVE_SPORTS: ReadonlySet<string> = new Set([
  "NBA",
  "NHL",
  "NFL",
  "NCAAMB",
]);

const LATE_NIGHT_HOUR = 21;
const OPTIMAL_HOUR_START = 14;
const OPTIMAL_HOUR_END = 20;
const TRAVEL_SHIFT_THRESHOLD_HOURS = 1.5;
const EASTWARD_PENALTY_CAP = 0.2;
const WESTWARD_BONUS_CAP = 0.05;

export interface GameContext {
  /** Scheduled start, UTC */
  gameTimeUtc: Date;
  /** UTC offset in hours of the home team's city, e.g. -5 for EST */
  homeUtcOffset: number;
  /** UTC offset in hours of the away team's city */
  awayUtcOffset: number;
  sport: string;
  awayBackToBack: boolean;
  homeBackToBack: boolean;
}

export interface CircadianAdjustment {
  /** In (-1, +1); negative lowers the edge */
  readonly factor: number;
  readonly reasons: readonly string[];
}

export interface CircadianModelOptions {
  lateNightPenalty: number;
  backToBackPenalty: number;
  /** Per hour of travel shift */
  timezoneShiftPenalty: number;
  optimalBonus: number;
}

export const DEFAULT_CIRCADIAN_OPTIONS: CircadianModelOptions = {
  lateNightPenalty: 0.05,
  backToBackPenalty: 0.08,
  timezoneShiftPenalty: 0.04,
  optimalBonus: 0.02,
};

export const NEUTRAL_ADJUSTMENT: CircadianAdjustment = Object.freeze({
  factor: 0,
  reasons: Object.freeze(["Sport not circadian-sensitive"]),
});

export function applyAdjustment(
  adjustment: Pick<CircadianAdjustment, "factor">,
  rawEdge: number,
): number {
  return Math.max(0, rawEdge * (1 + adjustment.factor));
}

export function homeLocalHour(ctx: Pick<GameContext, "gameTimeUtc" | "homeUtcOffset">): number {
  const utcHour = ctx.gameTimeUtc.getUTCHours() + ctx.gameTimeUtc.getUTCMinutes() / 60;
  const local = (((utcHour + ctx.homeUtcOffset) % 24) + 24) % 24;
  return Math.floor(local);
}

/** Positive means the away side travelled east, which is the more disruptive direction. */
export function awayTravelShift(ctx: Pick<GameContext, "homeUtcOffset" | "awayUtcOffset">): number {
  return ctx.homeUtcOffset - ctx.awayUtcOffset;
}

const pct = (value: number): string => `${Math.round(value * 100)}%`;

export class CircadianModel {
  private readonly options: CircadianModelOptions;

  constructor(options: Partial<CircadianModelOptions> = {}) {
    this.options = { ...DEFAULT_CIRCADIAN_OPTIONS, ...options };
  }

  isSensitive(sport: string): boolean {
    return CIRCADIAN_SENSITIVE_SPORTS.has(sport.toUpperCase());
  }

  compute(ctx: GameContext): CircadianAdjustment {
    if (!this.isSensitive(ctx.sport)) {
      return NEUTRAL_ADJUSTMENT;
    }

    const { lateNightPenalty, backToBackPenalty, timezoneShiftPenalty, optimalBonus } =
      this.options;
    let factor = 0;
    const reasons: string[] = [];

    const hour = homeLocalHour(ctx);
    if (hour >= LATE_NIGHT_HOUR) {
      factor -= lateNightPenalty;
      reasons.push(`Late-night game (local hour ${hour}) -> -${pct(lateNightPenalty)}`);
    } else if (hour >= OPTIMAL_HOUR_START && hour <= OPTIMAL_HOUR_END) {
      factor += optimalBonus;
      reasons.push(`Optimal tip-off hour (${hour}:00) -> +${pct(optimalBonus)}`);
    }

    if (ctx.awayBackToBack) {
      factor -= backToBackPenalty;
      reasons.push(`Away team back-to-back -> -${pct(backToBackPenalty)}`);
    }
    if (ctx.homeBackToBack) {
      const half = backToBackPenalty / 2;
      factor -= half;
      reasons.push(`Home team back-to-back -> -${pct(half)}`);
    }

    const shift = awayTravelShift(ctx);
    if (shift > TRAVEL_SHIFT_THRESHOLD_HOURS) {
      const penalty = Math.min(shift * timezoneShiftPenalty, EASTWARD_PENALTY_CAP);
      factor -= penalty;
      reasons.push(`Away team eastward travel ${shift.toFixed(1)}h -> -${pct(penalty)}`);
    } else if (shift < -TRAVEL_SHIFT_THRESHOLD_HOURS) {
      const bonus = Math.min((Math.abs(shift) * timezoneShiftPenalty) / 2, WESTWARD_BONUS_CAP);
      factor += bonus;
      reasons.push(`Away team westward travel ${Math.abs(shift).toFixed(1)}h -> +${pct(bonus)}`);
    }

    return { factor: round4(factor), reasons };
  }
}
