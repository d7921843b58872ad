import {
  CircadianModel,
  applyAdjustment,
  type GameContext,
} from "../circadian/circadian-model";
import { ValidationError } from "../errors/app.errors";
import type { Logger } from "../utils/logger.util";
import { product, round2, round4 } from "../utils/math.util";
import type { Candidate, Leg } from "./types";
import { computeKellyStake, expectedValue } from "./utils/kelly";

const DEFAULT_UTC_OFFSET = -5;

export function candidateId(sport: string, legs: readonly Leg[]): string {
  return `${sport.toUpperCase()}:${legs.map((leg) => `${leg.eventId}/${leg.selection}`).join("+")}`;
}

export function validateLeg(leg: Leg): void {
  if (!Number.isFinite(leg.price) || leg.price <= 1) {
    throw new ValidationError(
      `Leg ${leg.eventId} price must be a decimal price above 1.0, got ${leg.price}`,
      "price",
      leg.price,
    );
  }
  if (!Number.isFinite(leg.winProbability) || leg.winProbability < 0 || leg.winProbability > 1) {
    throw new ValidationError(
      `Leg ${leg.eventId} win probability must be within [0, 1], got ${leg.winProbability}`,
      "winProbability",
      leg.winProbability,
    );
  }
  if (leg.context && Number.isNaN(leg.context.gameTimeUtc.getTime())) {
    throw new ValidationError(
      `Leg ${leg.eventId} has an invalid game time`,
      "context.gameTimeUtc",
      leg.context.gameTimeUtc,
    );
  }
}

export function toGameContext(leg: Leg, sport: string): GameContext | undefined {
  if (!leg.context) return undefined;
  return {
    gameTimeUtc: leg.context.gameTimeUtc,
    homeUtcOffset: leg.context.homeUtcOffset ?? DEFAULT_UTC_OFFSET,
    awayUtcOffset: leg.context.awayUtcOffset ?? DEFAULT_UTC_OFFSET,
    sport: leg.context.sport ?? sport,
    awayBackToBack: leg.context.awayBackToBack ?? false,
    homeBackToBack: leg.context.homeBackToBack ?? false,
  };
}

export class CandidateComposer {
  private readonly circadian: CircadianModel;
  private readonly useCircadian: boolean;
  private readonly logger?: Logger;

  constructor(params: { circadian?: CircadianModel; useCircadian?: boolean; logger?: Logger } = {}) {
    this.circadian = params.circadian ?? new CircadianModel();
    this.useCircadian = params.useCircadian ?? true;
    this.logger = params.logger;
  }

  /**
   * Combine `legs` into one parlay candidate.
   *
   * Each leg with a game context adjusts the running EV in turn, so several
   * disrupted legs compound. The floor at zero is absorbing, which makes the
   * final EV independent of leg order.
   */
  build(
    legs: readonly Leg[],
    sport: string,
    bankroll: number,
    kellyFraction: number,
    maxExposurePct: number,
  ): Candidate {
    if (legs.length === 0) {
      throw new ValidationError("Cannot build a candidate from an empty leg set", "legs", legs);
    }
    legs.forEach(validateLeg);

    const combinedPrice = product(legs.map((leg) => leg.price));
    const known = legs.filter((leg) => leg.winProbability > 0);
    const combinedWinProbability =
      known.length > 0 ? product(known.map((leg) => leg.winProbability)) : undefined;
    const p = combinedWinProbability ?? 0;

    const rawEv = expectedValue(p, combinedPrice);
    let ev = rawEv;
    const reasons: string[] = [];

    if (this.useCircadian) {
      for (const leg of legs) {
        const ctx = toGameContext(leg, sport);
        if (!ctx) continue;
        const adjustment = this.circadian.compute(ctx);
        ev = applyAdjustment(adjustment, ev);
        for (const reason of adjustment.reasons) reasons.push(`${leg.eventId}: ${reason}`);
      }
    }

    const recommendedStake = computeKellyStake({
      winProbability: p,
      price: combinedPrice,
      bankroll,
      kellyFraction,
      maxExposurePct,
    });

    const candidate: Candidate = {
      id: candidateId(sport, legs),
      sport,
      legs: [...legs],
      combinedPrice: round4(combinedPrice),
      combinedWinProbability:
        combinedWinProbability === undefined ? undefined : round4(combinedWinProbability),
      rawExpectedValue: round4(rawEv),
      expectedValue: round4(ev),
      recommendedStake: round2(recommendedStake),
      circadianReasons: reasons,
    };

    this.logger?.debug(
      `[COMPOSE] ${candidate.id} price=${candidate.combinedPrice} p=${candidate.combinedWinProbability ?? "n/a"} raw_ev=${candidate.rawExpectedValue} ev=${candidate.expectedValue} stake=$${candidate.recommendedStake.toFixed(2)}`,
    );
    return candidate;
  }
}
