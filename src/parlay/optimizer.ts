import { ValidationError, isValidationError } from "../errors/app.errors";
import type { Logger } from "../utils/logger.util";
import type { CandidateComposer } from "./candidate-composer";
import type { Candidate, PoolLeg, SizingParams } from "./types";
import { combinationsUpTo } from "./utils/combinations";

export type OptimizerDiagnostics = {
  combinationsConsidered: number;
  built: number;
  skipCounts: Record<SkipReason, number>;
};

export type SkipReason =
  | "SKIP_INVALID_LEG"
  | "SKIP_SAME_EVENT"
  | "SKIP_LOW_EDGE"
  | "SKIP_NO_STAKE";

const emptySkipCounts = (): Record<SkipReason, number> => ({
  SKIP_INVALID_LEG: 0,
  SKIP_SAME_EVENT: 0,
  SKIP_LOW_EDGE: 0,
  SKIP_NO_STAKE: 0,
});

export function compareCandidates(a: Candidate, b: Candidate): number {
  if (b.expectedValue !== a.expectedValue) return b.expectedValue - a.expectedValue;
  return a.combinedPrice - b.combinedPrice;
}

const hasRepeatedEvent = (legs: readonly PoolLeg[]): boolean =>
  new Set(legs.map((leg) => leg.eventId)).size !== legs.length;

export class ParlayOptimizer {
  private readonly composer: CandidateComposer;
  private readonly sizing: Omit<SizingParams, "bankroll">;
  private readonly logger?: Logger;
  private diagnostics: OptimizerDiagnostics = {
    combinationsConsidered: 0,
    built: 0,
    skipCounts: emptySkipCounts(),
  };

  constructor(params: {
    composer: CandidateComposer;
    kellyFraction: number;
    maxExposurePct: number;
    logger?: Logger;
  }) {
    this.composer = params.composer;
    this.sizing = {
      kellyFraction: params.kellyFraction,
      maxExposurePct: params.maxExposurePct,
    };
    this.logger = params.logger;
  }

  /**
   * Lazily build every candidate the pool allows for `sports`, one sport at a
   * time. Combinations that fail validation are counted and skipped.
   */
  *enumerate(
    legPool: readonly PoolLeg[],
    sports: readonly string[],
    maxLegs: number,
    bankroll: number,
  ): Generator<Candidate> {
    if (!Number.isInteger(maxLegs) || maxLegs < 1) {
      throw new ValidationError(`maxLegs must be a positive integer, got ${maxLegs}`, "maxLegs", maxLegs);
    }
    const wanted = new Set(sports.map((sport) => sport.toUpperCase()));

    for (const sport of wanted) {
      const pool = legPool.filter((leg) => leg.sport.toUpperCase() === sport);
      for (const legs of combinationsUpTo(pool, maxLegs)) {
        this.diagnostics.combinationsConsidered += 1;
        if (hasRepeatedEvent(legs)) {
          this.diagnostics.skipCounts.SKIP_SAME_EVENT += 1;
          continue;
        }
        try {
          const candidate = this.composer.build(
            legs,
            sport,
            bankroll,
            this.sizing.kellyFraction,
            this.sizing.maxExposurePct,
          );
          this.diagnostics.built += 1;
          yield candidate;
        } catch (err) {
          if (!isValidationError(err)) throw err;
          this.diagnostics.skipCounts.SKIP_INVALID_LEG += 1;
          this.logger?.debug(`[OPT] Skipping combination: ${err.message}`);
        }
      }
    }
  }

  generate(
    legPool: readonly PoolLeg[],
    sports: readonly string[],
    minEdge: number,
    maxLegs: number,
    bankroll: number,
    topN: number,
  ): Candidate[] {
    if (!Number.isInteger(topN) || topN < 0) {
      throw new ValidationError(`topN must be a non-negative integer, got ${topN}`, "topN", topN);
    }
    this.diagnostics = { combinationsConsidered: 0, built: 0, skipCounts: emptySkipCounts() };

    const kept: Candidate[] = [];
    for (const candidate of this.enumerate(legPool, sports, maxLegs, bankroll)) {
      if (candidate.expectedValue < minEdge) {
        this.diagnostics.skipCounts.SKIP_LOW_EDGE += 1;
        continue;
      }
      if (candidate.recommendedStake <= 0) {
        this.diagnostics.skipCounts.SKIP_NO_STAKE += 1;
        continue;
      }
      kept.push(candidate);
    }

    kept.sort(compareCandidates);
    const top = kept.slice(0, topN);

    const skips = Object.entries(this.diagnostics.skipCounts)
      .map(([reason, count]) => `${reason}:${count}`)
      .join(",");
    this.logger?.info(
      `[OPT] sports=${[...sports].join(",")} combinations=${this.diagnostics.combinationsConsidered} eligible=${kept.length} returned=${top.length} skips=${skips}`,
    );
    return top;
  }

  getDiagnostics(): OptimizerDiagnostics {
    return {
      ...this.diagnostics,
      skipCounts: { ...this.diagnostics.skipCounts },
    };
  }
}
