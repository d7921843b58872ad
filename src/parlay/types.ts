/**
 * Circadian inputs carried by a leg. Missing offsets default to -5 (EST),
 * missing back-to-back flags to false, missing sport to the candidate's sport.
 */
export type LegContext = {
  gameTimeUtc: Date;
  homeUtcOffset?: number;
  awayUtcOffset?: number;
  sport?: string;
  awayBackToBack?: boolean;
  homeBackToBack?: boolean;
};

export type Leg = {
  readonly eventId: string;
  readonly selection: string;
  /** Decimal price, must be > 1 */
  readonly price: number;
  /** 0..1, where 0 means unknown */
  readonly winProbability: number;
  readonly context?: Readonly<LegContext>;
};

/** A leg offered in the pool, tagged with the sport it belongs to. */
export type PoolLeg = Leg & {
  readonly sport: string;
};

export type Candidate = {
  readonly id: string;
  readonly sport: string;
  readonly legs: readonly Leg[];
  readonly combinedPrice: number;
  /** Undefined when no leg carries a known probability */
  readonly combinedWinProbability?: number;
  readonly rawExpectedValue: number;
  /** After circadian adjustment */
  readonly expectedValue: number;
  readonly recommendedStake: number;
  readonly circadianReasons: readonly string[];
};

export type SizingParams = {
  bankroll: number;
  kellyFraction: number;
  maxExposurePct: number;
};
