import { priceFor, type PriceMap } from "../market/types";
import type { Candidate } from "../parlay/types";
import { expectedValue } from "../parlay/utils/kelly";
import type { RiskDecision } from "../risk/types";
import { round4 } from "../utils/math.util";

/** Re-validates a candidate against freshly fetched prices before an order goes out. */
export type EdgeCheck = (candidate: Candidate, prices: PriceMap) => RiskDecision;

export const DEFAULT_PRICE_TOLERANCE = 0.02;

/** Adjusted over raw EV as ranked; 1 when the raw edge was not positive. */
export function adjustmentRatio(candidate: Candidate): number {
  if (candidate.rawExpectedValue <= 0) return 1;
  return candidate.expectedValue / candidate.rawExpectedValue;
}

/**
 * Every leg must still be quoted no worse than its original price minus
 * `tolerance`, and the parlay repriced at current quotes, carrying the same
 * circadian adjustment the candidate was ranked with, must keep EV >= minEdge.
 */
export function createEdgeCheck(minEdge: number, tolerance = DEFAULT_PRICE_TOLERANCE): EdgeCheck {
  return (candidate, prices) => {
    let repriced = 1;
    for (const leg of candidate.legs) {
      const current = priceFor(prices, leg);
      if (current === undefined) {
        return { allowed: false, reason: `leg_unquoted (${leg.eventId}/${leg.selection})` };
      }
      if (current < leg.price - tolerance) {
        return {
          allowed: false,
          reason: `price_moved (${leg.eventId}/${leg.selection} ${leg.price} -> ${current})`,
        };
      }
      repriced *= current;
    }
    const rawEv = expectedValue(candidate.combinedWinProbability ?? 0, repriced);
    const ev = round4(Math.max(0, rawEv * adjustmentRatio(candidate)));
    if (ev < minEdge) {
      return { allowed: false, reason: `edge_gone (ev=${ev} min=${minEdge})` };
    }
    return { allowed: true };
  };
}
