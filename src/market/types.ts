import type { Leg } from "../parlay/types";
import type { BetResult } from "../risk/types";

/** eventId -> selection -> decimal price */
export type PriceMap = Record<string, Record<string, number>>;

export type OrderStatus = "pending" | "settled" | "unknown";

export type OrderPoll = {
  orderId: string;
  status: OrderStatus;
  /** Present once status is "settled" */
  result?: BetResult;
};

/**
 * A broker the engine can quote against and place orders with.
 * The core depends only on this capability, never on a concrete book.
 */
export interface Market {
  readonly name: string;
  fetchPrices: (sport: string, eventIds: readonly string[]) => Promise<PriceMap>;
  submitOrder: (legs: readonly Leg[], stake: number, price: number) => Promise<string>;
  pollOrder: (orderId: string) => Promise<OrderPoll>;
}

export function priceFor(prices: PriceMap, leg: Pick<Leg, "eventId" | "selection">): number | undefined {
  return prices[leg.eventId]?.[leg.selection];
}
