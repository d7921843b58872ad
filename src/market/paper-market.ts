/**
 * Paper Market
 *
 * In-process broker for dry runs and tests. Prices come from a table the
 * caller owns; orders stay pending until the caller settles them.
 */

import { randomUUID } from "node:crypto";
import { MarketError, OrderSubmissionError } from "../errors/app.errors";
import type { Leg } from "../parlay/types";
import type { BetResult } from "../risk/types";
import type { Logger } from "../utils/logger.util";
import type { Market, OrderPoll, PriceMap } from "./types";

export type PaperOrder = {
  readonly orderId: string;
  readonly legs: readonly Leg[];
  readonly stake: number;
  readonly price: number;
  readonly submittedAt: Date;
  result?: BetResult;
};

export class PaperMarket implements Market {
  readonly name: string;
  private prices: PriceMap;
  private readonly orders: Map<string, PaperOrder> = new Map();
  private readonly logger?: Logger;
  private rejectOrders = false;

  constructor(params: { name?: string; prices?: PriceMap; logger?: Logger } = {}) {
    this.name = params.name ?? "paper";
    this.prices = params.prices ?? {};
    this.logger = params.logger;
  }

  setPrice(eventId: string, selection: string, price: number): void {
    this.prices[eventId] = { ...this.prices[eventId], [selection]: price };
  }

  setPrices(prices: PriceMap): void {
    this.prices = prices;
  }

  /** Makes every subsequent submitOrder fail; for exercising submit failures. */
  setRejectOrders(reject: boolean): void {
    this.rejectOrders = reject;
  }

  async fetchPrices(sport: string, eventIds: readonly string[]): Promise<PriceMap> {
    const quoted: PriceMap = {};
    for (const eventId of eventIds) {
      const row = this.prices[eventId];
      if (row) quoted[eventId] = { ...row };
    }
    this.logger?.debug(
      `[PAPER] ${this.name} quoted ${Object.keys(quoted).length}/${eventIds.length} events sport=${sport}`,
    );
    return quoted;
  }

  async submitOrder(legs: readonly Leg[], stake: number, price: number): Promise<string> {
    if (this.rejectOrders) {
      throw new OrderSubmissionError(`${this.name} rejected order`, this.name, stake);
    }
    const orderId = `${this.name}-${randomUUID()}`;
    this.orders.set(orderId, {
      orderId,
      legs: legs.map((leg) => ({ ...leg })),
      stake,
      price,
      submittedAt: new Date(),
    });
    this.logger?.info(
      `[PAPER] ${this.name} accepted ${orderId} legs=${legs.length} stake=$${stake.toFixed(2)} price=${price}`,
    );
    return orderId;
  }

  async pollOrder(orderId: string): Promise<OrderPoll> {
    const order = this.orders.get(orderId);
    if (!order) return { orderId, status: "unknown" };
    if (order.result === undefined) return { orderId, status: "pending" };
    return { orderId, status: "settled", result: order.result };
  }

  settle(orderId: string, result: BetResult): void {
    const order = this.orders.get(orderId);
    if (!order) {
      throw new MarketError(`Unknown paper order ${orderId}`, this.name);
    }
    order.result = result;
  }

  getOrder(orderId: string): Readonly<PaperOrder> | undefined {
    return this.orders.get(orderId);
  }

  listOrders(): Readonly<PaperOrder>[] {
    return [...this.orders.values()];
  }
}
