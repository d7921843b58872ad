/**
 * HTTP Market
 *
 * JSON client for a broker gateway:
 *   GET  /prices?sport=NBA&events=a,b   -> { prices: { [eventId]: { [selection]: price } } }
 *   POST /orders { legs, stake, price } -> { orderId }
 *   GET  /orders/:orderId               -> { status, result? }
 *
 * Transient failures retry through withRetry, order submission only on 429.
 * Anything left over surfaces as MarketError / OrderSubmissionError carrying
 * the broker name.
 */

import axios, { type AxiosInstance, type CreateAxiosDefaults } from "axios";
import { MarketError, OrderSubmissionError, toError } from "../errors/app.errors";
import type { Leg } from "../parlay/types";
import { BET_RESULTS, type BetResult } from "../risk/types";
import type { Logger } from "../utils/logger.util";
import { isRateLimitError, isRetryableError, sleep, statusOf, withRetry, type RetryConfig } from "./retry";
import type { Market, OrderPoll, OrderStatus, PriceMap } from "./types";

export type HttpMarketOptions = {
  name: string;
  baseURL: string;
  timeoutMs?: number;
  apiKey?: string;
  retry?: Partial<RetryConfig>;
  /** Replaces the network transport; used by tests */
  adapter?: CreateAxiosDefaults["adapter"];
  wait?: (ms: number) => Promise<void>;
  logger?: Logger;
};

const ORDER_STATUSES: readonly OrderStatus[] = ["pending", "settled", "unknown"];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isBetResult = (value: unknown): value is BetResult =>
  typeof value === "string" && BET_RESULTS.some((result) => result === value);

const isOrderStatus = (value: unknown): value is OrderStatus =>
  typeof value === "string" && ORDER_STATUSES.some((status) => status === value);

export function parsePriceMap(payload: unknown): PriceMap | undefined {
  if (!isRecord(payload) || !isRecord(payload.prices)) return undefined;
  const prices: PriceMap = {};
  for (const [eventId, row] of Object.entries(payload.prices)) {
    if (!isRecord(row)) return undefined;
    const selections: Record<string, number> = {};
    for (const [selection, price] of Object.entries(row)) {
      if (typeof price !== "number" || !Number.isFinite(price)) return undefined;
      selections[selection] = price;
    }
    prices[eventId] = selections;
  }
  return prices;
}

export class HttpMarket implements Market {
  readonly name: string;
  private readonly client: AxiosInstance;
  private readonly retry: Partial<RetryConfig>;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly logger?: Logger;

  constructor(options: HttpMarketOptions) {
    this.name = options.name;
    this.client = axios.create({
      baseURL: options.baseURL,
      timeout: options.timeoutMs ?? 10_000,
      headers: {
        "Content-Type": "application/json",
        ...(options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {}),
      },
      adapter: options.adapter,
    });
    this.retry = options.retry ?? {};
    this.wait = options.wait ?? sleep;
    this.logger = options.logger;
  }

  async fetchPrices(sport: string, eventIds: readonly string[]): Promise<PriceMap> {
    const data = await this.request("fetchPrices", () =>
      this.client.get<unknown>("/prices", {
        params: { sport: sport.toUpperCase(), events: eventIds.join(",") },
      }),
    );
    const prices = parsePriceMap(data);
    if (!prices) {
      throw new MarketError(`${this.name} returned a malformed price payload`, this.name);
    }
    return prices;
  }

  async submitOrder(legs: readonly Leg[], stake: number, price: number): Promise<string> {
    const body = {
      legs: legs.map((leg) => ({ eventId: leg.eventId, selection: leg.selection, price: leg.price })),
      stake,
      price,
    };
    let data: unknown;
    try {
      // a POST that timed out or hit a 5xx may still have been booked
      data = await this.request("submitOrder", () => this.client.post<unknown>("/orders", body), isRateLimitError);
    } catch (err) {
      const cause = err instanceof MarketError && err.cause ? err.cause : toError(err);
      throw new OrderSubmissionError(`${this.name} order failed: ${cause.message}`, this.name, stake, cause);
    }
    if (!isRecord(data) || typeof data.orderId !== "string" || data.orderId.length === 0) {
      throw new OrderSubmissionError(`${this.name} returned no order id`, this.name, stake);
    }
    this.logger?.info(`[HTTP] ${this.name} accepted order ${data.orderId} stake=$${stake.toFixed(2)}`);
    return data.orderId;
  }

  async pollOrder(orderId: string): Promise<OrderPoll> {
    let data: unknown;
    try {
      data = await this.request("pollOrder", () =>
        this.client.get<unknown>(`/orders/${encodeURIComponent(orderId)}`),
      );
    } catch (err) {
      if (err instanceof MarketError && err.cause && statusOf(err.cause) === 404) {
        return { orderId, status: "unknown" };
      }
      throw err;
    }
    if (!isRecord(data) || !isOrderStatus(data.status)) {
      throw new MarketError(`${this.name} returned a malformed order status for ${orderId}`, this.name);
    }
    if (data.status !== "settled") return { orderId, status: data.status };
    if (!isBetResult(data.result)) {
      throw new MarketError(`${this.name} settled ${orderId} without a valid result`, this.name);
    }
    return { orderId, status: "settled", result: data.result };
  }

  private async request(
    operation: string,
    call: () => Promise<{ data: unknown }>,
    shouldRetry: (error: unknown) => boolean = isRetryableError,
  ): Promise<unknown> {
    try {
      const response = await withRetry(
        call,
        this.retry,
        (attempt, error, delayMs) => {
          this.logger?.warn(
            `[HTTP] ${this.name} ${operation} failed (status=${statusOf(error) ?? "n/a"}); retry ${attempt} in ${delayMs}ms`,
          );
        },
        this.wait,
        shouldRetry,
      );
      return response.data;
    } catch (err) {
      const cause = toError(err);
      throw new MarketError(`${this.name} ${operation} failed: ${cause.message}`, this.name, cause);
    }
  }
}
