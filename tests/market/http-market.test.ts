import { describe, test } from "node:test";
import assert from "node:assert/strict";
import { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from "axios";
import { MarketError, OrderSubmissionError } from "../../src/errors/app.errors";
import { HttpMarket, parsePriceMap } from "../../src/market/http-market";
import { calculateBackoff, isRateLimitError } from "../../src/market/retry";
import { ConsoleLogger } from "../../src/utils/logger.util";

const logger = new ConsoleLogger({ level: "silent" });

type Reply = { status: number; data?: unknown };

const reply = (config: InternalAxiosRequestConfig, { status, data }: Reply) => {
  const response = { data, status, statusText: String(status), headers: {}, config };
  if (status >= 400) {
    throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, undefined, response);
  }
  return response;
};

/** Serves replies in order and records every request it sees. */
const scripted = (replies: Reply[]) => {
  const seen: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    seen.push(config);
    const next = replies[Math.min(seen.length - 1, replies.length - 1)];
    return reply(config, next);
  };
  return { adapter, seen };
};

const createMarket = (adapter: AxiosAdapter, waits: number[] = [], maxRetries = 3) =>
  new HttpMarket({
    name: "gamelines",
    baseURL: "http://broker.test/gamelines",
    apiKey: "test-key",
    adapter,
    retry: { maxRetries, baseDelayMs: 100 },
    wait: async (ms) => {
      waits.push(ms);
    },
    logger,
  });

describe("HttpMarket", () => {
  test("fetches prices for the requested events", async () => {
    const { adapter, seen } = scripted([{ status: 200, data: { prices: { e1: { BOS: 2.05 } } } }]);
    const prices = await createMarket(adapter).fetchPrices("nba", ["e1", "e2"]);
    assert.deepEqual(prices, { e1: { BOS: 2.05 } });
    assert.equal(seen[0].url, "/prices");
    assert.deepEqual(seen[0].params, { sport: "NBA", events: "e1,e2" });
    assert.equal(seen[0].headers.Authorization, "Bearer test-key");
  });

  test("retries rate-limited calls with linear back-off", async () => {
    const { adapter, seen } = scripted([
      { status: 429 },
      { status: 429 },
      { status: 200, data: { prices: {} } },
    ]);
    const waits: number[] = [];
    assert.deepEqual(await createMarket(adapter, waits).fetchPrices("NBA", ["e1"]), {});
    assert.equal(seen.length, 3);
    assert.deepEqual(waits, [100, 200]);
  });

  test("gives up after the retry budget", async () => {
    const { adapter, seen } = scripted([{ status: 429 }]);
    await assert.rejects(createMarket(adapter, [], 2).fetchPrices("NBA", ["e1"]), (err: unknown) => {
      assert.ok(err instanceof MarketError);
      assert.equal(err.brokerName, "gamelines");
      return true;
    });
    assert.equal(seen.length, 3);
  });

  test("does not retry client errors", async () => {
    const { adapter, seen } = scripted([{ status: 400 }]);
    await assert.rejects(createMarket(adapter).fetchPrices("NBA", ["e1"]), MarketError);
    assert.equal(seen.length, 1);
  });

  test("rejects malformed price payloads", async () => {
    const { adapter } = scripted([{ status: 200, data: { prices: { e1: { BOS: "2.0" } } } }]);
    await assert.rejects(createMarket(adapter).fetchPrices("NBA", ["e1"]), MarketError);
  });

  test("submits orders and returns the broker's id", async () => {
    const { adapter, seen } = scripted([{ status: 201, data: { orderId: "ord-7" } }]);
    const orderId = await createMarket(adapter).submitOrder(
      [{ eventId: "e1", selection: "BOS", price: 2, winProbability: 0.6 }],
      25,
      2,
    );
    assert.equal(orderId, "ord-7");
    assert.equal(seen[0].method, "post");
    assert.deepEqual(JSON.parse(String(seen[0].data)), {
      legs: [{ eventId: "e1", selection: "BOS", price: 2 }],
      stake: 25,
      price: 2,
    });
  });

  test("never resubmits an order after a server error", async () => {
    const { adapter, seen } = scripted([{ status: 503 }, { status: 201, data: { orderId: "ord-2" } }]);
    await assert.rejects(createMarket(adapter).submitOrder([], 10, 2), OrderSubmissionError);
    assert.equal(seen.length, 1);
  });

  test("resubmits an order the broker rate-limited", async () => {
    const { adapter, seen } = scripted([{ status: 429 }, { status: 201, data: { orderId: "ord-2" } }]);
    const waits: number[] = [];
    assert.equal(await createMarket(adapter, waits).submitOrder([], 10, 2), "ord-2");
    assert.equal(seen.length, 2);
    assert.deepEqual(waits, [100]);
  });

  test("wraps failed submissions in OrderSubmissionError", async () => {
    const { adapter } = scripted([{ status: 500 }]);
    await assert.rejects(createMarket(adapter, [], 0).submitOrder([], 10, 2), (err: unknown) => {
      assert.ok(err instanceof OrderSubmissionError);
      assert.equal(err.stake, 10);
      assert.equal(err.brokerName, "gamelines");
      return true;
    });
  });

  test("polls order status", async () => {
    const { adapter, seen } = scripted([{ status: 200, data: { status: "settled", result: "lost" } }]);
    assert.deepEqual(await createMarket(adapter).pollOrder("ord 7"), {
      orderId: "ord 7",
      status: "settled",
      result: "lost",
    });
    assert.equal(seen[0].url, "/orders/ord%207");
  });

  test("treats a 404 poll as an unknown order", async () => {
    const { adapter } = scripted([{ status: 404 }]);
    assert.deepEqual(await createMarket(adapter).pollOrder("ord-1"), { orderId: "ord-1", status: "unknown" });
  });

  test("rejects a settlement without a result", async () => {
    const { adapter } = scripted([{ status: 200, data: { status: "settled" } }]);
    await assert.rejects(createMarket(adapter).pollOrder("ord-1"), MarketError);
  });
});

describe("retry helpers", () => {
  test("rate-limit back-off grows linearly up to the cap", () => {
    const config = { maxRetries: 5, baseDelayMs: 1000, maxDelayMs: 2500, jitterFactor: 0.3 };
    assert.equal(calculateBackoff(0, true, config), 1000);
    assert.equal(calculateBackoff(1, true, config), 2000);
    assert.equal(calculateBackoff(4, true, config), 2500);
  });

  test("other back-off doubles and adds jitter", () => {
    const config = { maxRetries: 5, baseDelayMs: 1000, maxDelayMs: 30000, jitterFactor: 0.5 };
    assert.equal(calculateBackoff(2, false, config, () => 0), 4000);
    assert.equal(calculateBackoff(2, false, config, () => 1), 6000);
  });

  test("isRateLimitError only matches HTTP 429", () => {
    assert.equal(isRateLimitError(new Error("429")), false);
  });

  test("parsePriceMap requires a prices object", () => {
    assert.equal(parsePriceMap({}), undefined);
    assert.deepEqual(parsePriceMap({ prices: { e1: { A: 1.5 } } }), { e1: { A: 1.5 } });
  });
});
