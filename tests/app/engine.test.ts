import { test } from "node:test";
import assert from "node:assert/strict";
import { createEngine, createMarkets } from "../../src/app/engine";
import { pricesFromPool } from "../../src/app/leg-pool";
import { loadConfig } from "../../src/config/loadConfig";
import { HttpMarket } from "../../src/market/http-market";
import { PaperMarket } from "../../src/market/paper-market";
import { NOW, nbaPool, silentLogger } from "../helpers/fixtures";

test("createMarkets builds one market per routed broker", () => {
  const config = loadConfig({}, { BROKER_ROUTES: "NBA:gamelines" });
  const paper = createMarkets(config, silentLogger);
  assert.deepEqual(paper.map((market) => market.name), ["paper", "gamelines"]);
  assert.ok(paper.every((market) => market instanceof PaperMarket));

  const http = createMarkets(loadConfig({}, { MARKET_BASE_URL: "http://broker.test/" }), silentLogger);
  assert.equal(http.length, 1);
  assert.ok(http[0] instanceof HttpMarket);
});

test("createEngine wires a full decision and settlement pass", async () => {
  const config = loadConfig(
    {},
    { ACTIVE_SPORTS: "NBA", MAX_LEGS: "2", BUDGET_DAILY_LIMIT: "500", BUDGET_CATEGORY_LIMITS: "NBA:100", ACCOUNTS: "paper:250" },
  );
  const markets = createMarkets(config, silentLogger, pricesFromPool(nbaPool));
  const engine = createEngine({ config, logger: silentLogger, legSource: async () => nbaPool, markets });

  const report = await engine.runtime.decide(NOW);
  assert.deepEqual(report.placed.map((bet) => bet.stake), [38.85, 50]);
  assert.deepEqual(report.skipped.map((skip) => skip.reason), ["budget_exhausted"]);
  assert.equal(engine.budget.spentInPeriod("daily", "NBA", NOW), 88.85);

  const market = markets[0];
  assert.ok(market instanceof PaperMarket);
  for (const order of market.listOrders()) market.settle(order.orderId, "won");
  const settlement = await engine.runtime.settle(NOW);
  assert.equal(settlement.settled.length, 2);
  assert.equal(engine.accounts.getAccountByName("paper")?.balance, 250 + 38.85 * 2.6 + 50);
});
