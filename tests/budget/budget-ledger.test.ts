import { beforeEach, describe, test } from "node:test";
import assert from "node:assert/strict";
import { BudgetLedger } from "../../src/budget/budget-ledger";
import { ValidationError } from "../../src/errors/app.errors";
import { ConsoleLogger } from "../../src/utils/logger.util";

const logger = new ConsoleLogger({ level: "silent" });
const now = new Date("2024-03-06T12:00:00Z");

describe("BudgetLedger", () => {
  let ledger: BudgetLedger;

  beforeEach(() => {
    ledger = new BudgetLedger({ logger });
  });

  test("allows everything while unbudgeted", () => {
    assert.equal(ledger.isBudgeted(), false);
    assert.equal(ledger.canSpend(10_000, "NBA", now), true);
    assert.equal(ledger.remaining("daily", undefined, now), Number.POSITIVE_INFINITY);
    assert.equal(ledger.spentInPeriod("daily", undefined, now), 0);
  });

  test("sums spend per period and per category", () => {
    ledger.configure("daily", 100, { NBA: 50 });
    ledger.recordSpend("b1", 30, "NBA", "paper", now);
    ledger.recordSpend("b2", 20, "nfl", "paper", now);
    ledger.recordSpend("b0", 15, "NBA", "paper", new Date("2024-03-05T12:00:00Z"));
    assert.equal(ledger.spentInPeriod("daily", undefined, now), 50);
    assert.equal(ledger.spentInPeriod("daily", "nba", now), 30);
    assert.equal(ledger.spentInPeriod("daily", "NFL", now), 20);
  });

  test("measures each category against its own spend", () => {
    ledger.configure("daily", 100, { NBA: 50 });
    ledger.recordSpend("b1", 30, "NBA", "paper", now);
    ledger.recordSpend("b2", 20, "NFL", "paper", now);
    assert.equal(ledger.remaining("daily", "nba", now), 20);
    assert.equal(ledger.remaining("daily", "NFL", now), 80);
    assert.equal(ledger.remaining("daily", undefined, now), 50);
    assert.equal(ledger.canSpend(20, "NBA", now), true);
    assert.equal(ledger.canSpend(21, "NBA", now), false);
    assert.equal(ledger.canSpend(80, "NFL", now), true);
    assert.equal(ledger.canSpend(81, "NFL", now), false);
  });

  test("a sub-limited category is not charged for other categories' spend", () => {
    ledger.configure("daily", 100, { NBA: 80 });
    ledger.recordSpend("b1", 70, "NFL", "paper", now);
    assert.equal(ledger.remaining("daily", "NBA", now), 80);
    assert.equal(ledger.remaining("daily", undefined, now), 30);
    assert.equal(ledger.canSpend(50, "NBA", now), true);
    assert.equal(ledger.canSpend(81, "NBA", now), false);
  });

  test("floors remaining at zero after overspend", () => {
    ledger.configure("daily", 50);
    ledger.recordSpend("b1", 80, "NBA", "paper", now);
    assert.equal(ledger.remaining("daily", undefined, now), 0);
    assert.equal(ledger.canSpend(1, "NBA", now), false);
  });

  test("every configured period must have room", () => {
    ledger.configure("daily", 100);
    ledger.configure("weekly", 150);
    ledger.recordSpend("b1", 120, "NBA", "paper", new Date("2024-03-04T12:00:00Z"));
    assert.equal(ledger.remaining("daily", undefined, now), 100);
    assert.equal(ledger.remaining("weekly", undefined, now), 30);
    assert.equal(ledger.canSpend(40, "NBA", now), false);
    assert.equal(ledger.canSpend(30, "NBA", now), true);
  });

  test("summarises each configured period", () => {
    ledger.configure("daily", 100, { NBA: 50 });
    ledger.recordSpend("b1", 30, "NBA", "paper", now);
    ledger.recordSpend("b2", 20, "NFL", "paper", now);
    assert.deepEqual(ledger.summary(now), {
      daily: {
        limit: 100,
        spent: 50,
        remaining: 50,
        utilisationPct: 50,
        periodStart: "2024-03-06",
        periodEnd: "2024-03-06",
        categoryLimits: { NBA: 50 },
      },
    });
  });

  test("configure replaces an existing budget", () => {
    ledger.configure("daily", 100);
    ledger.configure("daily", 40, { NHL: 10 });
    assert.deepEqual(ledger.getBudget("daily"), { period: "daily", limit: 40, categoryLimits: { NHL: 10 } });
  });

  test("keeps an append-only entry log", () => {
    ledger.recordSpend("b1", 12.5, "NHL", "paper", now);
    const entries = ledger.entries();
    assert.deepEqual(entries, [{ refId: "b1", amount: 12.5, category: "NHL", source: "paper", timestamp: now }]);
    assert.throws(() => {
      Object.assign(entries[0], { amount: 1 });
    }, TypeError);
  });

  test("rejects non-positive amounts and limits", () => {
    assert.throws(() => ledger.configure("daily", 0), ValidationError);
    assert.throws(() => ledger.configure("daily", 100, { NBA: -1 }), ValidationError);
    assert.throws(() => ledger.recordSpend("b1", 0), ValidationError);
    assert.throws(() => ledger.canSpend(0), ValidationError);
  });

  test("rejects invalid dates without touching the log", () => {
    ledger.configure("daily", 100);
    const invalid = new Date("not a date");
    assert.throws(() => ledger.recordSpend("b1", 10, "NBA", "paper", invalid), ValidationError);
    assert.deepEqual(ledger.entries(), []);
    assert.equal(ledger.canSpend(5, "NBA", now), true);
    assert.throws(() => ledger.canSpend(5, "NBA", invalid), ValidationError);
    assert.throws(() => ledger.remaining("daily", "NBA", invalid), ValidationError);
    assert.throws(() => ledger.spentInPeriod("daily", undefined, invalid), ValidationError);
    assert.throws(() => ledger.summary(invalid), ValidationError);
  });
});
