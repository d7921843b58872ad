import { test } from "node:test";
import assert from "node:assert/strict";
import { parseLegPool, pricesFromPool } from "../../src/app/leg-pool";
import { ValidationError } from "../../src/errors/app.errors";

test("parseLegPool reads legs and their game context", () => {
  const legs = parseLegPool([
    { eventId: "e1", selection: "BOS", sport: "nba", price: 1.9, winProbability: 0.56 },
    {
      eventId: "e2",
      selection: "LAL",
      sport: "NBA",
      price: 2.2,
      winProbability: 0.48,
      context: { gameTimeUtc: "2024-03-07T03:00:00Z", awayUtcOffset: -8, awayBackToBack: true },
    },
  ]);
  assert.deepEqual(legs[0], { eventId: "e1", selection: "BOS", sport: "NBA", price: 1.9, winProbability: 0.56 });
  assert.deepEqual(legs[1].context, {
    gameTimeUtc: new Date("2024-03-07T03:00:00Z"),
    homeUtcOffset: undefined,
    awayUtcOffset: -8,
    sport: undefined,
    awayBackToBack: true,
    homeBackToBack: undefined,
  });
});

test("parseLegPool rejects malformed entries", () => {
  assert.throws(() => parseLegPool({}), ValidationError);
  assert.throws(() => parseLegPool([{ eventId: "e1", selection: "BOS", sport: "NBA", price: "1.9" }]), ValidationError);
  assert.throws(
    () =>
      parseLegPool([
        { eventId: "e1", selection: "BOS", sport: "NBA", price: 1.9, winProbability: 0.5, context: { gameTimeUtc: "soon" } },
      ]),
    ValidationError,
  );
});

test("pricesFromPool groups selections by event", () => {
  const prices = pricesFromPool([
    { eventId: "e1", selection: "BOS", sport: "NBA", price: 1.9, winProbability: 0.5 },
    { eventId: "e1", selection: "NYK", sport: "NBA", price: 2.0, winProbability: 0.45 },
  ]);
  assert.deepEqual(prices, { e1: { BOS: 1.9, NYK: 2.0 } });
});
