import { describe, test } from "node:test";
import assert from "node:assert/strict";
import { ValidationError } from "../../src/errors/app.errors";
import { CandidateComposer } from "../../src/parlay/candidate-composer";
import { ParlayOptimizer } from "../../src/parlay/optimizer";
import type { Candidate, PoolLeg } from "../../src/parlay/types";
import { ConsoleLogger } from "../../src/utils/logger.util";

const logger = new ConsoleLogger({ level: "silent" });

const pool: PoolLeg[] = [
  { sport: "NBA", eventId: "e1", selection: "BOS", price: 2.0, winProbability: 0.6 },
  { sport: "NBA", eventId: "e2", selection: "LAL", price: 1.8, winProbability: 0.65 },
  { sport: "NBA", eventId: "e1", selection: "NYK", price: 1.9, winProbability: 0.45 },
  { sport: "NFL", eventId: "e3", selection: "KC", price: 2.1, winProbability: 0.5 },
];

const createOptimizer = (composer = new CandidateComposer({ logger })) =>
  new ParlayOptimizer({ composer, kellyFraction: 0.25, maxExposurePct: 0.2, logger });

describe("ParlayOptimizer", () => {
  test("ranks eligible candidates by expected value", () => {
    const optimizer = createOptimizer();
    const candidates = optimizer.generate(pool, ["nba"], 0.05, 2, 1000, 10);
    assert.deepEqual(
      candidates.map((candidate) => candidate.id),
      ["NBA:e1/BOS+e2/LAL", "NBA:e1/BOS", "NBA:e2/LAL"],
    );
    assert.ok(candidates.every((candidate) => candidate.sport === "NBA"));
  });

  test("records why combinations were dropped", () => {
    const optimizer = createOptimizer();
    optimizer.generate(pool, ["NBA"], 0.05, 2, 1000, 10);
    assert.deepEqual(optimizer.getDiagnostics(), {
      combinationsConsidered: 6,
      built: 5,
      skipCounts: { SKIP_INVALID_LEG: 0, SKIP_SAME_EVENT: 1, SKIP_LOW_EDGE: 2, SKIP_NO_STAKE: 0 },
    });
  });

  test("truncates to topN", () => {
    const candidates = createOptimizer().generate(pool, ["NBA"], 0.05, 2, 1000, 1);
    assert.deepEqual(candidates.map((candidate) => candidate.id), ["NBA:e1/BOS+e2/LAL"]);
    assert.deepEqual(createOptimizer().generate(pool, ["NBA"], 0.05, 2, 1000, 0), []);
  });

  test("breaks expected-value ties on the lower combined price", () => {
    const tied: PoolLeg[] = [
      { sport: "NHL", eventId: "e6", selection: "B", price: 3.0, winProbability: 0.4 },
      { sport: "NHL", eventId: "e5", selection: "A", price: 2.0, winProbability: 0.6 },
    ];
    const candidates = createOptimizer().generate(tied, ["NHL"], 0.05, 1, 1000, 10);
    assert.deepEqual(candidates.map((candidate) => candidate.combinedPrice), [2, 3]);
    assert.deepEqual(candidates.map((candidate) => candidate.expectedValue), [0.2, 0.2]);
  });

  test("never mixes sports in one candidate", () => {
    const candidates = createOptimizer().generate(pool, ["NBA", "NFL"], 0.05, 3, 1000, 10);
    for (const candidate of candidates) {
      assert.ok(candidate.legs.length === 1 || candidate.sport === "NBA");
    }
    assert.ok(candidates.some((candidate) => candidate.id === "NFL:e3/KC"));
  });

  test("skips combinations with an invalid leg and keeps going", () => {
    const withBad: PoolLeg[] = [
      pool[0],
      { sport: "NBA", eventId: "e9", selection: "BAD", price: 0.9, winProbability: 0.5 },
    ];
    const optimizer = createOptimizer();
    const candidates = optimizer.generate(withBad, ["NBA"], 0.05, 2, 1000, 10);
    assert.deepEqual(candidates.map((candidate) => candidate.id), ["NBA:e1/BOS"]);
    assert.equal(optimizer.getDiagnostics().skipCounts.SKIP_INVALID_LEG, 2);
  });

  test("drops candidates that size to zero", () => {
    const optimizer = createOptimizer();
    assert.deepEqual(optimizer.generate(pool, ["NFL"], 0.05, 1, 0, 10), []);
    assert.equal(optimizer.getDiagnostics().skipCounts.SKIP_NO_STAKE, 1);
  });

  test("propagates errors other than validation failures", () => {
    class FailingComposer extends CandidateComposer {
      build(): Candidate {
        throw new Error("composer offline");
      }
    }
    const optimizer = createOptimizer(new FailingComposer({ logger }));
    assert.throws(() => optimizer.generate(pool, ["NBA"], 0.05, 1, 1000, 10), /composer offline/);
  });

  test("rejects invalid limits", () => {
    const optimizer = createOptimizer();
    assert.throws(() => optimizer.generate(pool, ["NBA"], 0.05, 0, 1000, 10), ValidationError);
    assert.throws(() => optimizer.generate(pool, ["NBA"], 0.05, 2, 1000, -1), ValidationError);
  });

  test("enumerate restarts on every call", () => {
    const optimizer = createOptimizer();
    const first = [...optimizer.enumerate(pool, ["NFL"], 1, 1000)];
    const second = [...optimizer.enumerate(pool, ["NFL"], 1, 1000)];
    assert.equal(first.length, 1);
    assert.deepEqual(second, first);
  });
});
