/**
 * Leg pool file: a JSON array of priced legs.
 *
 *   [{ "eventId": "nba-bos-nyk", "selection": "BOS", "sport": "NBA",
 *      "price": 1.9, "winProbability": 0.56,
 *      "context": { "gameTimeUtc": "2024-03-06T00:30:00Z", "awayUtcOffset": -8 } }]
 */

import { promises as fs } from "fs";
import { ValidationError } from "../errors/app.errors";
import type { PriceMap } from "../market/types";
import type { LegContext, PoolLeg } from "../parlay/types";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const requireString = (entry: Record<string, unknown>, field: string, index: number): string => {
  const value = entry[field];
  if (typeof value !== "string" || value.length === 0) {
    throw new ValidationError(`Leg #${index}: ${field} must be a non-empty string`, field, value);
  }
  return value;
};

const requireNumber = (entry: Record<string, unknown>, field: string, index: number): number => {
  const value = entry[field];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ValidationError(`Leg #${index}: ${field} must be a number`, field, value);
  }
  return value;
};

const optionalNumber = (ctx: Record<string, unknown>, field: string): number | undefined =>
  typeof ctx[field] === "number" ? Number(ctx[field]) : undefined;

const optionalBool = (ctx: Record<string, unknown>, field: string): boolean | undefined =>
  typeof ctx[field] === "boolean" ? Boolean(ctx[field]) : undefined;

function parseContext(raw: unknown, index: number): LegContext | undefined {
  if (raw === undefined) return undefined;
  if (!isRecord(raw) || typeof raw.gameTimeUtc !== "string") {
    throw new ValidationError(`Leg #${index}: context.gameTimeUtc must be an ISO timestamp`, "context", raw);
  }
  const gameTimeUtc = new Date(raw.gameTimeUtc);
  if (Number.isNaN(gameTimeUtc.getTime())) {
    throw new ValidationError(`Leg #${index}: invalid context.gameTimeUtc`, "context.gameTimeUtc", raw.gameTimeUtc);
  }
  return {
    gameTimeUtc,
    homeUtcOffset: optionalNumber(raw, "homeUtcOffset"),
    awayUtcOffset: optionalNumber(raw, "awayUtcOffset"),
    sport: typeof raw.sport === "string" ? raw.sport : undefined,
    awayBackToBack: optionalBool(raw, "awayBackToBack"),
    homeBackToBack: optionalBool(raw, "homeBackToBack"),
  };
}

export function parseLegPool(payload: unknown): PoolLeg[] {
  if (!Array.isArray(payload)) {
    throw new ValidationError("Leg pool must be a JSON array", "legs", payload);
  }
  return payload.map((entry: unknown, index): PoolLeg => {
    if (!isRecord(entry)) {
      throw new ValidationError(`Leg #${index} must be an object`, "legs", entry);
    }
    const context = parseContext(entry.context, index);
    return {
      eventId: requireString(entry, "eventId", index),
      selection: requireString(entry, "selection", index),
      sport: requireString(entry, "sport", index).toUpperCase(),
      price: requireNumber(entry, "price", index),
      winProbability: requireNumber(entry, "winProbability", index),
      ...(context ? { context } : {}),
    };
  });
}

export async function loadLegPool(file: string): Promise<PoolLeg[]> {
  const raw = await fs.readFile(file, { encoding: "utf8" });
  return parseLegPool(JSON.parse(raw));
}

/** Quotes for a paper market, taken from the pool's own prices. */
export function pricesFromPool(legs: readonly PoolLeg[]): PriceMap {
  const prices: PriceMap = {};
  for (const leg of legs) {
    prices[leg.eventId] = { ...prices[leg.eventId], [leg.selection]: leg.price };
  }
  return prices;
}
