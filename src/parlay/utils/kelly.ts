import { round2 } from "../../utils/math.util";

/** Per-unit-stake expected profit at decimal `price` with win probability `p`. */
export function expectedValue(winProbability: number, price: number): number {
  return winProbability * (price - 1) - (1 - winProbability);
}

/**
 * Full-Kelly fraction of bankroll, or 0 when there is no edge,
 * no usable probability, or the price pays nothing.
 */
export function fullKellyFraction(winProbability: number, price: number): number {
  const b = price - 1;
  if (!Number.isFinite(price) || b <= 0) return 0;
  if (!(winProbability > 0 && winProbability < 1)) return 0;
  const kelly = (b * winProbability - (1 - winProbability)) / b;
  return kelly > 0 ? kelly : 0;
}

export function computeKellyStake(params: {
  winProbability: number;
  price: number;
  bankroll: number;
  kellyFraction: number;
  maxExposurePct: number;
}): number {
  const { winProbability, price, bankroll, kellyFraction, maxExposurePct } = params;
  if (!(bankroll > 0) || !(kellyFraction > 0) || !(maxExposurePct > 0)) return 0;
  const full = fullKellyFraction(winProbability, price);
  if (full <= 0) return 0;
  const target = full * kellyFraction * bankroll;
  const cap = bankroll * maxExposurePct;
  const stake = round2(Math.min(target, cap));
  // rounding to cents must never lift the stake over the cap
  return stake > cap ? Math.floor(cap * 100) / 100 : stake;
}
