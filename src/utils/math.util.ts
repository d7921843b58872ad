export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

/** Ratios, probabilities and factors */
export function round4(value: number): number {
  return roundTo(value, 4);
}

/** Currency amounts */
export function round2(value: number): number {
  return roundTo(value, 2);
}

export function product(values: Iterable<number>): number {
  let total = 1;
  for (const value of values) total *= value;
  return total;
}
