/**
 * Lazily yields every `size`-element combination of `items`, preserving the
 * items' relative order. Each call starts a fresh enumeration.
 */
export function* combinations<T>(items: readonly T[], size: number): Generator<T[]> {
  if (size <= 0 || size > items.length) return;
  const indices = Array.from({ length: size }, (_, i) => i);
  const n = items.length;

  while (true) {
    yield indices.map((i) => items[i]);

    let pivot = size - 1;
    while (pivot >= 0 && indices[pivot] === n - size + pivot) pivot -= 1;
    if (pivot < 0) return;

    indices[pivot] += 1;
    for (let j = pivot + 1; j < size; j += 1) {
      indices[j] = indices[j - 1] + 1;
    }
  }
}

/** Combinations of every size from 1 through `maxSize`, smallest first. */
export function* combinationsUpTo<T>(items: readonly T[], maxSize: number): Generator<T[]> {
  const limit = Math.min(maxSize, items.length);
  for (let size = 1; size <= limit; size += 1) {
    yield* combinations(items, size);
  }
}

export function binomial(n: number, k: number): number {
  if (k < 0 || k > n) return 0;
  let result = 1;
  for (let i = 1; i <= k; i += 1) {
    result = (result * (n - k + i)) / i;
  }
  return Math.round(result);
}
