import { isPresent } from "../util";

export type PresentStats = { n: number; mean: number; stdev: number; min: number; max: number };

/**
 * Mean and sample standard deviation (n - 1) over present values only.
 * Returns null when fewer than 2 values are present.
 */
export function presentStats(values: ReadonlyArray<number | null>): PresentStats | null {
  const xs = values.filter(isPresent);
  const n = xs.length;
  if (n < 2) return null;

  let s = 0;
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const x of xs) {
    s += x;
    if (x < min) min = x;
    if (x > max) max = x;
  }
  const mean = s / n;

  let ss = 0;
  for (const x of xs) ss += (x - mean) ** 2;
  const stdev = Math.sqrt(ss / (n - 1));

  return { n, mean, stdev, min, max };
}
