// apps/qc/src/masking/working_population.ts
//
// Masking policy: rows whose prior overall flag is worse than suspect (4 or 8)
// are excluded from the population every test sees. The source columns are not
// touched; results are scattered back through `positions`.

import type { TimeSeriesColumn } from "@waveqc/contracts";
import { isPresent } from "../util";

export const MASK_ABOVE_FLAG = 3;

export type WorkingPopulation = Readonly<{
  // original row positions of the included values, ascending
  positions: ReadonlyArray<number>;
  values: ReadonlyArray<number | null>;
  // per original row: true when excluded
  masked: ReadonlyArray<boolean>;
}>;

export function isMaskedFlag(prior: number | null | undefined): boolean {
  return isPresent(prior) && prior > MASK_ABOVE_FLAG;
}

export function buildWorkingPopulation(
  values: TimeSeriesColumn,
  priorQc?: TimeSeriesColumn | null
): WorkingPopulation {
  const positions: number[] = [];
  const included: Array<number | null> = [];
  const masked: boolean[] = [];

  for (let i = 0; i < values.length; i++) {
    const m = priorQc ? isMaskedFlag(priorQc[i]) : false;
    masked.push(m);
    if (m) continue;
    positions.push(i);
    included.push(values[i]);
  }

  return Object.freeze({
    positions: Object.freeze(positions),
    values: Object.freeze(included),
    masked: Object.freeze(masked),
  });
}

/**
 * Writes population-aligned results into a full-length column.
 * Masked rows keep `fill`.
 */
export function scatter<T>(population: WorkingPopulation, results: ReadonlyArray<T>, rowCount: number, fill: T): T[] {
  if (results.length !== population.positions.length) {
    throw new Error(`scatter: ${results.length} results for ${population.positions.length} positions`);
  }
  const out = new Array<T>(rowCount).fill(fill);
  population.positions.forEach((pos, j) => {
    out[pos] = results[j];
  });
  return out;
}
