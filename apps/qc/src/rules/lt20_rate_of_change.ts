// apps/qc/src/rules/lt20_rate_of_change.ts
import { QC_FLAG, type QcFlagV1 } from "@waveqc/contracts";
import { isPresent } from "../util";

/**
 * Smallest absolute angle between two compass directions in degrees.
 * 350 -> 10 gives 20, not 340.
 */
export function angularDifference(current: number, previous: number): number {
  const d = current - previous;
  return Math.min(Math.abs(d), Math.abs(d + 360), Math.abs(d - 360));
}

/**
 * LT test 20: one-timestep rate of change must stay below `delta`.
 * 4 where |x[i] - x[i-1]| >= delta, else 0. The first value has no
 * predecessor and passes, as does any step touching an absent value.
 */
export function testRateOfChange(
  values: ReadonlyArray<number | null>,
  delta: number,
  angular = false
): QcFlagV1[] {
  return values.map((v, i) => {
    if (i === 0) return QC_FLAG.PASS;
    const prev = values[i - 1];
    if (!isPresent(v) || !isPresent(prev)) return QC_FLAG.PASS;
    const diff = angular ? angularDifference(v, prev) : Math.abs(v - prev);
    return diff >= delta ? QC_FLAG.FAIL : QC_FLAG.PASS;
  });
}
