// apps/qc/src/rules/lt15_mean_stdev.ts
import { QC_FLAG, type QcFlagV1 } from "@waveqc/contracts";
import { isPresent } from "../util";
import { presentStats } from "./stats";

/**
 * LT test 15: value must lie within `numStdevs` standard deviations of the mean.
 *
 * Mean and sample stdev are taken over the working population only, so data
 * that failed an earlier run does not widen the band.
 *
 * Degenerate population (fewer than 2 present values, or every present value
 * identical): the band is undefined and every position passes.
 * Absent values pass here; the missing test reports them.
 */
export function testMeanStdev(values: ReadonlyArray<number | null>, numStdevs = 4): QcFlagV1[] {
  const stats = presentStats(values);
  if (!stats || stats.stdev === 0 || stats.min === stats.max) {
    return values.map(() => QC_FLAG.PASS);
  }

  const limit = numStdevs * stats.stdev;
  return values.map((v) => {
    if (!isPresent(v)) return QC_FLAG.PASS;
    return Math.abs(v - stats.mean) > limit ? QC_FLAG.FAIL : QC_FLAG.PASS;
  });
}
