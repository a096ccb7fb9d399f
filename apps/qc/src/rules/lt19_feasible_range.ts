import { QC_FLAG, type FeasibleRangeV1, type QcFlagV1 } from "@waveqc/contracts";
import { isPresent } from "../util";

/**
 * LT test 19: operator-defined feasible range per station and parameter.
 * Out-of-range values fail (4) when the parameter is critical, otherwise they
 * are suspect (3). Absent values pass.
 */
export function testFeasibleRange(values: ReadonlyArray<number | null>, range: FeasibleRangeV1): QcFlagV1[] {
  const outFlag: QcFlagV1 = range.critical ? QC_FLAG.FAIL : QC_FLAG.SUSPECT;
  return values.map((v) => {
    if (!isPresent(v)) return QC_FLAG.PASS;
    return v < range.min || v > range.max ? outFlag : QC_FLAG.PASS;
  });
}
