import { QC_FLAG, type QcFlagV1 } from "@waveqc/contracts";
import { isPresent } from "../util";

// Flags absent values: 8 where no data, 0 elsewhere.
export function testMissing(values: ReadonlyArray<number | null>): QcFlagV1[] {
  return values.map((v) => (isPresent(v) ? QC_FLAG.PASS : QC_FLAG.MISSING));
}
