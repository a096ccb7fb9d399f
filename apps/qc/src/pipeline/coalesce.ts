import { QC_FLAG, worstFlag, type QcFlagV1 } from "@waveqc/contracts";

export type TestFlags<Id extends string = string> = { test: Id; flags: ReadonlyArray<QcFlagV1> };

/**
 * Row-wise worst flag across a fixed list of (test, flags) pairs.
 * All flag arrays must have `rowCount` entries.
 */
export function coalesceFlags(tests: ReadonlyArray<TestFlags>, rowCount: number): QcFlagV1[] {
  const out = new Array<QcFlagV1>(rowCount).fill(QC_FLAG.PASS);
  for (const t of tests) {
    if (t.flags.length !== rowCount) {
      throw new Error(`coalesce: test ${t.test} has ${t.flags.length} flags, expected ${rowCount}`);
    }
    for (let i = 0; i < rowCount; i++) out[i] = worstFlag(out[i], t.flags[i]);
  }
  return out;
}
