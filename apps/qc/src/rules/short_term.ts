// apps/qc/src/rules/short_term.ts
//
// Short-term (per-file) tests. Single pass, no masking, no station metadata.
// Flags use the 1/3/4 scale.

import { ST_FLAG, type ShortTermFlagV1 } from "@waveqc/contracts";
import { isPresent } from "../util";
import { presentStats } from "./stats";

export function longestMissingRun(values: ReadonlyArray<number | null>): number {
  let longest = 0;
  let cur = 0;
  for (const v of values) {
    if (isPresent(v)) {
      cur = 0;
      continue;
    }
    cur++;
    if (cur > longest) longest = cur;
  }
  return longest;
}

// ST test 9: fail the whole file when `limit` or more consecutive values are missing.
export function testMissingRun(values: ReadonlyArray<number | null>, limit = 4): ShortTermFlagV1 {
  return longestMissingRun(values) >= limit ? ST_FLAG.FAIL : ST_FLAG.PASS;
}

// ST test 10: true where the value is more than `numStdevs` from the mean.
export function testStdevOutlier(values: ReadonlyArray<number | null>, numStdevs = 4): boolean[] {
  const stats = presentStats(values);
  if (!stats || stats.stdev === 0) return values.map(() => false);
  const limit = numStdevs * stats.stdev;
  return values.map((v) => isPresent(v) && Math.abs(v - stats.mean) > limit);
}

export type RangePair = {
  instrument: { min: number; max: number };
  local: { min: number; max: number };
};

// ST test 11: 4 outside the instrument range, 3 outside the local range, else 1.
export function testLocalRange(values: ReadonlyArray<number | null>, ranges: RangePair): ShortTermFlagV1[] {
  return values.map((v) => {
    if (!isPresent(v)) return ST_FLAG.PASS;
    if (v > ranges.instrument.max || v < ranges.instrument.min) return ST_FLAG.FAIL;
    if (v > ranges.local.max || v < ranges.local.min) return ST_FLAG.SUSPECT;
    return ST_FLAG.PASS;
  });
}
