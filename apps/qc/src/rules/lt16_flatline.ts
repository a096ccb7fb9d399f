// apps/qc/src/rules/lt16_flatline.ts
import { QC_FLAG, type QcFlagV1 } from "@waveqc/contracts";
import { isPresent } from "../util";

export type FlatlineOptions = {
  suspectRun?: number;
  failRun?: number;
  tolerance?: number;
};

export const MIN_FLAT_RUN = 2;

export function normalizeRunLength(n: number): number {
  if (!Number.isFinite(n)) return MIN_FLAT_RUN;
  return Math.max(MIN_FLAT_RUN, Math.trunc(n));
}

/**
 * True when x[i] and the runLength - 1 values before it agree within tolerance:
 * sum(|x[i] - x[i-k]|, k = 1..runLength-1) < tolerance * (runLength - 1).
 * Positions without enough history, or with an absent value in the window, do not hold.
 */
export function flatRunHolds(
  values: ReadonlyArray<number | null>,
  i: number,
  runLength: number,
  tolerance: number
): boolean {
  if (i < runLength - 1) return false;
  const x = values[i];
  if (!isPresent(x)) return false;

  let sum = 0;
  for (let k = 1; k < runLength; k++) {
    const prev = values[i - k];
    if (!isPresent(prev)) return false;
    sum += Math.abs(x - prev);
  }
  return sum < tolerance * (runLength - 1);
}

/**
 * LT test 16: flatline detection.
 *
 * 4 where a fail-length run completes, 3 where only a suspect-length run does.
 * A stretch of consecutive flagged positions that reaches fail length is
 * reported once as a fail: its suspect-only positions are cleared to 0.
 *
 *   [1, 1, 1, 1, 1, 9] (suspect 3, fail 5) -> [0, 0, 0, 0, 4, 0]
 *   [1, 1, 1, 1, 9]                        -> [0, 0, 3, 3, 0]
 */
export function testFlatline(values: ReadonlyArray<number | null>, opts: FlatlineOptions = {}): QcFlagV1[] {
  const suspectRun = normalizeRunLength(opts.suspectRun ?? 3);
  const failRun = Math.max(suspectRun, normalizeRunLength(opts.failRun ?? 5));
  const tolerance = opts.tolerance ?? 0.01;

  const n = values.length;
  const out: QcFlagV1[] = new Array<QcFlagV1>(n).fill(QC_FLAG.PASS);

  let segStart = -1;
  let segHasFail = false;

  const closeSegment = (end: number): void => {
    if (segStart < 0) return;
    if (segHasFail) {
      for (let j = segStart; j < end; j++) {
        if (out[j] === QC_FLAG.SUSPECT) out[j] = QC_FLAG.PASS;
      }
    }
    segStart = -1;
    segHasFail = false;
  };

  for (let i = 0; i < n; i++) {
    const fail = flatRunHolds(values, i, failRun, tolerance);
    const suspect = !fail && flatRunHolds(values, i, suspectRun, tolerance);

    if (!fail && !suspect) {
      closeSegment(i);
      continue;
    }

    if (segStart < 0) segStart = i;
    if (fail) {
      out[i] = QC_FLAG.FAIL;
      segHasFail = true;
    } else {
      out[i] = QC_FLAG.SUSPECT;
    }
  }
  closeSegment(n);

  return out;
}
