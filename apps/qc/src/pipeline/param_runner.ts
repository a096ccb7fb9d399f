// apps/qc/src/pipeline/param_runner.ts
//
// One parameter, one pass:
// 1) mask rows that failed a previous run
// 2) run every long-term test in fixed order on the working population
// 3) scatter results into unmasked rows (masked rows stay 0)
// 4) coalesce into `<param>_qc`

import {
  LONG_TERM_TEST_IDS,
  QC_FLAG,
  type LongTermTestId,
  type ParamQcConfigV1,
  type QcFlagV1,
  type TimeSeriesColumn,
} from "@waveqc/contracts";

import { buildWorkingPopulation, scatter, type WorkingPopulation } from "../masking/working_population";
import { testMissing } from "../rules/lt_missing";
import { testMeanStdev } from "../rules/lt15_mean_stdev";
import { testFlatline } from "../rules/lt16_flatline";
import { testFeasibleRange } from "../rules/lt19_feasible_range";
import { testRateOfChange } from "../rules/lt20_rate_of_change";
import { coalesceFlags } from "./coalesce";

export type LongTermTest = {
  id: LongTermTestId;
  // null = not configured for this parameter; the column stays all-pass
  run: (values: ReadonlyArray<number | null>, cfg: ParamQcConfigV1) => QcFlagV1[] | null;
};

export const LONG_TERM_TESTS: ReadonlyArray<LongTermTest> = [
  { id: "missing", run: (values) => testMissing(values) },
  { id: "15", run: (values, cfg) => testMeanStdev(values, cfg.num_stdevs) },
  {
    id: "16",
    run: (values, cfg) =>
      testFlatline(values, {
        suspectRun: cfg.flatline_suspect_run,
        failRun: cfg.flatline_fail_run,
        tolerance: cfg.flatline_tolerance,
      }),
  },
  { id: "19", run: (values, cfg) => (cfg.range ? testFeasibleRange(values, cfg.range) : null) },
  {
    id: "20",
    run: (values, cfg) => (cfg.roc_delta !== null ? testRateOfChange(values, cfg.roc_delta, cfg.roc_is_angular) : null),
  },
];

export type ParameterResult = {
  parameter: string;
  population: WorkingPopulation;
  tests: Record<LongTermTestId, QcFlagV1[]>;
  qc: QcFlagV1[];
};

export function testColumnName(parameter: string, test: LongTermTestId): string {
  return `${parameter}_${test}`;
}

export function runParameter(
  parameter: string,
  values: TimeSeriesColumn,
  priorQc: TimeSeriesColumn | null | undefined,
  cfg: ParamQcConfigV1
): ParameterResult {
  const rowCount = values.length;
  const population = buildWorkingPopulation(values, priorQc);

  const blank = (): QcFlagV1[] => new Array<QcFlagV1>(rowCount).fill(QC_FLAG.PASS);
  const tests: Record<LongTermTestId, QcFlagV1[]> = {
    missing: blank(),
    "15": blank(),
    "16": blank(),
    "19": blank(),
    "20": blank(),
  };

  for (const t of LONG_TERM_TESTS) {
    const flags = t.run(population.values, cfg);
    if (!flags) continue;
    tests[t.id] = scatter<QcFlagV1>(population, flags, rowCount, QC_FLAG.PASS);
  }

  const qc = coalesceFlags(
    LONG_TERM_TEST_IDS.map((id) => ({ test: id, flags: tests[id] })),
    rowCount
  );

  return { parameter, population, tests, qc };
}
