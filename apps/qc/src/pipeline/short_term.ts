// apps/qc/src/pipeline/short_term.ts
//
// Short-term QC: tests 9, 10 and 11 on each parameter of one file.
// Stateless single pass; no masking, no station metadata, no propagation.

import type { ShortTermResultV1, TimeSeriesV1 } from "@waveqc/contracts";

import type { ShortTermDefaults } from "../config/schema";
import { createSilentLogger, type QcLogger } from "../logger";
import { longestMissingRun, testLocalRange, testMissingRun, testStdevOutlier } from "../rules/short_term";
import { requireColumns, validateSeries } from "./long_term";

export type ShortTermRunInput = {
  series: TimeSeriesV1;
  parameters?: string[];
};

export function runShortTermQc(
  defaults: ShortTermDefaults,
  input: ShortTermRunInput,
  log: QcLogger = createSilentLogger()
): ShortTermResultV1[] {
  const series = validateSeries(input.series);
  const parameters = Array.from(new Set(input.parameters?.length ? input.parameters : defaults.parameters));
  requireColumns(series, parameters);

  return parameters.map((parameter) => {
    const values = series.columns[parameter];
    const maxRun = longestMissingRun(values);
    const test9 = testMissingRun(values, defaults.missing_run_limit);
    const test10 = testStdevOutlier(values, defaults.num_stdevs);
    const test11 = testLocalRange(values, {
      instrument: defaults.instrument_range,
      local: defaults.local_range,
    });

    log.info({ parameter, test9, max_missing_run: maxRun }, `Parameter ${parameter} test 9 result: ${test9}`);

    return {
      parameter,
      missing_run_flag: test9,
      max_missing_run: maxRun,
      rows: series.index.map((index, i) => ({
        index,
        value: values[i],
        test9,
        test10: test10[i],
        test11: test11[i],
      })),
    };
  });
}
