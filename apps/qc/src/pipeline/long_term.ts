// apps/qc/src/pipeline/long_term.ts
//
// Long-term QC report assembler.
//
// Contract:
// - parameters are evaluated independently and sequentially
// - propagation rules run once, after all parameters (hard join point)
// - detail report: raw values, then per parameter <p>_missing,_15,_16,_19,_20,_qc
// - clean report: raw values, then <p>_qc
// - both reports keep the input index unchanged
// - deterministic: same inputs + config => same determinism_hash

import {
  LONG_TERM_TEST_IDS,
  StationMetadataV1Schema,
  TimeSeriesV1Schema,
  qcColumnName,
  type QcNoticeV1,
  type QcReportV1,
  type QcRunMetaV1,
  type StationMetadataV1,
  type TimeSeriesColumn,
  type TimeSeriesV1,
} from "@waveqc/contracts";

import type { QcConfigV1 } from "../config/schema";
import { computeConfigHash } from "../config/ssot";
import { QcInputError } from "../errors";
import { createSilentLogger, logNotice, type QcLogger } from "../logger";
import { bindParameterConfig } from "../metadata/binder";
import { sha256Hex, stableStringify } from "../util";
import { runParameter, testColumnName, type ParameterResult } from "./param_runner";
import { applyPropagationRules } from "./propagator";

export const LONG_TERM_PIPELINE_VERSION = "long_term_qc_v1";

export type LongTermRunInput = {
  series: TimeSeriesV1;
  parameters?: string[];
  metadata?: StationMetadataV1;
};

export type LongTermRunOutput = {
  detail: QcReportV1;
  clean: QcReportV1;
  notices: QcNoticeV1[];
  run_meta: QcRunMetaV1;
};

export function validateSeries(series: unknown): TimeSeriesV1 {
  const parsed = TimeSeriesV1Schema.safeParse(series);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new QcInputError("INVALID_SERIES", `Invalid time series: ${detail}`);
  }
  return parsed.data;
}

export function requireColumns(series: TimeSeriesV1, names: ReadonlyArray<string>): void {
  const missing = names.filter((n) => !(n in series.columns));
  if (missing.length) {
    throw new QcInputError("COLUMN_NOT_FOUND", `Column(s) not found in time series: ${missing.join(", ")}`);
  }
}

export function runLongTermQc(
  cfg: QcConfigV1,
  input: LongTermRunInput,
  log: QcLogger = createSilentLogger()
): LongTermRunOutput {
  const series = validateSeries(input.series);
  const metadata = StationMetadataV1Schema.parse(input.metadata ?? {});
  const parameters = Array.from(new Set(input.parameters?.length ? input.parameters : cfg.long_term.parameters));
  requireColumns(series, parameters);

  const rowCount = series.index.length;
  log.info({ rows: rowCount, parameters }, `${rowCount} new records`);

  const notices: QcNoticeV1[] = [];
  const evaluated: ParameterResult[] = [];

  for (const parameter of parameters) {
    const bound = bindParameterConfig(parameter, metadata, cfg.long_term);
    notices.push(...bound.notices);

    const prior: TimeSeriesColumn | undefined = series.columns[qcColumnName(parameter)];
    const result = runParameter(parameter, series.columns[parameter], prior ?? null, bound.config);
    log.debug(
      { parameter, masked: rowCount - result.population.positions.length, metadata_keys: bound.metadataKeys },
      "parameter evaluated"
    );
    evaluated.push(result);
  }

  const propagated = applyPropagationRules(evaluated, cfg.long_term.propagation_rules);
  notices.push(...propagated.notices);
  for (const [parameter, rows] of Object.entries(propagated.forcedRows)) {
    log.info({ parameter, rows }, "qc forced by propagation rule");
  }
  for (const n of notices) logNotice(log, n);

  const detail = assembleDetailReport(series, propagated.results);
  const clean = projectCleanReport(detail, parameters);

  const config_hash = computeConfigHash(cfg);
  const determinism_hash = `sha256:${sha256Hex(
    stableStringify({ series, parameters, metadata, config_hash, pipeline_version: LONG_TERM_PIPELINE_VERSION })
  )}`;

  return {
    detail,
    clean,
    notices,
    run_meta: {
      pipeline_version: LONG_TERM_PIPELINE_VERSION,
      config_hash,
      determinism_hash,
      row_count: rowCount,
      parameters,
    },
  };
}

export function assembleDetailReport(series: TimeSeriesV1, results: ReadonlyArray<ParameterResult>): QcReportV1 {
  const columns: string[] = [];
  const data: Record<string, TimeSeriesColumn> = {};

  for (const r of results) {
    columns.push(r.parameter);
    data[r.parameter] = series.columns[r.parameter].slice();
  }
  for (const r of results) {
    for (const id of LONG_TERM_TEST_IDS) {
      const name = testColumnName(r.parameter, id);
      columns.push(name);
      data[name] = r.tests[id].slice();
    }
    const qcName = qcColumnName(r.parameter);
    columns.push(qcName);
    data[qcName] = r.qc.slice();
  }

  return { index: series.index.slice(), columns, data };
}

export function projectCleanReport(detail: QcReportV1, parameters: ReadonlyArray<string>): QcReportV1 {
  const columns = [...parameters, ...parameters.map(qcColumnName)];
  const data: Record<string, TimeSeriesColumn> = {};
  for (const c of columns) data[c] = detail.data[c].slice();
  return { index: detail.index.slice(), columns, data };
}
