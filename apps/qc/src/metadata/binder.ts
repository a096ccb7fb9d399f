// apps/qc/src/metadata/binder.ts
//
// Resolves the structured per-parameter QC config from a station's flat
// key/value metadata. Lookup rules:
// - candidate keys are those containing the parameter name
// - each setting is read from its exact key `<param>_<suffix>`
// - missing or malformed settings fall back to config defaults with a notice
// - feasible range needs min, max and critical together, otherwise the test is skipped
//
// Never throws on station metadata content.

import {
  METADATA_SUFFIX,
  ParamQcConfigV1Schema,
  metadataKey,
  type FeasibleRangeV1,
  type MetadataValue,
  type ParamQcConfigV1,
  type QcNoticeV1,
  type StationMetadataV1,
} from "@waveqc/contracts";

import type { LongTermDefaults } from "../config/schema";
import { MIN_FLAT_RUN } from "../rules/lt16_flatline";
import { safeBool, safeNum } from "../util";

export type BoundParamConfig = {
  config: ParamQcConfigV1;
  metadataKeys: string[];
  notices: QcNoticeV1[];
};

export function selectParameterKeys(parameter: string, metadata: StationMetadataV1): string[] {
  return Object.keys(metadata)
    .filter((k) => k.includes(parameter))
    .sort();
}

export function bindParameterConfig(
  parameter: string,
  metadata: StationMetadataV1,
  defaults: LongTermDefaults
): BoundParamConfig {
  const notices: QcNoticeV1[] = [];
  const metadataKeys = selectParameterKeys(parameter, metadata);
  const available = new Set(metadataKeys);

  const notice = (test: string, code: QcNoticeV1["code"], message: string): void => {
    notices.push({ parameter, test, code, message });
  };

  const lookup = (suffix: string): MetadataValue | undefined => {
    const key = metadataKey(parameter, suffix);
    return available.has(key) ? metadata[key] : undefined;
  };

  const numberSetting = (test: string, suffix: string): number | null => {
    const raw = lookup(suffix);
    if (raw === undefined) return null;
    const n = safeNum(raw);
    if (!Number.isFinite(n)) {
      notice(test, "INVALID_METADATA", `${metadataKey(parameter, suffix)}=${String(raw)} is not numeric; ignored`);
      return null;
    }
    return n;
  };

  // --- test 15 ---
  let numStdevs = defaults.num_stdevs;
  const stdevs = numberSetting("15", METADATA_SUFFIX.NUM_STDEVS);
  if (stdevs !== null) {
    if (stdevs > 0) numStdevs = stdevs;
    else notice("15", "INVALID_METADATA", `${metadataKey(parameter, METADATA_SUFFIX.NUM_STDEVS)} must be > 0; using ${numStdevs}`);
  }

  // --- test 16 ---
  const runLength = (suffix: string, fallback: number, label: string): number => {
    const n = numberSetting("16", suffix);
    if (n === null) {
      notice("16", "DEFAULT_USED", `Using default value of ${fallback} for ${label} flatline definition`);
      return fallback;
    }
    if (n < MIN_FLAT_RUN) {
      notice("16", "RUN_LENGTH_CLAMPED", `${label} flatline run ${n} < ${MIN_FLAT_RUN} is invalid; set to ${MIN_FLAT_RUN}`);
      return MIN_FLAT_RUN;
    }
    if (!Number.isInteger(n)) {
      const t = Math.trunc(n);
      notice("16", "RUN_LENGTH_CLAMPED", `${label} flatline run ${n} is not an integer; set to ${t}`);
      return t;
    }
    return n;
  };

  const suspectRun = runLength(METADATA_SUFFIX.FLAT_SUSPECT, defaults.flatline.suspect_run, "suspect");
  let failRun = runLength(METADATA_SUFFIX.FLAT_FAIL, defaults.flatline.fail_run, "failing");
  if (failRun < suspectRun) {
    notice("16", "RUN_LENGTH_CLAMPED", `failing flatline run ${failRun} < suspect run ${suspectRun}; set to ${suspectRun}`);
    failRun = suspectRun;
  }

  let tolerance = defaults.flatline.tolerance;
  const eps = numberSetting("16", METADATA_SUFFIX.FLAT_EPS);
  if (eps !== null) {
    if (eps >= 0) tolerance = eps;
    else notice("16", "INVALID_METADATA", `${metadataKey(parameter, METADATA_SUFFIX.FLAT_EPS)} must be >= 0; using ${tolerance}`);
  }

  // --- test 19 ---
  const range = bindFeasibleRange(parameter, lookup, notice);

  // --- test 20 ---
  let rocDelta: number | null = null;
  if (lookup(METADATA_SUFFIX.ROC_DELTA) === undefined) {
    notice("20", "INSUFFICIENT_METADATA", `Insufficient metadata to run test 20 on ${parameter}`);
  } else {
    rocDelta = numberSetting("20", METADATA_SUFFIX.ROC_DELTA);
    if (rocDelta === null) notice("20", "INSUFFICIENT_METADATA", `Insufficient metadata to run test 20 on ${parameter}`);
  }

  let rocIsAngular = parameter.includes(defaults.angular_marker);
  const angularRaw = lookup(METADATA_SUFFIX.ROC_ANGULAR);
  if (angularRaw !== undefined) {
    const b = safeBool(angularRaw);
    if (b === null) {
      notice("20", "INVALID_METADATA", `${metadataKey(parameter, METADATA_SUFFIX.ROC_ANGULAR)}=${String(angularRaw)} is not boolean; ignored`);
    } else {
      rocIsAngular = b;
    }
  }

  // clamps above keep this within the schema; a failure here is a binder bug
  const config = ParamQcConfigV1Schema.parse({
    parameter,
    num_stdevs: numStdevs,
    flatline_suspect_run: suspectRun,
    flatline_fail_run: failRun,
    flatline_tolerance: tolerance,
    range,
    roc_delta: rocDelta,
    roc_is_angular: rocIsAngular,
  });

  return { config, metadataKeys, notices };
}

function bindFeasibleRange(
  parameter: string,
  lookup: (suffix: string) => MetadataValue | undefined,
  notice: (test: string, code: QcNoticeV1["code"], message: string) => void
): FeasibleRangeV1 | null {
  const rawMin = lookup(METADATA_SUFFIX.RANGE_MIN);
  const rawMax = lookup(METADATA_SUFFIX.RANGE_MAX);
  const rawCritical = lookup(METADATA_SUFFIX.RANGE_CRITICAL);

  if (rawMin === undefined || rawMax === undefined || rawCritical === undefined) {
    notice("19", "INSUFFICIENT_METADATA", `Insufficient metadata to run test 19 on ${parameter}`);
    return null;
  }

  const min = safeNum(rawMin);
  const max = safeNum(rawMax);
  const critical = safeBool(rawCritical);
  if (!Number.isFinite(min) || !Number.isFinite(max) || critical === null) {
    notice("19", "INVALID_METADATA", `Unreadable feasible range for ${parameter} (min=${String(rawMin)}, max=${String(rawMax)}, critical=${String(rawCritical)}); test 19 skipped`);
    return null;
  }
  if (min > max) {
    notice("19", "INVALID_METADATA", `Feasible range for ${parameter} has min ${min} > max ${max}; test 19 skipped`);
    return null;
  }
  return { min, max, critical };
}
