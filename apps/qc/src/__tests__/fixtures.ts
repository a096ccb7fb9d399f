import path from "node:path";
import { fileURLToPath } from "node:url";

import type { ParamQcConfigV1, TimeSeriesV1 } from "@waveqc/contracts";
import type { QcConfigV1 } from "../config/schema";
import { loadConfigFile } from "../config/ssot";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const REPO_ROOT = path.resolve(__dirname, "../../../..");
export const DEFAULT_CONFIG_PATH = path.join(REPO_ROOT, "config", "qc", "default.json");

export function defaultConfig(): QcConfigV1 {
  return loadConfigFile(DEFAULT_CONFIG_PATH);
}

export function paramConfig(overrides: Partial<ParamQcConfigV1> = {}): ParamQcConfigV1 {
  return {
    parameter: "hm0",
    num_stdevs: 4,
    flatline_suspect_run: 3,
    flatline_fail_run: 5,
    flatline_tolerance: 0.01,
    range: null,
    roc_delta: null,
    roc_is_angular: false,
    ...overrides,
  };
}

// Half-hourly UTC labels starting 2024-01-01T00:00:00Z.
export function halfHourIndex(n: number): string[] {
  const start = Date.UTC(2024, 0, 1);
  return Array.from({ length: n }, (_, i) => new Date(start + i * 30 * 60_000).toISOString());
}

export function series(columns: Record<string, Array<number | null>>): TimeSeriesV1 {
  const lengths = Object.values(columns).map((c) => c.length);
  return { index: halfHourIndex(lengths[0] ?? 0), columns };
}
