// packages/contracts/src/schema/station_metadata_v1.ts
import { z } from "zod";

/**
 * StationMetadataV1
 * -----------------
 * Flat key/value table for one station, e.g.
 *   hm0_min, hm0_max, hm0_critical, hm0_flatsuspect, hm0_flatfail, mdir_roc
 * Values arrive untyped from CSV/JSON; the metadata binder interprets them.
 */
export const MetadataValueSchema = z.union([z.number(), z.boolean(), z.string()]);

export const StationMetadataV1Schema = z.record(z.string().min(1), MetadataValueSchema);

export type MetadataValue = z.infer<typeof MetadataValueSchema>;
export type StationMetadataV1 = z.infer<typeof StationMetadataV1Schema>;

// Known per-parameter key suffixes (`<param>_<suffix>`).
export const METADATA_SUFFIX = {
  RANGE_MIN: "min",
  RANGE_MAX: "max",
  RANGE_CRITICAL: "critical",
  ROC_DELTA: "roc",
  ROC_ANGULAR: "angular",
  FLAT_SUSPECT: "flatsuspect",
  FLAT_FAIL: "flatfail",
  FLAT_EPS: "flateps",
  NUM_STDEVS: "stdevs",
} as const;

export function metadataKey(parameter: string, suffix: string): string {
  return `${parameter}_${suffix}`;
}
