// packages/contracts/src/schema/param_qc_config_v1.ts
import { z } from "zod";

/**
 * ParamQcConfigV1
 * ---------------
 * Resolved configuration for one parameter, built once by the metadata binder.
 * range / roc_delta are null when the station does not configure them; the
 * corresponding tests are then skipped (all pass).
 */
export const FeasibleRangeV1Schema = z
  .object({
    min: z.number().finite(),
    max: z.number().finite(),
    critical: z.boolean(),
  })
  .refine((r) => r.min <= r.max, { message: "range min must be <= max" });

export const ParamQcConfigV1Schema = z
  .object({
    parameter: z.string().min(1),
    num_stdevs: z.number().positive(),
    flatline_suspect_run: z.number().int().min(2),
    flatline_fail_run: z.number().int().min(2),
    flatline_tolerance: z.number().nonnegative(),
    range: FeasibleRangeV1Schema.nullable(),
    roc_delta: z.number().finite().nullable(),
    roc_is_angular: z.boolean(),
  })
  .refine((c) => c.flatline_fail_run >= c.flatline_suspect_run, {
    message: "flatline_fail_run must be >= flatline_suspect_run",
    path: ["flatline_fail_run"],
  });

export type FeasibleRangeV1 = z.infer<typeof FeasibleRangeV1Schema>;
export type ParamQcConfigV1 = z.infer<typeof ParamQcConfigV1Schema>;
