// apps/qc/src/config/schema.ts
//
// QcConfigV1: versioned defaults for every test, loaded from
// config/qc/default.json and validated before any run.

import { z } from "zod";
import { PropagationRuleV1Schema } from "@waveqc/contracts";

const RangeZ = z
  .object({ min: z.number().finite(), max: z.number().finite() })
  .strict()
  .refine((r) => r.min <= r.max, { message: "min must be <= max" });

export const QcConfigV1Schema = z
  .object({
    schema_version: z.string().regex(/^\d+\.\d+\.\d+$/),
    name: z.string().min(1).optional(),
    long_term: z
      .object({
        parameters: z.array(z.string().min(1)).min(1),
        num_stdevs: z.number().positive(),
        flatline: z
          .object({
            suspect_run: z.number().int().min(2),
            fail_run: z.number().int().min(2),
            tolerance: z.number().nonnegative(),
          })
          .strict()
          .refine((f) => f.fail_run >= f.suspect_run, { message: "fail_run must be >= suspect_run" }),
        angular_marker: z.string().min(1),
        propagation_rules: z.array(PropagationRuleV1Schema),
      })
      .strict(),
    short_term: z
      .object({
        parameters: z.array(z.string().min(1)).min(1),
        missing_run_limit: z.number().int().min(1),
        num_stdevs: z.number().positive(),
        instrument_range: RangeZ,
        local_range: RangeZ,
      })
      .strict(),
    csv: z.object({ missing_markers: z.array(z.string()) }).strict(),
    logging: z.object({ level: z.string().min(1) }).strict(),
  })
  .strict();

export type QcConfigV1 = z.infer<typeof QcConfigV1Schema>;
export type LongTermDefaults = QcConfigV1["long_term"];
export type ShortTermDefaults = QcConfigV1["short_term"];
