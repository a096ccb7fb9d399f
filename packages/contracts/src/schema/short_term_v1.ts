// packages/contracts/src/schema/short_term_v1.ts
import { z } from "zod";
import { ShortTermFlagV1Schema } from "./qc_flag_v1";

/**
 * ShortTermResultV1
 *
 * Per-parameter output of the short-term tests:
 * - missing_run_flag (test 9): one flag for the whole file
 * - rows[].test10: standard-deviation outlier (boolean)
 * - rows[].test11: instrument/local range flag (1/3/4)
 */
export const ShortTermRowV1Schema = z.object({
  index: z.string(),
  value: z.number().finite().nullable(),
  test9: ShortTermFlagV1Schema,
  test10: z.boolean(),
  test11: ShortTermFlagV1Schema,
});

export const ShortTermResultV1Schema = z.object({
  parameter: z.string().min(1),
  missing_run_flag: ShortTermFlagV1Schema,
  max_missing_run: z.number().int().nonnegative(),
  rows: z.array(ShortTermRowV1Schema),
});

export type ShortTermRowV1 = z.infer<typeof ShortTermRowV1Schema>;
export type ShortTermResultV1 = z.infer<typeof ShortTermResultV1Schema>;
