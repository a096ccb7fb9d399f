// packages/contracts/src/schema/propagation_rule_v1.ts
import { z } from "zod";
import { QcFlagV1Schema } from "./qc_flag_v1";

// Test ids in execution order. Report columns are `<param>_<id>`.
export const LONG_TERM_TEST_IDS = ["missing", "15", "16", "19", "20"] as const;

export const LongTermTestIdSchema = z.enum(LONG_TERM_TEST_IDS);

export type LongTermTestId = z.infer<typeof LongTermTestIdSchema>;

/**
 * PropagationRuleV1
 *
 * Wherever `<source_parameter>_<source_test>` equals trigger_flag, every
 * dependent parameter's `_qc` is forced to forced_flag.
 */
export const PropagationRuleV1Schema = z
  .object({
    source_parameter: z.string().min(1),
    source_test: LongTermTestIdSchema,
    trigger_flag: QcFlagV1Schema,
    forced_flag: QcFlagV1Schema,
    dependent_parameters: z.array(z.string().min(1)).min(1),
  })
  .strict();

export type PropagationRuleV1 = z.infer<typeof PropagationRuleV1Schema>;
