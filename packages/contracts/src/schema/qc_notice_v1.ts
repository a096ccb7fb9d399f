// packages/contracts/src/schema/qc_notice_v1.ts
import { z } from "zod";

/**
 * QcNoticeV1
 * ----------
 * Non-fatal condition raised while configuring or running a test.
 * Notices never stop a run; the affected test degrades instead.
 */
export const QcNoticeCodeV1Schema = z.enum([
  "DEFAULT_USED",
  "RUN_LENGTH_CLAMPED",
  "INSUFFICIENT_METADATA",
  "INVALID_METADATA",
  "RULE_SKIPPED",
]);

export const QcNoticeV1Schema = z.object({
  parameter: z.string(),
  test: z.string(),
  code: QcNoticeCodeV1Schema,
  message: z.string(),
});

export type QcNoticeCodeV1 = z.infer<typeof QcNoticeCodeV1Schema>;
export type QcNoticeV1 = z.infer<typeof QcNoticeV1Schema>;
