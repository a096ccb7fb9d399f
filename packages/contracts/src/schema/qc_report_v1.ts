// packages/contracts/src/schema/qc_report_v1.ts
import { z } from "zod";
import { TimeSeriesColumnSchema } from "./time_series_v1";

/**
 * QcReportV1
 *
 * Detail and clean reports share this shape. `columns` fixes the output order;
 * `data` holds one array per column, aligned with `index`.
 */
export const QcReportV1Schema = z.object({
  index: z.array(z.string()),
  columns: z.array(z.string().min(1)),
  data: z.record(z.string(), TimeSeriesColumnSchema),
});

export type QcReportV1 = z.infer<typeof QcReportV1Schema>;

export const QcRunMetaV1Schema = z.object({
  pipeline_version: z.literal("long_term_qc_v1"),
  config_hash: z.string(),
  determinism_hash: z.string(),
  row_count: z.number().int().nonnegative(),
  parameters: z.array(z.string()),
});

export type QcRunMetaV1 = z.infer<typeof QcRunMetaV1Schema>;
