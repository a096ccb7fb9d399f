// packages/contracts/src/schema/time_series_v1.ts
import { z } from "zod";

/**
 * TimeSeriesV1Schema
 *
 * Column-oriented table keyed by timestamp labels.
 * - index: timestamp labels as read from the source (unique, strictly increasing)
 * - columns: one numeric array per column, same length as index; null = no data
 */
export const TimeSeriesColumnSchema = z.array(z.number().finite().nullable());

/**
 * Sort key for an index label: numeric labels compare numerically,
 * everything else must parse as a date. NaN means "not orderable".
 */
export function indexSortKey(label: string): number {
  const s = label.trim();
  if (!s) return NaN;
  const n = Number(s);
  if (Number.isFinite(n)) return n;
  const t = Date.parse(s);
  return Number.isFinite(t) ? t : NaN;
}

export const TimeSeriesV1Schema = z
  .object({
    index: z.array(z.string().min(1)),
    columns: z.record(z.string().min(1), TimeSeriesColumnSchema),
  })
  .superRefine((v, ctx) => {
    const n = v.index.length;
    for (const [name, col] of Object.entries(v.columns)) {
      if (col.length !== n) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `column ${name} has ${col.length} rows, index has ${n}`,
          path: ["columns", name],
        });
      }
    }

    let prev = Number.NEGATIVE_INFINITY;
    for (let i = 0; i < n; i++) {
      const key = indexSortKey(v.index[i]);
      if (!Number.isFinite(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `index label is not a number or date: ${v.index[i]}`,
          path: ["index", i],
        });
        return;
      }
      if (key <= prev) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `index must be unique and strictly increasing (at ${v.index[i]})`,
          path: ["index", i],
        });
        return;
      }
      prev = key;
    }
  });

export type TimeSeriesColumn = z.infer<typeof TimeSeriesColumnSchema>;
export type TimeSeriesV1 = z.infer<typeof TimeSeriesV1Schema>;

export function qcColumnName(parameter: string): string {
  return `${parameter}_qc`;
}
