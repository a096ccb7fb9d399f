// packages/contracts/src/schema/qc_flag_v1.ts
import { z } from "zod";

/**
 * QcFlagV1
 * --------
 * Standardized per-observation quality code used by the long-term tests.
 * Ordering is significant: a higher code is always a worse result, so
 * combining flags for the same observation is a plain maximum.
 */
export const QC_FLAG = {
  PASS: 0,
  SUSPECT: 3,
  FAIL: 4,
  MISSING: 8,
} as const;

export const QcFlagV1Schema = z.union([
  z.literal(QC_FLAG.PASS),
  z.literal(QC_FLAG.SUSPECT),
  z.literal(QC_FLAG.FAIL),
  z.literal(QC_FLAG.MISSING),
]);

export type QcFlagV1 = z.infer<typeof QcFlagV1Schema>;

export function isQcFlag(x: unknown): x is QcFlagV1 {
  return QcFlagV1Schema.safeParse(x).success;
}

export function worstFlag(a: QcFlagV1, b: QcFlagV1): QcFlagV1 {
  return a >= b ? a : b;
}

/**
 * Short-term tests use their own 1/3/4 scale (1 = pass).
 */
export const ST_FLAG = {
  PASS: 1,
  SUSPECT: 3,
  FAIL: 4,
} as const;

export const ShortTermFlagV1Schema = z.union([
  z.literal(ST_FLAG.PASS),
  z.literal(ST_FLAG.SUSPECT),
  z.literal(ST_FLAG.FAIL),
]);

export type ShortTermFlagV1 = z.infer<typeof ShortTermFlagV1Schema>;
