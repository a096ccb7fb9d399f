import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

export function stableStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function sha256Hex(s: string): string {
  return createHash("sha256").update(s).digest("hex");
}

function canonicalize(x: unknown): unknown {
  if (x === null || x === undefined) return x;
  if (Array.isArray(x)) {
    return x.map(canonicalize);
  }
  if (typeof x === "object") {
    const out: Record<string, unknown> = {};
    const entries = Object.entries(x).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [k, v] of entries) out[k] = canonicalize(v);
    return out;
  }
  return x;
}

export function isPresent(v: number | null | undefined): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

/**
 * Loose numeric parse for metadata/CSV cells: "" / non-numeric -> NaN.
 */
export function safeNum(x: unknown): number {
  if (typeof x === "number") return Number.isFinite(x) ? x : NaN;
  if (typeof x === "string") {
    const s = x.trim();
    if (!s) return NaN;
    const n = Number(s);
    return Number.isFinite(n) ? n : NaN;
  }
  return NaN;
}

/**
 * Boolean parse for metadata flags (True/False columns, yes/no, numbers).
 * Any non-zero finite number is true. Returns null when the value is not
 * recognisably boolean.
 */
export function safeBool(x: unknown): boolean | null {
  if (typeof x === "boolean") return x;
  if (typeof x === "number") return Number.isFinite(x) ? x !== 0 : null;
  if (typeof x === "string") {
    const s = x.trim().toLowerCase();
    if (s === "true" || s === "1" || s === "yes") return true;
    if (s === "false" || s === "0" || s === "no") return false;
  }
  return null;
}

/**
 * Find repo root by walking upward from `startDir` until `requiredRelativePath` exists.
 *
 * Contract:
 * - Returns an absolute directory path.
 * - Throws if the root cannot be found within `maxHops`.
 */
export function findRepoRoot(startDir: string, requiredRelativePath: string, maxHops = 8): string {
  let cur = path.resolve(startDir);

  for (let hop = 0; hop <= maxHops; hop++) {
    const probe = path.join(cur, requiredRelativePath);
    if (fs.existsSync(probe)) return cur;

    const parent = path.dirname(cur);
    if (parent === cur) break; // reached filesystem root
    cur = parent;
  }

  throw new Error(`Cannot locate repo root from ${startDir}; missing ${requiredRelativePath}`);
}
