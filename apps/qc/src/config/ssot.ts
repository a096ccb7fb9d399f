// apps/qc/src/config/ssot.ts
//
// QC config SSOT helpers.
//
// Contract:
// - SSOT file: config/qc/default.json (or WAVEQC_CONFIG_PATH)
// - config_hash: sha256(stableStringify(parsedJson)) with "sha256:" prefix
// - an invalid file is a QcConfigError; there is no silent fallback

import fs from "node:fs";
import path from "node:path";

import { QcConfigError } from "../errors";
import { findRepoRoot, sha256Hex, stableStringify } from "../util";
import { QcConfigV1Schema, type QcConfigV1 } from "./schema";

export const SSOT_RELATIVE_PATH = "config/qc/default.json";

export function resolveConfigPath(env: Record<string, string | undefined> = process.env): string {
  // 1) explicit override
  if (env.WAVEQC_CONFIG_PATH) return path.resolve(env.WAVEQC_CONFIG_PATH);

  // 2) walk upward from cwd until we find the SSOT file
  //    (keeps `apps/qc` as cwd working during workspace scripts)
  const root = findRepoRoot(process.cwd(), SSOT_RELATIVE_PATH);
  return path.join(root, SSOT_RELATIVE_PATH);
}

export function parseConfig(raw: unknown): QcConfigV1 {
  const parsed = QcConfigV1Schema.safeParse(raw);
  if (!parsed.success) {
    throw new QcConfigError(
      "Invalid QC config",
      parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
    );
  }
  return parsed.data;
}

export function loadConfigFile(filePath: string): QcConfigV1 {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new QcConfigError(`Cannot read QC config ${filePath}: ${String(err)}`);
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new QcConfigError(`QC config ${filePath} is not valid JSON: ${String(err)}`);
  }
  return parseConfig(json);
}

export function loadDefaultConfig(): QcConfigV1 {
  return loadConfigFile(resolveConfigPath());
}

export function computeConfigHash(cfg: QcConfigV1): string {
  // canonical hash: stable stringify then sha256
  return `sha256:${sha256Hex(stableStringify(cfg))}`;
}
