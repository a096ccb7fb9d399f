import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { test } from "node:test";

import { QcConfigError } from "../errors";
import { computeConfigHash, loadConfigFile, parseConfig, resolveConfigPath } from "../config/ssot";
import { DEFAULT_CONFIG_PATH, defaultConfig } from "./fixtures";

test("default config loads with documented defaults", () => {
  const cfg = defaultConfig();
  assert.equal(cfg.schema_version, "1.0.0");
  assert.deepEqual(cfg.long_term.parameters, ["hm0", "mdir", "tm02"]);
  assert.equal(cfg.long_term.num_stdevs, 4);
  assert.deepEqual(cfg.long_term.flatline, { suspect_run: 3, fail_run: 5, tolerance: 0.01 });
  assert.equal(cfg.long_term.angular_marker, "dir");
  assert.deepEqual(cfg.long_term.propagation_rules, [
    { source_parameter: "hm0", source_test: "19", trigger_flag: 4, forced_flag: 4, dependent_parameters: ["mdir", "tm02"] },
  ]);
  assert.deepEqual(cfg.short_term.instrument_range, { min: -750, max: 750 });
  assert.deepEqual(cfg.short_term.local_range, { min: -500, max: 500 });
});

test("discovery walks up to the repo config", () => {
  assert.equal(resolveConfigPath({}), DEFAULT_CONFIG_PATH);
});

test("WAVEQC_CONFIG_PATH overrides discovery", () => {
  assert.equal(resolveConfigPath({ WAVEQC_CONFIG_PATH: "some/where.json" }), path.resolve("some/where.json"));
});

test("invalid config is rejected with the offending path", () => {
  const cfg = defaultConfig();
  const crossed = { ...cfg, long_term: { ...cfg.long_term, flatline: { ...cfg.long_term.flatline, fail_run: 2 } } };
  assert.throws(
    () => parseConfig(crossed),
    (err: unknown) => err instanceof QcConfigError && err.issues.some((i) => i.startsWith("long_term.flatline")),
  );

  const extra = { ...cfg, long_term: { ...cfg.long_term, extra: true } };
  assert.throws(() => parseConfig(extra), QcConfigError);
});

test("unreadable config file is a QcConfigError", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "waveqc-cfg-"));
  const bad = path.join(dir, "bad.json");
  fs.writeFileSync(bad, "{ not json");
  assert.throws(() => loadConfigFile(bad), QcConfigError);
  assert.throws(() => loadConfigFile(path.join(dir, "missing.json")), QcConfigError);
  fs.rmSync(dir, { recursive: true, force: true });
});

test("config hash ignores key order", () => {
  const cfg = defaultConfig();
  const { logging, ...rest } = cfg;
  const reordered = parseConfig(JSON.parse(JSON.stringify({ logging, ...rest })));
  assert.equal(computeConfigHash(reordered), computeConfigHash(cfg));
  assert.match(computeConfigHash(cfg), /^sha256:[0-9a-f]{64}$/);
});
