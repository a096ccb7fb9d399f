import assert from "node:assert/strict";
import { test } from "node:test";

import pino from "pino";

import { logNotice, normalizeLevel } from "../logger";

type LogRecord = { level: number; msg: string; code: string; parameter: string };

function capture() {
  const lines: string[] = [];
  const log = pino(
    { level: "info" },
    {
      write: (s: string) => {
        lines.push(s);
      },
    }
  );
  const records = (): LogRecord[] =>
    lines.map((l) => {
      const r: LogRecord = JSON.parse(l);
      return r;
    });
  return { log, records };
}

test("normalizeLevel", () => {
  assert.equal(normalizeLevel("WARNING"), "warn");
  assert.equal(normalizeLevel("debug"), "debug");
  assert.equal(normalizeLevel("loud"), "info");
  assert.equal(normalizeLevel(undefined), "info");
});

test("logNotice: defaults at info, everything else at warn", () => {
  const { log, records } = capture();
  logNotice(log, { parameter: "hm0", test: "16", code: "DEFAULT_USED", message: "Using default value of 3 for suspect flatline definition" });
  logNotice(log, { parameter: "hm0", test: "20", code: "INSUFFICIENT_METADATA", message: "Insufficient metadata to run test 20 on hm0" });

  const out = records();
  assert.deepEqual(
    out.map((r) => [r.level, r.code, r.msg]),
    [
      [30, "DEFAULT_USED", "Using default value of 3 for suspect flatline definition"],
      [40, "INSUFFICIENT_METADATA", "Insufficient metadata to run test 20 on hm0"],
    ]
  );
  assert.equal(out[1].parameter, "hm0");
});
