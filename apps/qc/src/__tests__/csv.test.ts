import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { test } from "node:test";

import { QcInputError } from "../errors";
import {
  formatReportCsv,
  formatShortTermCsv,
  parseCsv,
  readTimeSeriesCsv,
  stationMetadataFromCsv,
  timeSeriesFromCsv,
  writeTextFile,
} from "../io/csv";

const isInputError = (code: string) => (err: unknown) => err instanceof QcInputError && err.code === code;

test("parseCsv: quotes, escaped quotes, CRLF and blank lines", () => {
  assert.deepEqual(parseCsv('a,b\n"x,1","say ""hi"""\r\n\n3,\n'), [
    ["a", "b"],
    ["x,1", 'say "hi"'],
    ["3", ""],
  ]);
  assert.deepEqual(parseCsv("a,b"), [["a", "b"]]);
  assert.throws(() => parseCsv('a,"b'), isInputError("INVALID_CSV"));
});

test("timeSeriesFromCsv: first column is the index, missing markers become null", () => {
  const text = "Time,hm0,mdir\n2024-01-01T00:00:00Z,1.5,NaN\n2024-01-01T00:30:00Z,,270\n";
  const parsed = timeSeriesFromCsv(text);

  assert.equal(parsed.timeColumn, "Time");
  assert.deepEqual(parsed.series, {
    index: ["2024-01-01T00:00:00Z", "2024-01-01T00:30:00Z"],
    columns: { hm0: [1.5, null], mdir: [null, 270] },
  });
});

test("timeSeriesFromCsv: named time column anywhere in the header", () => {
  const parsed = timeSeriesFromCsv("hm0,stamp\n1,10\n-2,20\n", { timeColumn: "stamp" });
  assert.deepEqual(parsed.series, { index: ["10", "20"], columns: { hm0: [1, -2] } });
});

test("timeSeriesFromCsv: custom markers", () => {
  const parsed = timeSeriesFromCsv("t,hm0\n1,-999\n2,0.5\n", { missingMarkers: ["-999"] });
  assert.deepEqual(parsed.series.columns.hm0, [null, 0.5]);
});

test("timeSeriesFromCsv: non-numeric cells are rejected, not read as gaps", () => {
  assert.throws(
    () => timeSeriesFromCsv("t,hm0,mdir\n1,0.5,90\n2,abc,95\n"),
    (err: unknown) =>
      err instanceof QcInputError && err.code === "INVALID_CSV" && err.message === 'Non-numeric value "abc" at row 3, column hm0'
  );
  assert.throws(() => timeSeriesFromCsv('t,hm0\n1,"1,5"\n'), /Non-numeric value "1,5" at row 2, column hm0/);
});

test("timeSeriesFromCsv: header problems", () => {
  assert.throws(() => timeSeriesFromCsv("", {}), isInputError("INVALID_CSV"));
  assert.throws(() => timeSeriesFromCsv("t,hm0,hm0\n1,2,3\n"), isInputError("INVALID_CSV"));
  assert.throws(() => timeSeriesFromCsv("t,hm0\n1,2\n", { timeColumn: "Time" }), isInputError("COLUMN_NOT_FOUND"));
  assert.throws(() => timeSeriesFromCsv("t,hm0\n,2\n"), /Row 2 has an empty t/);
});

test("stationMetadataFromCsv: typed values, blank keys skipped", () => {
  const meta = stationMetadataFromCsv("key,value\nhm0_min,0\nhm0_critical,True\nstation,  Buoy A \n,ignored\nmdir_roc,\n");
  assert.deepEqual(meta, { hm0_min: 0, hm0_critical: true, station: "Buoy A", mdir_roc: "" });
});

test("formatReportCsv: null as empty cell, trailing newline", () => {
  const csv = formatReportCsv(
    { index: ["t1", "t2"], columns: ["hm0", "hm0_qc"], data: { hm0: [1.5, null], hm0_qc: [0, 8] } },
    "Time"
  );
  assert.equal(csv, "Time,hm0,hm0_qc\nt1,1.5,0\nt2,,8\n");
});

test("formatShortTermCsv: one row per label", () => {
  const csv = formatShortTermCsv(
    {
      parameter: "Heave",
      missing_run_flag: 1,
      max_missing_run: 0,
      rows: [
        { index: "t1", value: -1.5, test9: 1, test10: false, test11: 1 },
        { index: "t2", value: 900, test9: 1, test10: true, test11: 4 },
      ],
    },
    "Time"
  );
  assert.equal(csv, "Time,Heave,test9,test10,test11\nt1,-1.5,1,False,1\nt2,900,1,True,4\n");
});

test("files: write then read back, missing file is a 404 input error", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "waveqc-csv-"));
  try {
    const file = path.join(dir, "nested", "series.csv");
    writeTextFile(file, "Time,hm0\n1,0.25\n2,0.5\n");
    assert.deepEqual(readTimeSeriesCsv(file).series.columns.hm0, [0.25, 0.5]);

    const missing = path.join(dir, "absent.csv");
    assert.throws(
      () => readTimeSeriesCsv(missing),
      (err: unknown) =>
        err instanceof QcInputError &&
        err.code === "FILE_NOT_FOUND" &&
        err.status === 404 &&
        err.message === `File ${missing} not found?`
    );
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});
