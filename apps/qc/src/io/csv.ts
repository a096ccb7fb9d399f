// apps/qc/src/io/csv.ts
//
// Delimited-file boundary for the CLIs.
// - time series: first column (or `timeColumn`) is the index, the rest numeric
// - station metadata: two columns, key,value
// - reports: index label + report columns, null written as an empty cell
// - short-term files: test10 written as True/False

import fs from "node:fs";
import path from "node:path";

import type {
  QcReportV1,
  ShortTermResultV1,
  StationMetadataV1,
  TimeSeriesColumn,
  TimeSeriesV1,
} from "@waveqc/contracts";

import { QcInputError } from "../errors";

/* -------------------- parsing -------------------- */

export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = "";
  let inQuotes = false;

  const endRow = (): void => {
    row.push(cell);
    cell = "";
    if (row.some((c) => c.trim() !== "")) rows.push(row);
    row = [];
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          cell += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        cell += ch;
      }
      continue;
    }

    if (ch === '"') inQuotes = true;
    else if (ch === ",") {
      row.push(cell);
      cell = "";
    } else if (ch === "\n") endRow();
    else if (ch !== "\r") cell += ch;
  }
  if (inQuotes) throw new QcInputError("INVALID_CSV", "Unterminated quoted field");
  if (cell !== "" || row.length) endRow();

  return rows;
}

// Empty cells and missing markers are null; anything else must be a finite number.
export function parseNumericCell(
  raw: string | undefined,
  missingMarkers: ReadonlySet<string>,
  where = "cell"
): number | null {
  const s = String(raw ?? "").trim();
  if (!s || missingMarkers.has(s.toLowerCase())) return null;
  const n = Number(s);
  if (!Number.isFinite(n)) throw new QcInputError("INVALID_CSV", `Non-numeric value "${s}" at ${where}`);
  return n;
}

function readText(filePath: string): string {
  try {
    return fs.readFileSync(filePath, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new QcInputError("FILE_NOT_FOUND", `File ${filePath} not found?`, { cause: err });
    }
    throw err;
  }
}

export type TimeSeriesCsvOptions = {
  timeColumn?: string;
  missingMarkers?: ReadonlyArray<string>;
};

export type ParsedTimeSeries = {
  series: TimeSeriesV1;
  timeColumn: string;
};

export function timeSeriesFromCsv(text: string, opts: TimeSeriesCsvOptions = {}): ParsedTimeSeries {
  const rows = parseCsv(text);
  if (rows.length < 1) throw new QcInputError("INVALID_CSV", "CSV has no header row");

  const header = rows[0].map((h) => h.trim());
  if (new Set(header).size !== header.length) {
    throw new QcInputError("INVALID_CSV", `Duplicate column names in header: ${header.join(",")}`);
  }
  const timeColumn = opts.timeColumn ?? header[0];
  const idxTime = header.indexOf(timeColumn);
  if (idxTime === -1) throw new QcInputError("COLUMN_NOT_FOUND", `Time column ${timeColumn} not found`);

  const markers = new Set((opts.missingMarkers ?? ["", "nan", "na", "null"]).map((m) => m.trim().toLowerCase()));
  const index: string[] = [];
  const columns: Record<string, TimeSeriesColumn> = {};
  header.forEach((h, j) => {
    if (j !== idxTime) columns[h] = [];
  });

  for (let r = 1; r < rows.length; r++) {
    const cells = rows[r];
    const label = String(cells[idxTime] ?? "").trim();
    if (!label) throw new QcInputError("INVALID_CSV", `Row ${r + 1} has an empty ${timeColumn}`);
    index.push(label);
    header.forEach((h, j) => {
      if (j === idxTime) return;
      columns[h].push(parseNumericCell(cells[j], markers, `row ${r + 1}, column ${h}`));
    });
  }

  return { series: { index, columns }, timeColumn };
}

export function readTimeSeriesCsv(filePath: string, opts: TimeSeriesCsvOptions = {}): ParsedTimeSeries {
  return timeSeriesFromCsv(readText(filePath), opts);
}

function metadataValue(raw: string): number | boolean | string {
  const s = raw.trim();
  const lower = s.toLowerCase();
  if (lower === "true") return true;
  if (lower === "false") return false;
  const n = Number(s);
  if (s !== "" && Number.isFinite(n)) return n;
  return s;
}

export function stationMetadataFromCsv(text: string): StationMetadataV1 {
  const rows = parseCsv(text);
  if (rows.length < 1) throw new QcInputError("INVALID_CSV", "Metadata CSV has no header row");

  const out: StationMetadataV1 = {};
  for (let r = 1; r < rows.length; r++) {
    const key = String(rows[r][0] ?? "").trim();
    if (!key) continue;
    out[key] = metadataValue(String(rows[r][1] ?? ""));
  }
  return out;
}

export function readStationMetadataCsv(filePath: string): StationMetadataV1 {
  return stationMetadataFromCsv(readText(filePath));
}

/* -------------------- writing -------------------- */

function csvCell(v: string): string {
  return /[",\r\n]/.test(v) ? `"${v.replace(/"/g, '""')}"` : v;
}

function csvLine(cells: ReadonlyArray<string>): string {
  return cells.map(csvCell).join(",");
}

function numCell(v: number | null | undefined): string {
  return v === null || v === undefined ? "" : String(v);
}

export function formatReportCsv(report: QcReportV1, indexLabel: string): string {
  const lines = [csvLine([indexLabel, ...report.columns])];
  report.index.forEach((label, i) => {
    lines.push(csvLine([label, ...report.columns.map((c) => numCell(report.data[c][i]))]));
  });
  return `${lines.join("\n")}\n`;
}

export function formatShortTermCsv(result: ShortTermResultV1, indexLabel: string): string {
  const lines = [csvLine([indexLabel, result.parameter, "test9", "test10", "test11"])];
  for (const row of result.rows) {
    lines.push(csvLine([row.index, numCell(row.value), String(row.test9), row.test10 ? "True" : "False", String(row.test11)]));
  }
  return `${lines.join("\n")}\n`;
}

export function writeTextFile(filePath: string, text: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, text);
}
