/**
 * Long-term wave QC (tests missing, 15, 16, 19, 20) on one CSV file.
 *
 * Contract:
 * - Input: CSV with a timestamp column (first column unless --time-column)
 *   plus one column per parameter and optional <param>_qc from an earlier run.
 * - Station metadata: optional key,value CSV (--metadata). Without it every
 *   metadata-driven test runs on defaults or is skipped, with notices.
 * - Output: detailed_report.csv and clean_data.csv in --out-dir.
 *
 * Usage:
 *   npx tsx scripts/qc_long_term.ts data/buoy.csv --metadata data/station.csv --out-dir out
 */

import path from "node:path";

import {
  QcInputError,
  createLogger,
  formatReportCsv,
  loadConfigFile,
  loadDefaultConfig,
  parseCliArgs,
  readStationMetadataCsv,
  readTimeSeriesCsv,
  runLongTermQc,
  writeTextFile,
  type CliArgs,
} from "@waveqc/qc";

function die(msg: string): never {
  console.error(msg);
  process.exit(1);
}

function parseArgsOrDie(argv: string[]): CliArgs {
  try {
    return parseCliArgs(argv);
  } catch (err) {
    if (err instanceof QcInputError) die(err.message);
    throw err;
  }
}

async function main(): Promise<void> {
  const args = parseArgsOrDie(process.argv.slice(2));

  const cfg = args.config ? loadConfigFile(path.resolve(args.config)) : loadDefaultConfig();
  const log = createLogger(cfg.logging.level);
  const input = path.resolve(process.cwd(), args.input);
  log.info({ file: input }, `Performing QC on ${args.input}`);

  const { series, timeColumn } = readTimeSeriesCsv(input, {
    timeColumn: args.timeColumn ?? undefined,
    missingMarkers: cfg.csv.missing_markers,
  });
  const metadata = args.metadata ? readStationMetadataCsv(path.resolve(process.cwd(), args.metadata)) : {};

  const out = runLongTermQc(cfg, { series, metadata, parameters: args.params ?? undefined }, log);

  const outDir = path.resolve(process.cwd(), args.outDir);
  const detailPath = path.join(outDir, "detailed_report.csv");
  const cleanPath = path.join(outDir, "clean_data.csv");
  writeTextFile(detailPath, formatReportCsv(out.detail, timeColumn));
  writeTextFile(cleanPath, formatReportCsv(out.clean, timeColumn));

  log.info(
    { detail: detailPath, clean: cleanPath, notices: out.notices.length, determinism_hash: out.run_meta.determinism_hash },
    "long-term QC done"
  );
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
