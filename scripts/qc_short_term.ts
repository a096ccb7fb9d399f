/**
 * Short-term wave QC (tests 9, 10, 11) on one CSV file.
 * Writes qc_<param>.csv per parameter into --out-dir.
 *
 * Usage:
 *   npx tsx scripts/qc_short_term.ts data/heave.csv --params Heave,North,West
 */

import path from "node:path";

import {
  QcInputError,
  createLogger,
  formatShortTermCsv,
  loadConfigFile,
  loadDefaultConfig,
  parseCliArgs,
  readTimeSeriesCsv,
  runShortTermQc,
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

  const results = runShortTermQc(cfg.short_term, { series, parameters: args.params ?? undefined }, log);

  const outDir = path.resolve(process.cwd(), args.outDir);
  for (const r of results) {
    const file = path.join(outDir, `qc_${r.parameter.toLowerCase()}.csv`);
    writeTextFile(file, formatShortTermCsv(r, timeColumn));
    log.info({ parameter: r.parameter, file }, "short-term QC written");
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
