// apps/qc/src/cli/args.ts
//
// Shared argument parsing for scripts/qc_long_term.ts and scripts/qc_short_term.ts.
//
//   <input.csv> [--metadata file] [--params a,b] [--out-dir dir] [--time-column name] [--config file]

import { QcInputError } from "../errors";

export type CliArgs = {
  input: string;
  metadata: string | null;
  params: string[] | null;
  outDir: string;
  timeColumn: string | null;
  config: string | null;
};

const VALUE_FLAGS = new Set(["--metadata", "--params", "--out-dir", "--time-column", "--config"]);

export const USAGE =
  "usage: <input.csv> [--metadata file] [--params a,b] [--out-dir dir] [--time-column name] [--config file]";

export function parseCliArgs(argv: ReadonlyArray<string>): CliArgs {
  const positional: string[] = [];
  const values = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith("--")) {
      positional.push(a);
      continue;
    }
    if (!VALUE_FLAGS.has(a)) throw new QcInputError("INVALID_ARGUMENTS", `Unknown option ${a}\n${USAGE}`);
    const v = argv[i + 1];
    if (v == null || v.startsWith("--")) throw new QcInputError("INVALID_ARGUMENTS", `Option ${a} needs a value\n${USAGE}`);
    values.set(a, v);
    i++;
  }

  if (positional.length !== 1) {
    throw new QcInputError("INVALID_ARGUMENTS", `No file found\n${USAGE}`);
  }

  const paramsRaw = values.get("--params");
  const params = paramsRaw
    ? paramsRaw
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean)
    : null;

  return {
    input: positional[0],
    metadata: values.get("--metadata") ?? null,
    params: params && params.length ? params : null,
    outDir: values.get("--out-dir") ?? ".",
    timeColumn: values.get("--time-column") ?? null,
    config: values.get("--config") ?? null,
  };
}
