// @waveqc/qc
// Entry point exports for the wave QC engine.

export * from "./errors";
export * from "./logger";
export * from "./config/schema";
export * from "./config/ssot";
export * from "./rules/lt_missing";
export * from "./rules/lt15_mean_stdev";
export * from "./rules/lt16_flatline";
export * from "./rules/lt19_feasible_range";
export * from "./rules/lt20_rate_of_change";
export * from "./rules/short_term";
export * from "./metadata/binder";
export * from "./masking/working_population";
export * from "./pipeline/coalesce";
export * from "./pipeline/param_runner";
export * from "./pipeline/propagator";
export * from "./pipeline/long_term";
export * from "./pipeline/short_term";
export * from "./io/csv";
export * from "./cli/args";
export * from "./runtime";
export * from "./app";
