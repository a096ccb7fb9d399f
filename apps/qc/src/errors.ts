// apps/qc/src/errors.ts
//
// Input-availability and configuration failures. Both surface to the caller;
// configuration gaps inside a run are notices, not errors.

export type QcInputErrorCode =
  | "FILE_NOT_FOUND"
  | "COLUMN_NOT_FOUND"
  | "INVALID_CSV"
  | "INVALID_SERIES"
  | "INVALID_ARGUMENTS";

export class QcInputError extends Error {
  public readonly status: number;
  public readonly code: QcInputErrorCode;

  constructor(code: QcInputErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "QcInputError";
    this.code = code;
    this.status = code === "FILE_NOT_FOUND" ? 404 : 400;
  }
}

export class QcConfigError extends Error {
  public readonly status = 500;
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "QcConfigError";
    this.issues = issues;
  }
}
