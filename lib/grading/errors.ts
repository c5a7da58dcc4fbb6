/**
 * Error types raised before any scoring work starts.
 *
 * Oracle failures never surface as these: the scheduler absorbs them into
 * null-score results.
 */

export type GraderErrorCode =
  | "parse_error"
  | "validation_error"
  | "document_error"
  | "compliance_error"
  | "config_error";

export class GraderError extends Error {
  readonly code: GraderErrorCode;

  constructor(code: GraderErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed rubric/criteria input (missing columns, non-numeric weights). */
export class ParseError extends GraderError {
  /** 1-based data row, when the error belongs to one row */
  readonly row?: number;

  constructor(message: string, row?: number) {
    super("parse_error", row !== undefined ? `Row ${row}: ${message}` : message);
    this.row = row;
  }
}

export class ValidationError extends GraderError {
  constructor(message: string) {
    super("validation_error", message);
  }
}

export class DocumentError extends GraderError {
  readonly filePath?: string;

  constructor(message: string, filePath?: string) {
    super("document_error", message);
    this.filePath = filePath;
  }
}

/** A bundle that breaks a submission limit (page count, budget, subcontracting). */
export class ComplianceError extends GraderError {
  constructor(message: string) {
    super("compliance_error", message);
  }
}

export class ConfigError extends GraderError {
  constructor(message: string) {
    super("config_error", message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
