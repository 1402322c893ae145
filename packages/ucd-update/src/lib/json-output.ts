/**
 * JSON output utilities for machine-readable CLI output.
 */

import { CLIError } from "./errors/types.js";

// ============================================================================
// Envelopes
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    duration?: number;
    version?: string;
  };
}

export interface JsonError {
  success: false;
  error: {
    code: string;
    message: string;
    file?: string;
    suggestion?: string;
    details?: string;
  };
}

// ============================================================================
// Command Schemas
// ============================================================================

export interface UpdateResultJson {
  outputDir: string;
  files: Array<{
    file: string;
    url: string;
    path: string;
    bytes: number;
    lines: number;
  }>;
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Output an error JSON result to stderr.
 */
export function outputError(error: CLIError | Error): void {
  const result: JsonError = {
    success: false,
    error: {
      code: error instanceof CLIError ? error.code : "UNKNOWN_ERROR",
      message: error.message,
      ...(error instanceof CLIError && error.file && { file: error.file }),
      ...(error instanceof CLIError && error.suggestion && { suggestion: error.suggestion }),
      ...(error instanceof CLIError && error.details && { details: error.details }),
    },
  };
  console.error(JSON.stringify(result, null, 2));
}
