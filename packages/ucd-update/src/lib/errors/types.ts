/**
 * Error codes for all CLI error types.
 * Each code maps to a specific failure scenario with predefined messaging.
 */
export type ErrorCode =
  // Validation errors
  | "VALIDATION_INVALID_OPTION"
  | "VALIDATION_INVALID_DESCRIPTOR"
  // Network errors
  | "NETWORK_REQUEST_FAILED"
  | "NETWORK_HTTP_STATUS"
  // Content errors
  | "DECODE_INVALID_UTF8"
  // Filesystem errors
  | "FILE_WRITE_FAILED"
  // Generic
  | "UNKNOWN_ERROR";

export interface CLIErrorOptions {
  suggestion?: string;
  example?: string;
  details?: string;
  /** UCD file the error belongs to, e.g. "emoji/emoji-data.txt" */
  file?: string;
  cause?: Error;
}

/**
 * Extended Error class for CLI-specific errors with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly details?: string;
  readonly file?: string;

  constructor(code: ErrorCode, message: string, options?: CLIErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.details = options?.details;
    this.file = options?.file;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}
