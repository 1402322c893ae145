import { CLIError, isCLIError } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 */

function toError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidOption(optionName: string, reason: string, validValues?: readonly string[]): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`, {
    suggestion: validValues?.length
      ? `Choose from: ${validValues.join(", ")}`
      : undefined,
    example: "ucd-update --help",
  });
}

/**
 * Command-line parse failure reported by commander, e.g. an unknown option.
 */
export function invalidUsage(reason: string): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", reason.replace(/^error: /, ""), {
    example: "ucd-update --help",
  });
}

export function invalidDescriptor(file: string): CLIError {
  return new CLIError("VALIDATION_INVALID_DESCRIPTOR", `"${file}" does not name a file`, {
    suggestion: "UCD paths must be relative file paths such as \"emoji/emoji-data.txt\"",
    file,
  });
}

// ============================================================================
// Network Errors
// ============================================================================

export function networkRequestFailed(url: string, error: unknown): CLIError {
  const host = URL.canParse(url) ? new URL(url).host : url;
  return new CLIError("NETWORK_REQUEST_FAILED", `Can't reach ${host}`, {
    suggestion: "Check your internet connection and try again",
    details: `${url}: ${messageOf(error)}`,
    cause: toError(error),
  });
}

export function httpStatus(url: string, status: number, statusText: string): CLIError {
  const reason = statusText ? `${status} ${statusText}` : String(status);
  return new CLIError("NETWORK_HTTP_STATUS", `Download failed with HTTP ${reason}`, {
    suggestion: status === 404
      ? "Check that --base-url points at a UCD directory"
      : "The server might be busy. Try again in a moment",
    details: url,
  });
}

// ============================================================================
// Content Errors
// ============================================================================

export function invalidUtf8(url: string, error: unknown): CLIError {
  return new CLIError("DECODE_INVALID_UTF8", "Response is not valid UTF-8 text", {
    details: url,
    cause: toError(error),
  });
}

// ============================================================================
// Filesystem Errors
// ============================================================================

export function fileWriteFailed(file: string, path: string, error: unknown): CLIError {
  return new CLIError("FILE_WRITE_FAILED", `${file}: can't write "${path}"`, {
    suggestion: "Check that the output directory exists and is writable",
    details: messageOf(error),
    file,
    cause: toError(error),
  });
}

// ============================================================================
// Generic
// ============================================================================

/**
 * Attach the failing UCD file to an error raised while fetching it.
 */
export function failedFile(file: string, error: unknown): CLIError {
  if (isCLIError(error)) {
    return new CLIError(error.code, `${file}: ${error.message}`, {
      suggestion: error.suggestion,
      example: error.example,
      details: error.details,
      file,
      cause: error,
    });
  }
  return new CLIError("UNKNOWN_ERROR", `${file}: ${messageOf(error)}`, {
    file,
    cause: toError(error),
  });
}

export function unknownError(error: unknown): CLIError {
  return new CLIError("UNKNOWN_ERROR", messageOf(error), { cause: toError(error) });
}
