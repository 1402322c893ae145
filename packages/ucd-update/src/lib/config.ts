import { z } from "zod";
import { invalidOption } from "./errors/catalog.js";
import { LOG_LEVEL_NAMES, type LogLevel } from "./logger.js";
import { UCD_BASE_URL } from "./ucd.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Default values for all command options */
export const CONFIG_DEFAULTS = {
  baseUrl: UCD_BASE_URL,
  logLevel: "warn",
  json: false,
  quiet: false,
} as const satisfies ResolvedOptions;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

/** Options as commander hands them to the action handler */
export const UpdateOptionsSchema = z.object({
  json: z.boolean().optional(),
  quiet: z.boolean().optional(),
  logLevel: z.enum(LOG_LEVEL_NAMES).optional(),
  baseUrl: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//.test(value), "must use http or https")
    .refine((value) => value.endsWith("/"), "must end with /")
    .optional(),
});

/** Options with all defaults applied */
export interface ResolvedOptions {
  baseUrl: string;
  logLevel: LogLevel;
  json: boolean;
  quiet: boolean;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

function toFlag(key: string): string {
  return key.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}

/**
 * Validate raw command options and apply defaults.
 * `--json` implies `--quiet`. Throws a VALIDATION_INVALID_OPTION CLIError.
 */
export function resolveUpdateOptions(raw: unknown): ResolvedOptions {
  const result = UpdateOptionsSchema.safeParse(raw);
  if (!result.success) {
    const [issue] = result.error.issues;
    const key = String(issue?.path[0] ?? "option");
    throw invalidOption(
      toFlag(key),
      issue?.message ?? "invalid value",
      key === "logLevel" ? LOG_LEVEL_NAMES : undefined
    );
  }

  const json = result.data.json ?? CONFIG_DEFAULTS.json;
  return {
    baseUrl: result.data.baseUrl ?? CONFIG_DEFAULTS.baseUrl,
    logLevel: result.data.logLevel ?? CONFIG_DEFAULTS.logLevel,
    json,
    quiet: json || (result.data.quiet ?? CONFIG_DEFAULTS.quiet),
  };
}
