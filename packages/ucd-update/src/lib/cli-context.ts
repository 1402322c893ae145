/**
 * Process-wide output context shared by the spinner, JSON output and error renderer.
 */

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners, progress and the summary line */
  quiet: boolean;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

/**
 * Initialize the context from parsed command options.
 * JSON mode implies quiet.
 */
export function initContext(options: Partial<CLIContext> = {}): CLIContext {
  const json = options.json ?? DEFAULT_CONTEXT.json;
  currentContext = {
    json,
    quiet: json || (options.quiet ?? DEFAULT_CONTEXT.quiet),
  };
  return currentContext;
}

export function isJsonMode(): boolean {
  return currentContext.json;
}

export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Reset context to defaults (once per invocation, and in tests).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
