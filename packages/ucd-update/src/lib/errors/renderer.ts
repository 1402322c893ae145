import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";
import { unknownError } from "./catalog.js";
import { isJsonMode } from "../cli-context.js";
import { outputError } from "../json-output.js";

export type RenderMode = "static" | "json";

const SYM = {
  error: "✗",
  arrow: "→",
};

function getTerminalWidth(): number {
  return process.stderr.columns || 80;
}

/**
 * Wrap text to fit within a given width.
 */
function wrapText(text: string, maxWidth: number): string[] {
  const words = text.split(" ");
  const lines: string[] = [];
  let currentLine = "";

  for (const word of words) {
    const testLine = currentLine ? `${currentLine} ${word}` : word;
    if (testLine.length <= maxWidth) {
      currentLine = testLine;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }
  if (currentLine) lines.push(currentLine);

  return lines;
}

function renderStaticError(error: CLIError): void {
  const width = Math.min(getTerminalWidth(), 80) - 4;
  const output: string[] = [""];

  const [first = "", ...rest] = wrapText(error.message, width);
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(first)}`);
  for (const line of rest) {
    output.push(`  ${chalk.red(line)}`);
  }

  if (error.details) {
    output.push("");
    for (const line of wrapText(error.details, width)) {
      output.push(`  ${chalk.dim(line)}`);
    }
  }

  if (error.suggestion) {
    output.push("");
    const [head = "", ...tail] = wrapText(error.suggestion, width);
    output.push(`  ${chalk.yellow(SYM.arrow)} ${head}`);
    for (const line of tail) {
      output.push(`    ${line}`);
    }
  }

  if (error.example) {
    output.push("");
    output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(error.example)}`);
  }

  output.push("");

  for (const line of output) {
    console.error(line);
  }
}

/**
 * Render an error to stderr based on the current output mode.
 */
export function renderError(error: CLIError, mode?: RenderMode): void {
  const renderMode = mode ?? (isJsonMode() ? "json" : "static");

  switch (renderMode) {
    case "json":
      outputError(error);
      break;
    case "static":
      renderStaticError(error);
      break;
  }
}

/**
 * Convert an unknown error to a CLIError and render it.
 */
export function renderUnknownError(error: unknown, mode?: RenderMode): void {
  renderError(isCLIError(error) ? error : unknownError(error), mode);
}
