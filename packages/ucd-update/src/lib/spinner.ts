/**
 * Spinner wrapper that respects quiet/JSON mode.
 */

import ora, { type Ora } from "ora";
import { isQuietMode, isJsonMode } from "./cli-context.js";

export interface Spinner {
  start(text?: string): Spinner;
  stop(): Spinner;
  fail(text?: string): Spinner;
  text: string;
}

class SilentSpinner implements Spinner {
  text = "";

  start(_text?: string): Spinner {
    return this;
  }

  stop(): Spinner {
    return this;
  }

  fail(_text?: string): Spinner {
    return this;
  }
}

class OraSpinner implements Spinner {
  private ora: Ora;

  constructor(text?: string) {
    // Keep stdout clean for the summary line.
    this.ora = ora({ text, stream: process.stderr });
  }

  get text(): string {
    return this.ora.text;
  }

  set text(value: string) {
    this.ora.text = value;
  }

  start(text?: string): Spinner {
    this.ora.start(text);
    return this;
  }

  stop(): Spinner {
    this.ora.stop();
    return this;
  }

  fail(text?: string): Spinner {
    this.ora.fail(text);
    return this;
  }
}

/**
 * Create a spinner that is silent in quiet or JSON mode.
 */
export function createSpinner(text?: string): Spinner {
  if (isQuietMode() || isJsonMode()) {
    return new SilentSpinner();
  }
  return new OraSpinner(text);
}
