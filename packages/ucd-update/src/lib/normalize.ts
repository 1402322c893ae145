/**
 * Line boundaries recognised when normalizing: CRLF, LF, CR, and the
 * vertical tab, form feed, separator controls, NEL, LS and PS.
 */
const LINE_BREAK = /\r\n|[\n\v\f\r\x1c-\x1e\x85\u2028\u2029]/;

/**
 * Drop empty lines and end the text with exactly one "\n".
 * Idempotent: normalizing the output again returns it unchanged.
 */
export function normalizeText(text: string): string {
  const body = text
    .split(LINE_BREAK)
    .filter((line) => line.length > 0)
    .join("\n");
  return body.endsWith("\n") ? body : `${body}\n`;
}

/**
 * Number of lines in normalized text.
 */
export function countLines(normalized: string): number {
  if (normalized === "\n") return 0;
  return normalized.split("\n").length - 1;
}
