import { describe, it, expect } from "vitest";
import { countLines, normalizeText } from "./normalize.js";

const SAMPLES = [
  "a\n\nb\n",
  "a\nb",
  "\n\n\nfirst\n\n\nsecond\n\n",
  "0041;LATIN CAPITAL LETTER A;Lu\r\n\r\n0042;LATIN CAPITAL LETTER B;Lu\r\n",
  "# comment\n\n  \n# indented blank kept\n",
  "single line",
];

describe("normalizeText", () => {
  it("drops blank lines", () => {
    expect(normalizeText("a\n\nb\n")).toBe("a\nb\n");
  });

  it("adds a missing trailing newline", () => {
    expect(normalizeText("a\nb")).toBe("a\nb\n");
  });

  it("collapses runs of newlines at the start and end", () => {
    expect(normalizeText("\n\n\nfirst\n\n\nsecond\n\n")).toBe("first\nsecond\n");
  });

  it("treats CRLF and CR as line boundaries", () => {
    expect(normalizeText("a\r\n\r\nb\rc\r\n")).toBe("a\nb\nc\n");
  });

  it("treats form feed and unicode line separators as line boundaries", () => {
    expect(normalizeText("a\fb\u2028c\u2029d")).toBe("a\nb\nc\nd\n");
  });

  it("keeps lines that only contain whitespace", () => {
    expect(normalizeText("a\n  \nb")).toBe("a\n  \nb\n");
  });

  it("keeps a leading byte order mark", () => {
    expect(normalizeText("\ufeffa\n\nb")).toBe("\ufeffa\nb\n");
  });

  it("returns a single newline for text without content", () => {
    expect(normalizeText("")).toBe("\n");
    expect(normalizeText("\n\n")).toBe("\n");
  });

  it.each(SAMPLES)("has no empty lines and one trailing newline for %j", (sample) => {
    const result = normalizeText(sample);
    const lines = result.slice(0, -1).split("\n");

    expect(result.endsWith("\n")).toBe(true);
    expect(result.endsWith("\n\n")).toBe(false);
    expect(lines.every((line) => line.length > 0)).toBe(true);
  });

  it.each(SAMPLES)("is idempotent for %j", (sample) => {
    const once = normalizeText(sample);
    expect(normalizeText(once)).toBe(once);
  });
});

describe("countLines", () => {
  it("counts lines of normalized text", () => {
    expect(countLines("a\nb\n")).toBe(2);
    expect(countLines("a\n")).toBe(1);
  });

  it("counts no lines for empty output", () => {
    expect(countLines(normalizeText(""))).toBe(0);
  });
});
