import { writeFile } from "fs/promises";
import { join } from "path";
import type { DownloadService } from "./ports/download.js";
import type { Logger } from "./logger.js";
import { createNoopLogger } from "./logger.js";
import { failedFile, fileWriteFailed } from "./errors/catalog.js";
import { countLines, normalizeText } from "./normalize.js";
import { UCD_BASE_URL, resolveOutputName, resolveUrl, type UcdFile } from "./ucd.js";

export interface FetcherOptions {
  download: DownloadService;
  logger?: Logger;
  /** Defaults to UCD_BASE_URL */
  baseUrl?: string;
  /** Called after each file is written, with its position in the list */
  onFile?: (written: WrittenFile, index: number) => void;
}

export interface WrittenFile {
  file: UcdFile;
  url: string;
  path: string;
  bytes: number;
  lines: number;
}

/**
 * Download one UCD file, normalize it and write it to `outputDir` under its
 * base name. An existing file is truncated and overwritten.
 */
export async function fetchAndWrite(
  file: UcdFile,
  outputDir: string,
  options: FetcherOptions
): Promise<WrittenFile> {
  const logger = options.logger ?? createNoopLogger();
  const url = resolveUrl(file, options.baseUrl ?? UCD_BASE_URL);
  const path = join(outputDir, resolveOutputName(file));

  logger.debug("Fetching UCD file", { file, url });

  let text: string;
  try {
    text = normalizeText(await options.download.fetchText(url));
  } catch (error) {
    throw failedFile(file, error);
  }

  try {
    await writeFile(path, text, "utf-8");
  } catch (error) {
    throw fileWriteFailed(file, path, error);
  }

  const written: WrittenFile = {
    file,
    url,
    path,
    bytes: Buffer.byteLength(text, "utf-8"),
    lines: countLines(text),
  };
  logger.info("Wrote UCD file", { file, path, bytes: written.bytes, lines: written.lines });
  return written;
}

/**
 * Fetch and write each file in order. The first failure stops the run;
 * files written before it are left in place.
 */
export async function fetchAll(
  files: readonly UcdFile[],
  outputDir: string,
  options: FetcherOptions
): Promise<WrittenFile[]> {
  const written: WrittenFile[] = [];

  for (const [index, file] of files.entries()) {
    const result = await fetchAndWrite(file, outputDir, options);
    written.push(result);
    options.onFile?.(result, index);
  }

  return written;
}
