import { invalidDescriptor } from "./errors/catalog.js";

/** Directory of the latest published Unicode Character Database */
export const UCD_BASE_URL = "https://www.unicode.org/Public/UCD/latest/ucd/";

/**
 * A UCD file as a path relative to the base URL, e.g. "emoji/emoji-data.txt".
 */
export type UcdFile = string;

/** Files mirrored by `ucd-update`, in download order */
export const UCD_FILES: readonly UcdFile[] = [
  "CaseFolding.txt",
  "UnicodeData.txt",
  "emoji/emoji-data.txt",
];

/**
 * Full download URL for a UCD file. Plain concatenation; `file` must already be URL-safe.
 */
export function resolveUrl(file: UcdFile, baseUrl: string = UCD_BASE_URL): string {
  return baseUrl + file;
}

/**
 * Local file name for a UCD file: everything after the last "/".
 */
export function resolveOutputName(file: UcdFile): string {
  const name = file.slice(file.lastIndexOf("/") + 1);
  if (name.length === 0) {
    throw invalidDescriptor(file);
  }
  return name;
}
