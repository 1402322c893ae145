import { readFileSync } from "fs";
import { z } from "zod";

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * Version of the installed package, read from its package.json.
 * Resolves the same way from src/ and from the built dist/.
 */
export function getCurrentVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../../package.json", import.meta.url), "utf-8")
  );
  return PackageJsonSchema.parse(raw).version;
}
