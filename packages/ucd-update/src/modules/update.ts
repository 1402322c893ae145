/**
 * Update command - download the UCD files and write normalized copies.
 */

import { Command, CommanderError } from "commander";
import chalk from "chalk";
import { fetchDownloadService } from "../lib/adapters/fetch-download.js";
import type { DownloadService } from "../lib/ports/download.js";
import { initContext, isJsonMode, isQuietMode, resetContext } from "../lib/cli-context.js";
import { CONFIG_DEFAULTS, resolveUpdateOptions } from "../lib/config.js";
import { invalidUsage } from "../lib/errors/catalog.js";
import { renderError, renderUnknownError } from "../lib/errors/renderer.js";
import { fetchAll } from "../lib/fetcher.js";
import { outputSuccess, type UpdateResultJson } from "../lib/json-output.js";
import { createLogger } from "../lib/logger.js";
import { createSpinner } from "../lib/spinner.js";
import { UCD_FILES, resolveOutputName } from "../lib/ucd.js";
import { getCurrentVersion } from "../lib/version.js";

/** CommanderError code used when usage was printed instead of running */
const USAGE_SHOWN = "ucd-update.usage";

interface RawUpdateOptions {
  json?: boolean;
  quiet?: boolean;
  logLevel?: string;
  baseUrl?: string;
}

export function registerUpdateCommand(program: Command, download: DownloadService): void {
  program
    // Optional so a missing directory reaches the action, which prints usage to stdout.
    .argument("[output-directory]", "Existing directory to write the UCD files into")
    .usage("[options] <output-directory>")
    .option("--json", "Print the written files as JSON (implies --quiet)")
    .option("-q, --quiet", "Suppress the spinner and summary line")
    .option("--log-level <level>", "Log level: debug, info, warn or error", CONFIG_DEFAULTS.logLevel)
    .option("--base-url <url>", "UCD directory to download from", CONFIG_DEFAULTS.baseUrl)
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Files:")}
${UCD_FILES.map((file) => `  ${chalk.yellow("•")} ${file} ${chalk.gray(`→ ${resolveOutputName(file)}`)}`).join("\n")}

${chalk.bold.cyan("Examples:")}
  ucd-update ./data              ${chalk.gray("Refresh the UCD files in ./data")}
  ucd-update ./data --json       ${chalk.gray("Output the written files as JSON")}
`
    )
    .action(async (outputDir: string | undefined, options: RawUpdateOptions, command: Command) => {
      if (outputDir === undefined) {
        throw showUsage(command);
      }
      await updateFiles(download, outputDir, options);
    });
}

/**
 * Print the full help, including the Files/Examples block, to stdout.
 * The returned error carries exit code 1.
 */
function showUsage(program: Command): CommanderError {
  program.outputHelp();
  return new CommanderError(1, USAGE_SHOWN, "usage shown");
}

export async function updateFiles(
  download: DownloadService,
  outputDir: string,
  rawOptions: RawUpdateOptions
): Promise<void> {
  initContext({ json: rawOptions.json, quiet: rawOptions.quiet });
  const options = resolveUpdateOptions(rawOptions);

  const logger = createLogger({
    level: options.quiet ? "error" : options.logLevel,
    json: options.json,
  }).child({ command: "update" });

  const startedAt = Date.now();
  const spinner = createSpinner(`Fetching ${UCD_FILES.length} UCD files`).start();

  try {
    const written = await fetchAll(UCD_FILES, outputDir, {
      download,
      logger,
      baseUrl: options.baseUrl,
      onFile: (file, index) => {
        spinner.text = `Fetched ${file.file} (${index + 1}/${UCD_FILES.length})`;
      },
    });
    spinner.stop();

    if (isJsonMode()) {
      const result: UpdateResultJson = { outputDir, files: written };
      outputSuccess(result, { duration: Date.now() - startedAt, version: getCurrentVersion() });
    } else if (!isQuietMode()) {
      console.log(chalk.green(`✓ Updated ${written.length} UCD files in ${outputDir}`));
    }
  } catch (error) {
    spinner.fail("Failed to update UCD files");
    throw error;
  }
}

function createProgram(download: DownloadService): Command {
  const program = new Command()
    .name("ucd-update")
    .description("Download the Unicode Character Database files and write normalized copies")
    .version(getCurrentVersion())
    .configureOutput({
      // Parse errors are rendered as a JSON envelope in JSON mode instead.
      outputError: (message, write) => {
        if (!isJsonMode()) write(message);
      },
    })
    .exitOverride();

  registerUpdateCommand(program, download);
  return program;
}

function isUsageRequest(args: string[]): boolean {
  const [first] = args;
  return first === undefined || first === "-h" || first === "--help";
}

/**
 * Run the CLI and return its exit code.
 * A missing directory or a leading -h/--help prints usage to stdout and exits with 1.
 */
export async function runCli(
  argv: string[] = process.argv,
  download: DownloadService = fetchDownloadService
): Promise<number> {
  const args = argv.slice(2);
  resetContext();
  initContext({ json: args.includes("--json") });
  const program = createProgram(download);

  try {
    if (isUsageRequest(args)) {
      throw showUsage(program);
    }
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Outside JSON mode commander has already printed its own message.
      if (isJsonMode() && error.exitCode !== 0 && error.code !== USAGE_SHOWN) {
        renderError(invalidUsage(error.message));
      }
      return error.exitCode;
    }
    renderUnknownError(error);
    return 1;
  }
}
