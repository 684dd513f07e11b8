#!/usr/bin/env node
/**
 * manbook CLI
 *
 * Lists every package the OS package manager knows about, renders the man
 * pages each package installed, and assembles them into a single PDF.
 * Packages are fetched in bounded batches of concurrent workers while a single
 * aggregator writes the document.
 *
 * @module index
 * @license MIT
 */

// ============================================================================
// SECTION 1: IMPORTS
// ============================================================================

import { Command } from "commander";
import chalk from "chalk";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { resolveConfig, type CliOptions, type RunConfig } from "./src/config.js";
import { DebugLog } from "./src/document/debug-log.js";
import { PdfDocumentSink } from "./src/document/pdf-sink.js";
import {
  ConfigError,
  ListingError,
  SinkFinalizeError,
  getErrorMessage,
} from "./src/errors.js";
import { CommandPackageLister } from "./src/system/package-lister.js";
import { RendererPageFetcher } from "./src/system/page-fetcher.js";
import { ManifestPageLocator } from "./src/system/page-locator.js";
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_DEBUG_FILE,
  DEFAULT_FILTER_COMMAND,
  DEFAULT_LIST_COMMAND,
  DEFAULT_MANIFEST_COMMAND,
  DEFAULT_OUTPUT_FILE,
  DEFAULT_QUEUE_TIMEOUT_MS,
  DEFAULT_RENDERER_COMMAND,
  DEFAULT_TITLE,
} from "./src/types/constants.js";
import {
  cleanupAfterPromptExit,
  showConfiguration,
  showHeader,
  showRunSummary,
} from "./src/utils/helpers.js";
import {
  installConsoleBridge,
  logger,
  setVerboseMode,
} from "./src/utils/logger.js";
import { closeProgressBars, createProgressReporter } from "./src/utils/progress.js";
import { confirmPrompt } from "./src/utils/prompt.js";
import { Coordinator } from "./src/workers/index.js";

// ============================================================================
// SECTION 2: CONSTANTS & CONFIGURATION
// ============================================================================

/**
 * Version from package.json, found beside this file or one level up (dist/).
 */
function readVersion(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  for (const candidate of [here, path.join(here, "..")]) {
    const packageJsonPath = path.join(candidate, "package.json");
    if (fs.existsSync(packageJsonPath)) {
      const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, "utf-8"));
      if (
        typeof packageJson === "object" &&
        packageJson !== null &&
        "version" in packageJson &&
        typeof packageJson.version === "string"
      ) {
        return packageJson.version;
      }
    }
  }
  return "0.0.0";
}

const VERSION = readVersion();

/** Commander.js program instance */
const program = new Command();

installConsoleBridge();

// ============================================================================
// SECTION 3: RUN
// ============================================================================

async function generate(config: RunConfig): Promise<number> {
  const sink = await PdfDocumentSink.create({ title: config.title });
  const debugLog = new DebugLog(config.debugFile);
  const interactive = process.stdin.isTTY === true && !config.assumeYes;

  const coordinator = new Coordinator(
    {
      lister: new CommandPackageLister(config.listCommand),
      locator: new ManifestPageLocator(config.manifestCommand),
      fetcher: new RendererPageFetcher({
        renderer: config.renderer,
        filter: config.filter ?? undefined,
      }),
      sink,
      debugLog,
    },
    {
      outputPath: config.outputPath,
      batchSize: config.batchSize,
      queueTimeoutMs: config.queueTimeoutMs,
      limit: config.limit,
      verbose: config.verbose,
      progress: config.progress ? createProgressReporter() : undefined,
      confirm: interactive
        ? (packageCount) =>
            confirmPrompt({
              message: `Generate documentation for ${packageCount} packages?`,
              default: true,
              cleanup: cleanupAfterPromptExit,
            })
        : undefined,
    },
  );

  const result = await coordinator.run();
  closeProgressBars();

  if (result.status === "aborted") {
    if (result.reason === "empty-listing") {
      logger.info(chalk.red("No packages found. Exiting..."));
    } else {
      logger.info(chalk.gray("Aborted."));
    }
    return 0;
  }

  showRunSummary(
    result.stats,
    result.duration,
    result.outputPath,
    debugLog.getFilePath(),
  );
  return 0;
}

// ============================================================================
// SECTION 4: MAIN APPLICATION
// ============================================================================

async function main(): Promise<number> {
  program
    .name("manbook")
    .description("Collect the man pages of every package into a single PDF")
    .version(VERSION)
    .option("-o, --output <file>", "Output PDF file", DEFAULT_OUTPUT_FILE)
    .option(
      "--debug-file <file>",
      `Plain-text log of every page written (default: ${DEFAULT_DEBUG_FILE})`,
    )
    .option("--no-debug-file", "Do not write the debug log")
    .option(
      "-b, --batch-size <number>",
      `Packages fetched concurrently per batch (default: ${DEFAULT_BATCH_SIZE})`,
    )
    .option(
      "--queue-timeout <ms>",
      `Aggregator wait before re-checking workers (default: ${DEFAULT_QUEUE_TIMEOUT_MS})`,
    )
    .option("-l, --limit <number>", "Only process the first N packages")
    .option("-t, --title <text>", `Running page header (default: "${DEFAULT_TITLE}")`)
    .option(
      "--list-command <cmd>",
      `Package list query (default: "${DEFAULT_LIST_COMMAND}")`,
    )
    .option(
      "--manifest-command <cmd>",
      `Installed-files query, package appended (default: "${DEFAULT_MANIFEST_COMMAND}")`,
    )
    .option(
      "--renderer <cmd>",
      `Man page renderer, page appended (default: "${DEFAULT_RENDERER_COMMAND}")`,
    )
    .option(
      "--filter <cmd>",
      `Filter fed the renderer output (default: "${DEFAULT_FILTER_COMMAND}")`,
    )
    .option("--no-filter", "Use the renderer output unfiltered")
    .option("--no-progress", "Disable progress bars")
    .option("-y, --yes", "Do not ask for confirmation", false)
    .option("-v, --verbose", "Show verbose debug output", false)
    .configureHelp({
      sortSubcommands: true,
      helpWidth: 80,
    })
    .addHelpText(
      "after",
      `
    Examples:
    - All packages: manbook
    - First 20 packages, no prompt: manbook -l 20 -y
    - Smaller batches: manbook -b 10
    - Debian-style system: manbook --list-command "apt list --installed"
    - Custom output: manbook -o ./docs/man.pdf --no-debug-file
      `,
    )
    .parse();

  const options = program.opts<CliOptions>();

  let config: RunConfig;
  try {
    config = resolveConfig(options);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(chalk.red(`Error: ${error.message}`));
      return 1;
    }
    throw error;
  }

  setVerboseMode(config.verbose);

  // -------------------------------------------------------------------------
  // Signal handlers: no mid-run cancellation, just tidy up the terminal
  // -------------------------------------------------------------------------
  let isShuttingDown = false;

  process.on("SIGINT", () => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    closeProgressBars();
    logger.info(chalk.yellow("\n\n⚠ Interrupted by user (Ctrl+C)"));
    process.exit(130);
  });

  process.on("SIGTERM", () => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    closeProgressBars();
    logger.info(chalk.gray("\n\n⚠ Received SIGTERM"));
    process.exit(143);
  });

  showHeader(VERSION);
  showConfiguration(config);
  logger.info("");

  try {
    return await generate(config);
  } catch (error) {
    closeProgressBars();
    if (error instanceof ListingError) {
      logger.error(chalk.red("Failed to retrieve package list."));
      logger.error(chalk.red(error.message));
      return 1;
    }
    if (error instanceof SinkFinalizeError) {
      logger.error(chalk.red(error.message));
      return 1;
    }
    throw error;
  }
}

// ============================================================================
// SECTION 5: ERROR HANDLING
// ============================================================================

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((err: unknown) => {
    closeProgressBars();
    logger.error(chalk.red(getErrorMessage(err)));
    process.exit(1);
  });
