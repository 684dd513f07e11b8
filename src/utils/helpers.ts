import chalk from "chalk";
import type { RunConfig } from "../config.js";
import { formatCommand } from "../system/exec.js";
import type { RunStats } from "../workers/types.js";
import { getAsciiArt } from "./ascii.js";
import { logger } from "./logger.js";
import { closeProgressBars } from "./progress.js";

const BOX_WIDTH = 50;

export function showHeader(version: string): void {
  logger.info(chalk.cyan(getAsciiArt("manbook")));
  logger.info(
    chalk.cyan.bold(`\nMan pages of every package in one PDF (Version ${version})`),
  );
}

export function cleanupAfterPromptExit(): void {
  closeProgressBars();
}

export function showConfiguration(config: RunConfig): void {
  logger.info(chalk.cyan("\nConfiguration:"));
  logger.info(chalk.white(`  Output: ${config.outputPath}`));
  logger.info(chalk.white(`  Debug file: ${config.debugFile ?? "disabled"}`));
  logger.info(chalk.white(`  Batch size: ${config.batchSize}`));
  logger.info(chalk.white(`  Queue timeout: ${config.queueTimeoutMs}ms`));
  if (config.limit !== undefined) {
    logger.info(chalk.white(`  Limit: first ${config.limit} packages`));
  }
  logger.info(chalk.white(`  Package query: ${formatCommand(config.listCommand)}`));
  logger.info(
    chalk.white(`  Manifest query: ${formatCommand(config.manifestCommand)} <package>`),
  );
  logger.info(
    chalk.white(
      `  Renderer: ${formatCommand(config.renderer)} <page>${
        config.filter ? ` | ${formatCommand(config.filter)}` : ""
      }`,
    ),
  );
  logger.info(chalk.white(`  Verbose: ${config.verbose ? "Yes" : "No"}`));
}

function boxLine(text: string): string {
  return `║ ${text.padEnd(BOX_WIDTH - 2)} ║`;
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  } else {
    return `${seconds}s`;
  }
}

/**
 * Lines of the boxed run summary, without colour
 */
export function summaryLines(stats: RunStats, duration: number): string[] {
  const rule = "═".repeat(BOX_WIDTH);
  return [
    `╔${rule}╗`,
    boxLine("PROCESSING SUMMARY"),
    `╠${rule}╣`,
    boxLine(`Total packages processed: ${stats.processed}`),
    boxLine(`Packages with man pages: ${stats.packagesWithDocs}`),
    boxLine(`Total man pages found: ${stats.totalPages}`),
    boxLine(`Failed packages: ${stats.failures.length}`),
    boxLine(`Duration: ${formatDuration(duration)}`),
    `╚${rule}╝`,
  ];
}

export function showRunSummary(
  stats: RunStats,
  duration: number,
  outputPath: string,
  debugFile: string | null,
): void {
  logger.info("");
  for (const line of summaryLines(stats, duration)) {
    logger.info(chalk.white(line));
  }

  logger.info(chalk.green.bold(`\nPDF generated successfully: ${outputPath}`));
  if (debugFile) {
    logger.info(chalk.blue.bold(`Debug output written to: ${debugFile}`));
  }

  if (stats.failures.length > 0) {
    logger.info(chalk.yellow("\nFailed packages:"));
    for (const failure of stats.failures) {
      logger.info(chalk.red(`  ${failure.packageName}: ${failure.message}`));
    }
  }
}
