import chalk from "chalk";
import { ListingError, getErrorMessage } from "../errors.js";
import { logger } from "../utils/logger.js";
import {
  formatCommand,
  runCommand,
  type CommandResult,
  type CommandRunner,
  type CommandSpec,
} from "./exec.js";

export interface PackageLister {
  listPackages(): Promise<string[]>;
}

/**
 * Extract package names from `name/remainder` lines.
 * Lines without a slash (headers, warnings) are ignored.
 */
export function parsePackageList(stdout: string): string[] {
  const names = new Set<string>();

  for (const rawLine of stdout.split(/\r?\n/)) {
    const line = rawLine.trim();
    const slash = line.indexOf("/");
    if (slash <= 0) {
      continue;
    }
    names.add(line.slice(0, slash));
  }

  return [...names].sort();
}

/**
 * Lists packages through the OS package manager (`pkg list-all` by default).
 */
export class CommandPackageLister implements PackageLister {
  private command: CommandSpec;
  private run: CommandRunner;

  constructor(command: CommandSpec, run: CommandRunner = runCommand) {
    this.command = command;
    this.run = run;
  }

  async listPackages(): Promise<string[]> {
    const commandLine = formatCommand(this.command);
    logger.info(chalk.blue(`Fetching the list of packages (${commandLine})...`));

    let result: CommandResult;
    try {
      result = await this.run(this.command);
    } catch (error) {
      throw new ListingError(commandLine, null, getErrorMessage(error), {
        cause: error,
      });
    }

    if (result.code !== 0) {
      throw new ListingError(commandLine, result.code, result.stderr.trim());
    }

    return parsePackageList(result.stdout);
  }
}
