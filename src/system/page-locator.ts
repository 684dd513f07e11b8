import path from "path";
import { COMPRESSED_SUFFIXES, MAN_DIR_MARKER } from "../types/constants.js";
import { logger } from "../utils/logger.js";
import { getErrorMessage } from "../errors.js";
import { runCommand, withArgs, type CommandRunner, type CommandSpec } from "./exec.js";

/**
 * A page to render: a located file, or the bare package name when nothing was located.
 */
export interface DocPageRef {
  target: string;
  displayName: string;
}

export interface PageLocator {
  locate(packageName: string): Promise<DocPageRef[]>;
}

function compressedSuffix(filePath: string): string | undefined {
  return COMPRESSED_SUFFIXES.find((suffix) => filePath.endsWith(suffix));
}

/**
 * Basename without a compression suffix: `/usr/share/man/man1/ls.1.gz` -> `ls.1`
 */
export function displayNameFor(target: string): string {
  const base = path.posix.basename(target);
  const suffix = compressedSuffix(base);
  return suffix ? base.slice(0, -suffix.length) : base;
}

export function isManPagePath(filePath: string): boolean {
  if (!filePath.includes(MAN_DIR_MARKER) || compressedSuffix(filePath)) {
    return false;
  }
  // Directories such as .../man/man1 carry no extension.
  return path.posix.extname(filePath) !== "";
}

/**
 * Turn manifest output into page refs. The first path per display name wins.
 */
export function parseManifest(stdout: string): DocPageRef[] {
  const refs: DocPageRef[] = [];
  const seen = new Set<string>();

  for (const rawLine of stdout.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || !isManPagePath(line)) {
      continue;
    }
    const displayName = displayNameFor(line);
    if (seen.has(displayName)) {
      continue;
    }
    seen.add(displayName);
    refs.push({ target: line, displayName });
  }

  return refs;
}

export function fallbackRef(packageName: string): DocPageRef {
  return { target: packageName, displayName: packageName };
}

/**
 * Finds the man pages a package installed by querying its file manifest
 * (`dpkg -L <package>` by default). Never throws: an unknown package, a failed
 * query or a manifest without pages all yield an empty list.
 */
export class ManifestPageLocator implements PageLocator {
  private command: CommandSpec;
  private run: CommandRunner;

  constructor(command: CommandSpec, run: CommandRunner = runCommand) {
    this.command = command;
    this.run = run;
  }

  async locate(packageName: string): Promise<DocPageRef[]> {
    try {
      const result = await this.run(withArgs(this.command, packageName));
      if (result.code !== 0) {
        return [];
      }
      return parseManifest(result.stdout);
    } catch (error) {
      logger.debug(`Manifest query failed for ${packageName}: ${getErrorMessage(error)}`);
      return [];
    }
  }
}
