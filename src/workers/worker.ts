/**
 * Package worker
 *
 * Handles one package:
 * 1. Locates the man pages the package installed
 * 2. Renders each page, or the package name itself when none were located
 * 3. Pushes exactly one message for the package onto the queue
 *
 * A worker never touches the document or the run statistics.
 */

import chalk from "chalk";
import { WorkerError, getErrorMessage } from "../errors.js";
import { fallbackRef } from "../system/page-locator.js";
import type { PageFetcher } from "../system/page-fetcher.js";
import type { PageLocator } from "../system/page-locator.js";
import { logger } from "../utils/logger.js";
import type { TaskQueue } from "./task-queue.js";
import type { PageMap, WorkerMessage } from "./types.js";

export interface WorkerDeps {
  locator: PageLocator;
  fetcher: PageFetcher;
}

export async function fetchPackagePages(
  packageName: string,
  deps: WorkerDeps,
): Promise<PageMap> {
  const located = await deps.locator.locate(packageName);
  const refs = located.length > 0 ? located : [fallbackRef(packageName)];
  const pages: PageMap = new Map();

  for (const ref of refs) {
    if (pages.has(ref.displayName)) {
      continue;
    }
    const content = await deps.fetcher.fetch(ref);
    if (content) {
      pages.set(ref.displayName, content);
    }
  }

  return pages;
}

async function runWorker(
  packageName: string,
  workerId: string,
  deps: WorkerDeps,
  queue: TaskQueue<WorkerMessage>,
): Promise<void> {
  logger.debug(chalk.gray(`[${workerId}] Processing: ${packageName}`));

  try {
    const pages = await fetchPackagePages(packageName, deps);
    queue.push({ type: "result", packageName, pages });

    if (pages.size === 0) {
      logger.debug(
        chalk.yellow(`[${workerId}] No man page found for ${packageName}`),
      );
    } else {
      logger.debug(
        chalk.green(`[${workerId}] ${packageName}: ${pages.size} man page(s)`),
      );
    }
  } catch (error) {
    const failure = new WorkerError(packageName, getErrorMessage(error), {
      cause: error,
    });
    logger.debug(
      chalk.red(`[${workerId}] Failed: ${packageName} - ${failure.message}`),
    );
    queue.push({ type: "error", packageName, error: failure });
  }
}

export { runWorker };
