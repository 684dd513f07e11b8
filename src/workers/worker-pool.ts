import chalk from "chalk";
import { getErrorMessage } from "../errors.js";
import { logger } from "../utils/logger.js";
import type { WorkerPoolOptions, WorkerPoolResult } from "./types.js";

export type WorkerTask<T> = (item: T, workerId: string) => Promise<void>;

/**
 * Worker Pool
 *
 * Starts one worker per item of a batch and tracks which are still alive.
 * The batch size is the concurrency bound: a pool never holds more workers
 * than the items it was started with.
 */
export class WorkerPool<T> {
  private options: WorkerPoolOptions;
  private workers: Map<string, Promise<void>>;
  private results: Map<string, { failed: boolean; error: string | null }>;
  private startedCount: number;

  constructor(options: WorkerPoolOptions = {}) {
    this.options = options;
    this.workers = new Map();
    this.results = new Map();
    this.startedCount = 0;
  }

  /**
   * Start a worker for every item
   */
  start(items: T[], task: WorkerTask<T>): void {
    if (this.options.verbose) {
      logger.debug(chalk.blue(`Starting ${items.length} workers...`));
    }

    for (const item of items) {
      this.startedCount++;
      const workerId = `worker-${this.startedCount}`;
      this.spawnWorker(workerId, item, task);
    }
  }

  private spawnWorker(workerId: string, item: T, task: WorkerTask<T>): void {
    const worker = Promise.resolve()
      .then(() => task(item, workerId))
      .then(
        () => {
          this.results.set(workerId, { failed: false, error: null });
        },
        (error: unknown) => {
          const message = getErrorMessage(error);
          this.results.set(workerId, { failed: true, error: message });
          logger.error(chalk.red(`[${workerId}] Error: ${message}`));
        },
      )
      .finally(() => {
        this.workers.delete(workerId);
        const failed = this.results.get(workerId)?.failed ?? false;
        this.options.onWorkerDone?.(workerId, failed);
      });

    this.workers.set(workerId, worker);
  }

  /**
   * Wait for all started workers to settle
   */
  async waitForCompletion(): Promise<WorkerPoolResult> {
    if (this.options.verbose) {
      logger.debug(chalk.blue("Waiting for workers to complete..."));
    }

    while (this.workers.size > 0) {
      await Promise.all(this.workers.values());
    }

    const result: WorkerPoolResult = {
      totalWorkers: this.startedCount,
      completedWorkers: 0,
      failedWorkers: 0,
    };

    for (const workerResult of this.results.values()) {
      if (workerResult.failed) {
        result.failedWorkers++;
      } else {
        result.completedWorkers++;
      }
    }

    if (this.options.verbose) {
      logger.debug(
        chalk.green(
          `✓ Workers completed: ${result.completedWorkers} succeeded, ${result.failedWorkers} failed`,
        ),
      );
    }

    return result;
  }

  /**
   * Get number of workers still running
   */
  getActiveWorkerCount(): number {
    return this.workers.size;
  }
}
