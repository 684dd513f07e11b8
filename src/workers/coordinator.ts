import chalk from "chalk";
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_QUEUE_TIMEOUT_MS,
} from "../types/constants.js";
import type { RunPhase } from "../types/phase.js";
import { SinkFinalizeError } from "../errors.js";
import { logger } from "../utils/logger.js";
import { Aggregator } from "./aggregator.js";
import { TaskQueue } from "./task-queue.js";
import { WorkerPool } from "./worker-pool.js";
import { runWorker } from "./worker.js";
import type {
  AbortReason,
  CoordinatorOptions,
  CoordinatorResult,
  PipelineDeps,
  WorkerMessage,
} from "./types.js";

/**
 * Split a list into consecutive batches of at most `size` items.
 */
export function partition<T>(items: T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Coordinator (Producer)
 *
 * Drives one run:
 * 1. Lists packages (a listing failure propagates; an empty listing aborts)
 * 2. Dispatches each batch to a fresh worker pool
 * 3. Drains the batch through the aggregator before starting the next one
 * 4. Finalizes the document (a failure here is fatal)
 */
export class Coordinator {
  private deps: PipelineDeps;
  private options: CoordinatorOptions & {
    batchSize: number;
    queueTimeoutMs: number;
    verbose: boolean;
  };
  private phase: RunPhase;
  private startTime: number;

  constructor(deps: PipelineDeps, options: CoordinatorOptions) {
    this.deps = deps;
    this.options = {
      ...options,
      batchSize: options.batchSize ?? DEFAULT_BATCH_SIZE,
      queueTimeoutMs: options.queueTimeoutMs ?? DEFAULT_QUEUE_TIMEOUT_MS,
      verbose: options.verbose ?? false,
    };
    this.phase = "listing";
    this.startTime = Date.now();
  }

  getPhase(): RunPhase {
    return this.phase;
  }

  /**
   * Main run method
   */
  async run(): Promise<CoordinatorResult> {
    this.startTime = Date.now();
    this.setPhase("listing");

    // Phase 1: Listing
    let packages: string[];
    try {
      packages = await this.deps.lister.listPackages();
    } catch (error) {
      this.setPhase("aborted");
      throw error;
    }

    if (this.options.limit !== undefined) {
      packages = packages.slice(0, this.options.limit);
    }

    if (packages.length === 0) {
      this.setPhase("aborted");
      return this.aborted("empty-listing");
    }

    if (this.options.confirm && !(await this.options.confirm(packages.length))) {
      this.setPhase("aborted");
      return this.aborted("declined");
    }

    // Phase 2: Dispatch and drain, one batch at a time
    const batches = partition(packages, this.options.batchSize);
    const aggregator = new Aggregator(this.deps.sink, {
      totalPackages: packages.length,
      queueTimeoutMs: this.options.queueTimeoutMs,
      debugLog: this.deps.debugLog,
      progress: this.options.progress,
    });

    logger.info(chalk.blue(`Processing ${packages.length} packages...`));
    this.deps.debugLog?.start(packages.length);

    let fetched = 0;
    for (const [index, batch] of batches.entries()) {
      const first = index * this.options.batchSize + 1;
      const last = first + batch.length - 1;
      logger.info(
        chalk.cyan(
          `Processing batch ${index + 1} (${first}-${last}/${packages.length})`,
        ),
      );

      this.setPhase("dispatching");
      const queue = new TaskQueue<WorkerMessage>();
      const pool = new WorkerPool<string>({
        verbose: this.options.verbose,
        onWorkerDone: () => {
          fetched++;
          this.options.progress?.onFetched(fetched, packages.length);
        },
      });
      pool.start(batch, (packageName, workerId) =>
        runWorker(packageName, workerId, this.deps, queue),
      );

      this.setPhase("draining");
      await aggregator.drainBatch(queue, pool, batch);
      const poolResult = await pool.waitForCompletion();
      queue.close();
      logger.debug(
        chalk.gray(
          `Batch ${index + 1}: ${poolResult.completedWorkers}/${poolResult.totalWorkers} workers completed, ${poolResult.failedWorkers} failed`,
        ),
      );
    }

    // Phase 3: Finalize
    this.setPhase("finalizing");
    try {
      await this.deps.sink.finalize(this.options.outputPath);
    } catch (error) {
      this.setPhase("aborted");
      throw error instanceof SinkFinalizeError
        ? error
        : new SinkFinalizeError(this.options.outputPath, error);
    }

    this.setPhase("done");
    return {
      status: "done",
      stats: aggregator.getStats(),
      totalPackages: packages.length,
      batches: batches.length,
      duration: Date.now() - this.startTime,
      outputPath: this.options.outputPath,
    };
  }

  private aborted(reason: AbortReason): CoordinatorResult {
    return {
      status: "aborted",
      reason,
      duration: Date.now() - this.startTime,
    };
  }

  private setPhase(phase: RunPhase): void {
    this.phase = phase;
    logger.debug(chalk.gray(`Phase: ${phase}`));
  }
}
