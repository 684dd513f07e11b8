import chalk from "chalk";
import type { DebugLog } from "../document/debug-log.js";
import type { DocumentSink } from "../document/document-sink.js";
import { formatText } from "../document/text-formatter.js";
import { getErrorMessage } from "../errors.js";
import { logger } from "../utils/logger.js";
import type { TaskQueue } from "./task-queue.js";
import type { WorkerPool } from "./worker-pool.js";
import type {
  PackageFailure,
  ProgressReporter,
  RunStats,
  WorkerMessage,
} from "./types.js";

export const UNREPORTED_WORKER_MESSAGE = "worker exited without reporting";

export interface AggregatorOptions {
  totalPackages: number;
  queueTimeoutMs: number;
  debugLog?: DebugLog;
  progress?: ProgressReporter;
}

/**
 * Aggregator (Consumer)
 *
 * The only writer of the document and of the run statistics. Messages are
 * handled one at a time in dequeue order; `handleMessage` is synchronous, so
 * the work for one package never interleaves with another.
 */
export class Aggregator {
  private sink: DocumentSink;
  private options: AggregatorOptions;
  private stats: RunStats;

  constructor(sink: DocumentSink, options: AggregatorOptions) {
    this.sink = sink;
    this.options = options;
    this.stats = {
      processed: 0,
      packagesWithDocs: 0,
      totalPages: 0,
      failures: [],
    };
  }

  getStats(): RunStats {
    return {
      ...this.stats,
      failures: this.stats.failures.map((failure) => ({ ...failure })),
    };
  }

  /**
   * Consume one batch. Stops after one message per package, or once every
   * worker has ended and the queue is empty. A timeout only triggers that
   * liveness check. Packages that never reported are recorded as failures.
   *
   * @returns number of messages consumed
   */
  async drainBatch(
    queue: TaskQueue<WorkerMessage>,
    pool: WorkerPool<string>,
    batch: string[],
  ): Promise<number> {
    const pending = new Set(batch);
    let drained = 0;

    while (drained < batch.length) {
      const message = await queue.pop(this.options.queueTimeoutMs);

      if (message === null) {
        if (pool.getActiveWorkerCount() === 0 && queue.isEmpty()) {
          logger.debug(
            chalk.yellow(
              `All workers ended with ${batch.length - drained} package(s) unreported`,
            ),
          );
          break;
        }
        continue;
      }

      pending.delete(message.packageName);
      this.handleMessage(message);
      drained++;
    }

    for (const packageName of pending) {
      this.recordFailure({ packageName, message: UNREPORTED_WORKER_MESSAGE });
      this.markProcessed();
    }

    return drained;
  }

  handleMessage(message: WorkerMessage): void {
    if (message.type === "error") {
      this.recordFailure({
        packageName: message.error.packageName,
        message: message.error.message,
      });
      this.markProcessed();
      return;
    }

    const { packageName, pages } = message;

    if (pages.size > 0) {
      try {
        this.writePackage(packageName, pages);
      } catch (error) {
        this.recordFailure({ packageName, message: getErrorMessage(error) });
      }
    }

    this.markProcessed();
  }

  /**
   * A package counts towards the stats and the debug log only once every
   * sink call for it has succeeded.
   */
  private writePackage(packageName: string, pages: Map<string, string>): void {
    const { debugLog } = this.options;

    this.sink.addPage(packageName);
    this.sink.writeTitle(`Package: ${packageName}`);
    for (const [pageName, content] of pages) {
      this.sink.writeTitle(`Man page: ${pageName}`);
      this.sink.writeBody(formatText(content));
    }

    this.stats.packagesWithDocs++;
    this.stats.totalPages += pages.size;

    debugLog?.writePackage(packageName);
    for (const [pageName, content] of pages) {
      debugLog?.writePage(pageName, content);
    }
  }

  private recordFailure(failure: PackageFailure): void {
    this.stats.failures.push(failure);
    logger.debug(
      chalk.red(`Failed package ${failure.packageName}: ${failure.message}`),
    );
  }

  private markProcessed(): void {
    this.stats.processed++;
    this.options.progress?.onWritten(
      this.stats.processed,
      this.options.totalPackages,
    );
  }
}
