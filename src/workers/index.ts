/**
 * Fetch-and-aggregate pipeline
 *
 * Usage:
 *   import { Coordinator } from "./src/workers/index.js";
 *
 *   const coordinator = new Coordinator(
 *     { lister, locator, fetcher, sink, debugLog },
 *     { outputPath: "man_pages.pdf", batchSize: 50 },
 *   );
 *
 *   const result = await coordinator.run();
 */

// Main classes
export { Coordinator, partition } from "./coordinator.js";
export { Aggregator, UNREPORTED_WORKER_MESSAGE } from "./aggregator.js";
export { WorkerPool } from "./worker-pool.js";
export { TaskQueue } from "./task-queue.js";

// Worker function
export { runWorker, fetchPackagePages } from "./worker.js";

// Types
export type {
  AbortReason,
  ConfirmRun,
  CoordinatorOptions,
  CoordinatorResult,
  PackageFailure,
  PageMap,
  PipelineDeps,
  ProgressReporter,
  RunStats,
  WorkerMessage,
  WorkerPoolOptions,
  WorkerPoolResult,
} from "./types.js";
