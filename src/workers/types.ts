/**
 * Type definitions for the fetch-and-aggregate pipeline
 * Batched workers feeding a single aggregator
 */

import type { WorkerError } from "../errors.js";
import type { DocumentSink } from "../document/document-sink.js";
import type { DebugLog } from "../document/debug-log.js";
import type { PackageLister } from "../system/package-lister.js";
import type { PageLocator } from "../system/page-locator.js";
import type { PageFetcher } from "../system/page-fetcher.js";

/**
 * Display name -> raw rendered text for one package.
 * Empty means no documentation was found.
 */
export type PageMap = Map<string, string>;

/**
 * What a worker hands to the aggregator. Exactly one per package.
 */
export type WorkerMessage =
  | { type: "result"; packageName: string; pages: PageMap }
  | { type: "error"; packageName: string; error: WorkerError };

export interface PackageFailure {
  packageName: string;
  message: string;
}

/**
 * Counters owned by the aggregator
 */
export interface RunStats {
  processed: number;
  packagesWithDocs: number;
  totalPages: number;
  failures: PackageFailure[];
}

/**
 * Collaborators the coordinator drives
 */
export interface PipelineDeps {
  lister: PackageLister;
  locator: PageLocator;
  fetcher: PageFetcher;
  sink: DocumentSink;
  debugLog?: DebugLog;
}

/**
 * Receives progress counts; the CLI feeds these into progress bars
 */
export interface ProgressReporter {
  onFetched(done: number, total: number): void;
  onWritten(done: number, total: number): void;
}

/**
 * Asked once before dispatching; resolving false ends the run without output
 */
export type ConfirmRun = (packageCount: number) => Promise<boolean>;

/**
 * Options for the Coordinator
 */
export interface CoordinatorOptions {
  outputPath: string;
  batchSize?: number;
  queueTimeoutMs?: number;
  limit?: number;
  verbose?: boolean;
  progress?: ProgressReporter;
  confirm?: ConfirmRun;
}

export type AbortReason = "empty-listing" | "declined";

/**
 * Result from the Coordinator run
 */
export type CoordinatorResult =
  | {
      status: "done";
      stats: RunStats;
      totalPackages: number;
      batches: number;
      duration: number;
      outputPath: string;
    }
  | {
      status: "aborted";
      reason: AbortReason;
      duration: number;
    };

/**
 * Options for the WorkerPool
 */
export interface WorkerPoolOptions {
  verbose?: boolean;
  onWorkerDone?: (workerId: string, failed: boolean) => void;
}

/**
 * Result from the WorkerPool
 */
export interface WorkerPoolResult {
  totalWorkers: number;
  completedWorkers: number;
  failedWorkers: number;
}
