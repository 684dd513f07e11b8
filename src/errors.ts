/**
 * Error taxonomy for a manbook run.
 *
 * Only listing and finalize failures are fatal. Per-page absence is modelled
 * as a `null` fetch result, and per-package failures become `WorkerError`s that
 * end up in the run summary.
 */

export class ManbookError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The OS package query exited non-zero or could not be started.
 */
export class ListingError extends ManbookError {
  readonly command: string;
  readonly exitCode: number | null;

  constructor(
    command: string,
    exitCode: number | null,
    detail?: string,
    options?: { cause?: unknown },
  ) {
    const suffix = detail ? `: ${detail}` : "";
    super(
      `Package listing "${command}" failed (exit code ${exitCode ?? "none"})${suffix}`,
      options,
    );
    this.command = command;
    this.exitCode = exitCode;
  }
}

/**
 * An unexpected exception escaped a package worker.
 */
export class WorkerError extends ManbookError {
  readonly packageName: string;

  constructor(packageName: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.packageName = packageName;
  }
}

/**
 * The output document could not be rendered or written.
 */
export class SinkFinalizeError extends ManbookError {
  readonly outputPath: string;

  constructor(outputPath: string, cause: unknown) {
    super(
      `Failed to write document ${outputPath}: ${getErrorMessage(cause)}`,
      { cause },
    );
    this.outputPath = outputPath;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return String(error);
}

/**
 * A command-line option or environment value is invalid.
 */
export class ConfigError extends ManbookError {}
