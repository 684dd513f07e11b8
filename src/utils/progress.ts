import { MultiProgressBars } from "multi-progress-bars";
import chalk from "chalk";
import type { ProgressReporter } from "../workers/types.js";

export const FETCH_TASK = "Fetching man pages";
export const PDF_TASK = "Generating PDF";

// Progress bar manager singleton
let mpb: MultiProgressBars | null = null;

/**
 * Initialize the progress bar manager
 */
export function initProgressBars(): MultiProgressBars {
  if (!mpb) {
    mpb = new MultiProgressBars({
      anchor: "bottom",
      persist: true,
      border: true,
      initMessage: " Man Page Progress ",
    });
  }
  return mpb;
}

/**
 * Close and cleanup progress bars
 */
export function closeProgressBars(): void {
  if (mpb) {
    mpb.close();
    mpb = null;
  }
}

/**
 * Add a progress task counted in packages
 */
export function addPackageProgressTask(
  taskName: string,
  totalPackages: number,
  colorFn: (text: string) => string,
): void {
  const bars = initProgressBars();
  bars.addTask(taskName, {
    type: "percentage",
    barTransformFn: colorFn,
    nameTransformFn: colorFn,
    message: `0/${totalPackages} packages`,
  });
}

export function updatePackageProgress(
  taskName: string,
  current: number,
  total: number,
): void {
  if (!mpb) return;
  const percentage = total > 0 ? current / total : 1;
  mpb.updateTask(taskName, {
    percentage,
    message: `${current}/${total} packages`,
  });
}

/**
 * Mark a task as done
 */
export function markTaskDone(
  taskName: string,
  message?: string,
  colorFn?: (text: string) => string,
): void {
  if (!mpb) return;
  mpb.done(taskName, {
    message: message || "Complete",
    barTransformFn: colorFn || chalk.gray,
  });
}

/**
 * Reporter that creates both bars lazily, on the first update, once the
 * package total is known.
 */
export function createProgressReporter(): ProgressReporter {
  let started = false;

  const ensureStarted = (total: number) => {
    if (started) return;
    started = true;
    addPackageProgressTask(FETCH_TASK, total, chalk.blue);
    addPackageProgressTask(PDF_TASK, total, chalk.green);
  };

  return {
    onFetched(done, total) {
      ensureStarted(total);
      updatePackageProgress(FETCH_TASK, done, total);
      if (done === total) {
        markTaskDone(FETCH_TASK, `${total} packages fetched ✓`, chalk.blue);
      }
    },
    onWritten(done, total) {
      ensureStarted(total);
      updatePackageProgress(PDF_TASK, done, total);
      if (done === total) {
        markTaskDone(PDF_TASK, `${total} packages written ✓`, chalk.green);
      }
    },
  };
}
