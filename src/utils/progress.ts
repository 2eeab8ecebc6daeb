import { MultiProgressBars } from "multi-progress-bars";
import chalk from "chalk";
import type { CoordinatorSnapshot } from "../workers/snapshot.js";

const JOBS_TASK = "Subtitles";

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
      initMessage: " Subtitle Progress ",
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
 * One-line status for the bar: counts per outcome plus jobs in flight.
 */
export function formatProgressMessage(snapshot: CoordinatorSnapshot): string {
  let skipped = 0;
  let failed = 0;
  for (const job of snapshot.jobs) {
    if (job.status === "skipped") skipped++;
    if (job.status === "failed") failed++;
  }

  const parts = [`${snapshot.completedCount}/${snapshot.total} videos`];
  if (skipped > 0) parts.push(`${skipped} skipped`);
  if (failed > 0) parts.push(chalk.red(`${failed} failed`));
  if (snapshot.cancelRequested) parts.push(chalk.yellow("stopping"));
  return parts.join(" · ");
}

/**
 * Add the job progress task (Green)
 */
export function addJobsProgressTask(snapshot: CoordinatorSnapshot): void {
  const bars = initProgressBars();
  bars.addTask(JOBS_TASK, {
    type: "percentage",
    barTransformFn: chalk.green,
    nameTransformFn: chalk.green.bold,
    message: formatProgressMessage(snapshot),
  });
}

/**
 * Redraw the bar from a coordinator snapshot
 */
export function renderProgress(snapshot: CoordinatorSnapshot): void {
  if (!mpb) return;
  mpb.updateTask(JOBS_TASK, {
    percentage: snapshot.percent,
    message: formatProgressMessage(snapshot),
  });
}

/**
 * Mark the job task as done
 */
export function markTaskDone(
  message?: string,
  colorFn?: (text: string) => string,
): void {
  if (!mpb) return;
  mpb.done(JOBS_TASK, {
    message: message || "Complete",
    barTransformFn: colorFn || chalk.gray,
  });
}
