import type { CoordinatorPhase, CoordinatorState } from "./state.js";
import type { Job } from "./types.js";

/**
 * Read-only view of the coordinator for presentation.
 */
export interface CoordinatorSnapshot {
  jobs: readonly Job[];
  completedCount: number;
  total: number;
  workerCount: number;
  cancelRequested: boolean;
  phase: CoordinatorPhase;
  /** completedCount / total, 1 for an empty run */
  percent: number;
}

export interface JobFailure {
  index: number;
  identifier: string;
  title: string;
  message: string;
}

export type RunOutcome = "success" | "partial" | "cancelled";

export interface RunSummary {
  outcome: RunOutcome;
  total: number;
  completed: number;
  skipped: number;
  failed: number;
  /** Jobs never folded in (only non-zero after a cancel) */
  pending: number;
  failures: JobFailure[];
}

export function toSnapshot(state: CoordinatorState): CoordinatorSnapshot {
  return {
    jobs: state.jobs.slice(),
    completedCount: state.completedCount,
    total: state.total,
    workerCount: state.workerCount,
    cancelRequested: state.cancelRequested,
    phase: state.phase,
    percent: state.total === 0 ? 1 : state.completedCount / state.total,
  };
}

export function summarizeRun(snapshot: CoordinatorSnapshot): RunSummary {
  const summary: RunSummary = {
    outcome: "success",
    total: snapshot.total,
    completed: 0,
    skipped: 0,
    failed: 0,
    pending: 0,
    failures: [],
  };

  snapshot.jobs.forEach((job, index) => {
    switch (job.status) {
      case "completed":
        summary.completed++;
        break;
      case "skipped":
        summary.skipped++;
        break;
      case "failed":
        summary.failed++;
        summary.failures.push({
          index,
          identifier: job.identifier,
          title: job.title,
          message: job.error.message,
        });
        break;
      default:
        summary.pending++;
    }
  });

  if (snapshot.cancelRequested) {
    summary.outcome = "cancelled";
  } else if (summary.failed > 0) {
    summary.outcome = "partial";
  }

  return summary;
}
