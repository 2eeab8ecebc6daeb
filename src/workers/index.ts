/**
 * Parallel Subtitle Pipeline
 *
 * Worker pool + single coordinator for resolving, downloading and cleaning
 * subtitles.
 *
 * Usage:
 *   import { Coordinator } from "./src/workers/index.js";
 *
 *   const coordinator = new Coordinator(urls, {
 *     workers: 4,
 *     paths: { tempDir: "tmp", outputDir: "cleaned", format: "vtt" },
 *     stages: createYtDlpStages(config),
 *   });
 *
 *   const snapshot = await coordinator.run();
 */

// Main classes
export { Coordinator } from "./coordinator.js";
export { WorkerPool } from "./worker-pool.js";
export { Channel, createJobQueue } from "./channel.js";

// Worker functions
export { runWorker, processJob } from "./worker.js";

// State
export {
  clampWorkerCount,
  createCoordinatorState,
  reduceCoordinator,
  isTerminalPhase,
} from "./state.js";
export { toSnapshot, summarizeRun } from "./snapshot.js";

// Types
export type {
  CoordinatorPhase,
  CoordinatorState,
  CoordinatorEvent,
  CoordinatorEffect,
  StartSignal,
  JobResultEvent,
  CancelSignal,
  FrameTick,
  Transition,
} from "./state.js";
export type {
  CoordinatorSnapshot,
  JobFailure,
  RunOutcome,
  RunSummary,
} from "./snapshot.js";
export type {
  ActiveJob,
  ActiveJobStatus,
  FailedJob,
  FinishedJob,
  Job,
  JobResult,
  JobStatus,
  TerminalJob,
  TerminalJobStatus,
  StageOperations,
  PipelinePaths,
  WorkerContext,
  WorkerResult,
  WorkerPoolOptions,
  WorkerPoolResult,
  CoordinatorOptions,
} from "./types.js";
