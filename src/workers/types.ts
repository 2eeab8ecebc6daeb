/**
 * Type definitions for the parallel subtitle pipeline
 * Worker-pool / single-coordinator architecture
 */

import type { JobError } from "../errors.js";
import type { Logger } from "../utils/logger.js";
import type { Channel } from "./channel.js";
import type { CoordinatorSnapshot } from "./snapshot.js";

/**
 * Job status
 * pending          - queued, no worker has picked it up
 * resolving_title  - looking up the display title
 * fetching         - external downloader running
 * normalizing      - cleaning the raw subtitle file
 * completed        - cleaned transcript written
 * skipped          - cleaned transcript already existed
 * failed           - first failing stage is terminal
 */
export type ActiveJobStatus =
  | "pending"
  | "resolving_title"
  | "fetching"
  | "normalizing";

export type TerminalJobStatus = "completed" | "skipped" | "failed";

export type JobStatus = ActiveJobStatus | TerminalJobStatus;

interface JobBase {
  readonly identifier: string;
  /** Empty until title resolution succeeds */
  title: string;
}

export interface ActiveJob extends JobBase {
  status: ActiveJobStatus;
}

export interface FinishedJob extends JobBase {
  status: "completed" | "skipped";
  outputPath: string;
}

export interface FailedJob extends JobBase {
  status: "failed";
  error: JobError;
}

/**
 * One identifier's lifecycle. `error` exists only on failed jobs and
 * `outputPath` only on completed or skipped ones.
 */
export type Job = ActiveJob | FinishedJob | FailedJob;

export type TerminalJob = FinishedJob | FailedJob;

/**
 * Message a worker sends once per job
 */
export interface JobResult {
  index: number;
  job: TerminalJob;
  error: JobError | null;
}

/**
 * The three stages plus content-key derivation. Each may fail independently.
 */
export interface StageOperations {
  /** Display title; may resolve "" when the tool printed nothing */
  resolveTitle(identifier: string): Promise<string>;
  /** Filesystem-safe key naming the raw artifact; throws on malformed input */
  deriveContentKey(identifier: string): string;
  /** Leaves `<contentKey>.<format>` in `destination` on success */
  fetchAsset(
    identifier: string,
    contentKey: string,
    destination: string,
  ): Promise<void>;
  normalizeContent(rawPath: string, outputPath: string): Promise<void>;
}

export interface PipelinePaths {
  /** Scratch directory for raw downloaded artifacts */
  tempDir: string;
  /** Directory for cleaned transcripts */
  outputDir: string;
  /** Extension of raw artifacts, without the dot */
  format: string;
}

/**
 * Everything a worker needs, shared by all workers in a pool
 */
export interface WorkerContext {
  jobs: readonly Job[];
  queue: Channel<number>;
  results: Channel<JobResult>;
  stages: StageOperations;
  paths: PipelinePaths;
  logger?: Logger;
}

/**
 * Result from a worker run
 */
export interface WorkerResult {
  workerId: string;
  jobsProcessed: number;
  jobsCompleted: number;
  jobsSkipped: number;
  jobsFailed: number;
}

/**
 * Options for the WorkerPool
 */
export interface WorkerPoolOptions {
  logger?: Logger;
}

/**
 * Result from the WorkerPool
 */
export interface WorkerPoolResult {
  totalWorkers: number;
  jobsProcessed: number;
  workers: WorkerResult[];
}

/**
 * Options for the Coordinator
 */
export interface CoordinatorOptions {
  workers: number;
  paths: PipelinePaths;
  stages: StageOperations;
  logger?: Logger;
  /** Called with a fresh snapshot on every frame tick */
  onRender?: (snapshot: CoordinatorSnapshot) => void;
}
