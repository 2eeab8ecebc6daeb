/**
 * Worker
 *
 * Drains the shared job queue. For each index it:
 * 1. Resolves the title
 * 2. Derives the content key
 * 3. Skips when the cleaned transcript already exists
 * 4. Downloads subtitles and checks the raw file is really there
 * 5. Normalizes the raw file into the transcript
 *
 * and sends exactly one result. Workers only ever touch their own copy of a
 * job; the coordinator is the sole writer of the shared job list.
 */

import chalk from "chalk";
import {
  FetchError,
  JobError,
  toJobError,
  type JobErrorKind,
} from "../errors.js";
import {
  fileExists,
  getCleanedOutputPath,
  getRawArtifactPath,
} from "../utils/files.js";
import { scopedLogger, silentLogger, type Logger } from "../utils/logger.js";
import type {
  ActiveJob,
  ActiveJobStatus,
  FailedJob,
  Job,
  PipelinePaths,
  StageOperations,
  TerminalJob,
  WorkerContext,
  WorkerResult,
} from "./types.js";

class StageFailure extends Error {
  readonly jobError: JobError;

  constructor(jobError: JobError) {
    super(jobError.message);
    this.jobError = jobError;
  }
}

/**
 * Run one stage, converting anything it throws into a StageFailure of the
 * given kind.
 */
async function stage<T>(
  kind: JobErrorKind,
  context: string,
  action: () => Promise<T> | T,
): Promise<T> {
  try {
    return await action();
  } catch (error) {
    throw new StageFailure(toJobError(kind, error, context));
  }
}

function advance(job: ActiveJob, status: ActiveJobStatus, log: Logger): void {
  job.status = status;
  log.debug(chalk.gray(`${job.identifier}: ${status}`));
}

function fail(job: ActiveJob, error: JobError): FailedJob {
  return {
    identifier: job.identifier,
    title: job.title,
    status: "failed",
    error,
  };
}

/**
 * Drive one job through every stage. Never throws: any failure becomes the
 * returned job's error.
 */
export async function processJob(
  source: Job,
  stages: StageOperations,
  paths: PipelinePaths,
  log: Logger = silentLogger,
): Promise<TerminalJob> {
  const job: ActiveJob = {
    identifier: source.identifier,
    title: source.title,
    status: "pending",
  };

  try {
    // 1. Title
    advance(job, "resolving_title", log);
    const title = await stage("resolution", "Failed to fetch title", () =>
      stages.resolveTitle(job.identifier),
    );

    // 2. Content key
    const contentKey = await stage(
      "identifier",
      "Failed to extract content key",
      () => stages.deriveContentKey(job.identifier),
    );
    job.title = title.trim() || contentKey;

    // 3. Already done on an earlier run?
    const target = await stage(
      "normalize",
      "Failed to check for an existing transcript",
      () => {
        const outputPath = getCleanedOutputPath(
          job.title,
          paths.outputDir,
          contentKey,
        );
        return { outputPath, exists: fileExists(outputPath) };
      },
    );
    if (target.exists) {
      log.debug(chalk.gray(`Skipping (already exists): ${target.outputPath}`));
      return {
        identifier: job.identifier,
        title: job.title,
        status: "skipped",
        outputPath: target.outputPath,
      };
    }

    // 4. Download
    advance(job, "fetching", log);
    await stage("fetch", "Failed to download subtitles", () =>
      stages.fetchAsset(job.identifier, contentKey, paths.tempDir),
    );
    const rawPath = getRawArtifactPath(contentKey, paths.tempDir, paths.format);
    if (!fileExists(rawPath)) {
      throw new StageFailure(
        new FetchError(
          "no-content",
          `Downloader finished but ${rawPath} was not created (no subtitles available)`,
        ),
      );
    }

    // 5. Clean
    advance(job, "normalizing", log);
    await stage("normalize", "Failed to process transcript", () =>
      stages.normalizeContent(rawPath, target.outputPath),
    );

    return {
      identifier: job.identifier,
      title: job.title,
      status: "completed",
      outputPath: target.outputPath,
    };
  } catch (error) {
    if (error instanceof StageFailure) {
      return fail(job, error.jobError);
    }
    // stage() wraps every call, so this is a bug in the pipeline itself
    return fail(job, toJobError("normalize", error, "Unexpected pipeline error"));
  }
}

/**
 * Main worker loop. Resolves once the queue is closed and drained.
 */
export async function runWorker(
  workerId: string,
  context: WorkerContext,
): Promise<WorkerResult> {
  const log = scopedLogger(workerId, context.logger ?? silentLogger);
  const result: WorkerResult = {
    workerId,
    jobsProcessed: 0,
    jobsCompleted: 0,
    jobsSkipped: 0,
    jobsFailed: 0,
  };

  log.debug(chalk.gray("Started"));

  for await (const index of context.queue) {
    const source = context.jobs[index];
    if (!source) {
      log.warn(chalk.yellow(`Ignoring unknown job index ${index}`));
      continue;
    }

    result.jobsProcessed++;
    log.debug(chalk.gray(`Processing: ${source.identifier}`));

    const job = await processJob(source, context.stages, context.paths, log);

    switch (job.status) {
      case "completed":
        result.jobsCompleted++;
        log.debug(chalk.green(`Completed: ${job.title}`));
        break;
      case "skipped":
        result.jobsSkipped++;
        break;
      case "failed":
        result.jobsFailed++;
        log.debug(chalk.red(`Failed: ${job.identifier} - ${job.error.message}`));
        break;
    }

    context.results.send({
      index,
      job,
      error: job.status === "failed" ? job.error : null,
    });
  }

  log.debug(
    chalk.gray(
      `Finished: ${result.jobsCompleted} completed, ${result.jobsSkipped} skipped, ${result.jobsFailed} failed`,
    ),
  );

  return result;
}
