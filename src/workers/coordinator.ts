import chalk from "chalk";
import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { Channel, createJobQueue } from "./channel.js";
import { toSnapshot, type CoordinatorSnapshot } from "./snapshot.js";
import {
  createCoordinatorState,
  reduceCoordinator,
  type CancelSignal,
  type CoordinatorEvent,
  type CoordinatorState,
} from "./state.js";
import type {
  CoordinatorOptions,
  JobResult,
  WorkerPoolResult,
} from "./types.js";
import { WorkerPool } from "./worker-pool.js";

/**
 * Coordinator
 *
 * Owns the job list and the progress counters. It:
 * 1. Fills the job queue with every index and closes it
 * 2. Starts the worker pool
 * 3. Receives one result at a time and folds it into the job list
 * 4. Stops when every job has reported, or as soon as it is cancelled
 *
 * All state changes go through `reduceCoordinator`; this class only carries
 * out the effects. It never runs concurrently with itself, so nothing here
 * needs locking.
 */
export class Coordinator {
  private state: CoordinatorState;
  private options: CoordinatorOptions;
  private logger: Logger;
  private results: Channel<JobResult>;
  private pool: WorkerPool | null;
  private poolCompletion: Promise<WorkerPoolResult> | null;
  private poolError: unknown;
  /** Receive handed out by start() and not yet folded by run() */
  private pending: Promise<CoordinatorEvent> | null;
  private cancelled: Promise<CancelSignal>;
  private resolveCancel: (signal: CancelSignal) => void;
  private startTime: number;
  private endTime: number | null;

  constructor(identifiers: readonly string[], options: CoordinatorOptions) {
    this.options = options;
    this.state = createCoordinatorState(identifiers, options.workers);
    this.logger = options.logger ?? silentLogger;
    this.results = new Channel<JobResult>();
    this.pool = null;
    this.poolCompletion = null;
    this.poolError = null;
    this.pending = null;
    this.startTime = 0;
    this.endTime = null;

    let resolveCancel: (signal: CancelSignal) => void = () => undefined;
    this.cancelled = new Promise<CancelSignal>((resolve) => {
      resolveCancel = resolve;
    });
    this.resolveCancel = resolveCancel;
  }

  /**
   * Launch the workers. Returns the pending receive of the first result, or
   * null when there is nothing to wait for (empty job list, already started).
   */
  start(): Promise<CoordinatorEvent> | null {
    const next = this.dispatch({ type: "start" });
    if (next) {
      this.pending = next;
    }
    return next;
  }

  /**
   * Start (if needed) and fold results until every job has reported or the
   * run is cancelled. Resolves with the final snapshot.
   */
  async run(): Promise<CoordinatorSnapshot> {
    this.start();
    let next = this.pending;
    this.pending = null;
    while (next) {
      const event = await next;
      next = this.dispatch(event);
    }
    return this.snapshot();
  }

  /**
   * Stop waiting for results. Workers already inside a stage are not
   * interrupted; whatever they report afterwards is never folded in.
   */
  cancel(): void {
    this.dispatch({ type: "cancel" });
    if (this.state.phase === "cancelled") {
      this.resolveCancel({ type: "cancel" });
    }
  }

  /**
   * Frame tick from an external ticker. Triggers `onRender` with a fresh
   * snapshot; the coordinator has no notion of frame rate.
   */
  tick(): void {
    this.dispatch({ type: "tick" });
  }

  snapshot(): CoordinatorSnapshot {
    return toSnapshot(this.state);
  }

  /** Milliseconds since start, frozen once the run has finished */
  elapsed(): number {
    if (this.startTime === 0) {
      return 0;
    }
    return (this.endTime ?? Date.now()) - this.startTime;
  }

  getActiveWorkerCount(): number {
    return this.pool ? this.pool.getActiveWorkerCount() : 0;
  }

  /**
   * Wait for the workers themselves to exit. After a cancel this is how a
   * caller lets in-flight jobs finish writing before tearing down.
   */
  async waitForWorkers(): Promise<WorkerPoolResult | null> {
    if (!this.poolCompletion) {
      return null;
    }
    return this.poolCompletion;
  }

  private dispatch(event: CoordinatorEvent): Promise<CoordinatorEvent> | null {
    const transition = reduceCoordinator(this.state, event);
    this.state = transition.state;

    let next: Promise<CoordinatorEvent> | null = null;
    for (const effect of transition.effects) {
      switch (effect.type) {
        case "launch-workers":
          this.launchWorkers();
          break;
        case "await-result":
          next = this.receiveNext();
          break;
        case "render":
          this.options.onRender?.(this.snapshot());
          break;
        case "finish":
          this.finish();
          break;
      }
    }
    return next;
  }

  private launchWorkers(): void {
    this.startTime = Date.now();
    const queue = createJobQueue(this.state.total);

    this.pool = new WorkerPool(
      {
        jobs: this.state.jobs,
        queue,
        results: this.results,
        stages: this.options.stages,
        paths: this.options.paths,
      },
      this.state.workerCount,
      { logger: this.logger },
    );
    this.pool.start();

    this.poolCompletion = this.pool.waitForCompletion();
    this.poolCompletion.catch((error: unknown) => {
      this.poolError = error;
      this.logger.error(chalk.red(`Worker pool failed: ${errorMessage(error)}`));
    });

    this.logger.debug(
      chalk.blue(
        `Queued ${this.state.total} jobs for ${this.state.workerCount} workers`,
      ),
    );
  }

  private receiveNext(): Promise<CoordinatorEvent> {
    const received = this.results
      .receive()
      .then((result): CoordinatorEvent => {
        if (result === undefined) {
          if (this.state.phase !== "running") {
            // Run already over; this receive was orphaned by a cancel
            return { type: "cancel" };
          }
          throw new Error(
            `Results channel closed after ${this.state.completedCount} of ${this.state.total} jobs reported`,
            { cause: this.poolError ?? undefined },
          );
        }
        return { type: "result", result };
      });
    return Promise.race([received, this.cancelled]);
  }

  private finish(): void {
    if (this.startTime === 0) {
      this.startTime = Date.now();
    }
    this.endTime = Date.now();

    const { phase, completedCount, total } = this.state;
    this.logger.debug(
      chalk.gray(`Coordinator ${phase}: ${completedCount}/${total} jobs reported`),
    );
  }
}
