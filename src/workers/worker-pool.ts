import chalk from "chalk";
import { silentLogger, type Logger } from "../utils/logger.js";
import { clampWorkerCount } from "./state.js";
import { runWorker } from "./worker.js";
import type {
  WorkerContext,
  WorkerPoolOptions,
  WorkerPoolResult,
  WorkerResult,
} from "./types.js";

/**
 * Worker Pool Manager
 *
 * Runs a fixed number of in-process workers against one shared queue and
 * results channel. Closes the results channel once every worker has exited.
 */
export class WorkerPool {
  private context: WorkerContext;
  private workerCount: number;
  private logger: Logger;
  private running: Map<string, Promise<WorkerResult>>;
  private completion: Promise<WorkerPoolResult> | null;

  constructor(
    context: WorkerContext,
    workerCount: number,
    options: WorkerPoolOptions = {},
  ) {
    this.context = context;
    // Zero workers would leave the queue undrained forever
    this.workerCount = clampWorkerCount(workerCount);
    this.logger = options.logger ?? context.logger ?? silentLogger;
    this.running = new Map();
    this.completion = null;
  }

  get size(): number {
    return this.workerCount;
  }

  /**
   * Start all workers. Calling it twice is a no-op.
   */
  start(): void {
    if (this.completion) {
      return;
    }

    this.logger.debug(chalk.blue(`Starting ${this.workerCount} workers...`));

    const launched: Promise<WorkerResult>[] = [];
    for (let i = 0; i < this.workerCount; i++) {
      launched.push(this.spawnWorker(`worker-${i + 1}`));
    }

    this.completion = Promise.all(launched)
      .finally(() => {
        this.context.results.close();
      })
      .then((workers) => {
        const result: WorkerPoolResult = {
          totalWorkers: this.workerCount,
          jobsProcessed: workers.reduce((sum, w) => sum + w.jobsProcessed, 0),
          workers,
        };
        this.logger.debug(
          chalk.green(
            `✓ All workers finished: ${result.jobsProcessed} jobs processed`,
          ),
        );
        return result;
      });
  }

  private spawnWorker(workerId: string): Promise<WorkerResult> {
    const run = runWorker(workerId, {
      ...this.context,
      logger: this.logger,
    }).finally(() => {
      this.running.delete(workerId);
    });
    this.running.set(workerId, run);
    return run;
  }

  /**
   * Wait for every worker to drain the queue and exit
   */
  async waitForCompletion(): Promise<WorkerPoolResult> {
    if (!this.completion) {
      throw new Error("Worker pool has not been started");
    }
    return this.completion;
  }

  /**
   * Get number of workers still running
   */
  getActiveWorkerCount(): number {
    return this.running.size;
  }
}
