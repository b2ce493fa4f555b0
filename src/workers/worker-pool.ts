import chalk from "chalk";
import { MAX_WORKERS } from "../types/constants.js";
import { logger } from "../utils/logger.js";
import type { TaskQueue } from "./task-queue.js";
import type {
  WorkerContext,
  WorkerPoolOptions,
  WorkerPoolResult,
  WorkerResult,
} from "./types.js";
import { runWorker } from "./worker.js";

/**
 * Worker Pool
 *
 * Runs a fixed number of worker loops over one shared queue. Workers are
 * async loops in this process, so the checkpoint store and its lock are
 * shared directly rather than through a database file.
 */
export class WorkerPool {
  private queue: TaskQueue;
  private context: WorkerContext;
  private workerCount: number;
  private running: Map<string, Promise<WorkerResult>>;
  private results: Map<string, WorkerResult>;

  constructor(queue: TaskQueue, context: WorkerContext, options: WorkerPoolOptions) {
    this.queue = queue;
    this.context = context;
    this.workerCount = clampWorkers(options.workers);
    this.running = new Map();
    this.results = new Map();
  }

  /**
   * Start all workers
   */
  start(): void {
    if (this.running.size > 0) {
      return;
    }

    // No point starting more loops than there are items
    const count = Math.max(1, Math.min(this.workerCount, this.queue.size));
    logger.debug(chalk.blue(`Starting ${count} workers...`));

    for (let i = 0; i < count; i++) {
      const workerId = `worker-${i + 1}`;
      const run = runWorker(workerId, this.queue, this.context).then((result) => {
        this.results.set(workerId, result);
        this.running.delete(workerId);
        return result;
      });
      this.running.set(workerId, run);
    }
  }

  /**
   * Wait for all workers to complete
   */
  async waitForCompletion(): Promise<WorkerPoolResult> {
    await Promise.all([...this.running.values()]);

    const result: WorkerPoolResult = {
      totalWorkers: this.results.size,
      processed: 0,
      succeeded: 0,
      failed: 0,
      skipped: 0,
      workers: [...this.results.values()],
    };

    for (const workerResult of this.results.values()) {
      result.processed += workerResult.processed;
      result.succeeded += workerResult.succeeded;
      result.failed += workerResult.failed;
      result.skipped += workerResult.skipped;
    }

    logger.debug(
      chalk.green(
        `✓ All workers finished: ${result.succeeded} succeeded, ${result.failed} failed`,
      ),
    );

    return result;
  }

  /**
   * Stop dispatching new items. In-flight downloads run to completion or
   * to their own timeout.
   */
  drain(): void {
    logger.debug(chalk.yellow("Draining workers..."));
    this.queue.stop();
  }
}

export function clampWorkers(workers: number): number {
  if (!Number.isFinite(workers)) {
    return 1;
  }
  return Math.max(1, Math.min(MAX_WORKERS, Math.floor(workers)));
}
