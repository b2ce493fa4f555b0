/**
 * Download Engine
 *
 * Resumable concurrent PDF downloading with a durable checkpoint.
 *
 * Usage:
 *   import { Coordinator } from "./src/workers/index.js";
 *
 *   const coordinator = new Coordinator({
 *     inputPath: "./submissions.csv",
 *     outputDir: "./downloads",
 *     workers: 3,
 *   });
 *
 *   const result = await coordinator.run();
 *   process.exitCode = result.exitCode;
 */

// Main classes
export { Coordinator } from "./coordinator.js";
export { WorkerPool, clampWorkers } from "./worker-pool.js";
export { TaskQueue, computePendingSet } from "./task-queue.js";

// Worker function
export { runWorker } from "./worker.js";

// Types
export type {
  ItemOutcome,
  PendingSelection,
  PendingSelectionOptions,
  CoordinatorOptions,
  CoordinatorResult,
  WorkerContext,
  WorkerPoolOptions,
  WorkerPoolResult,
  WorkerResult,
} from "./types.js";
