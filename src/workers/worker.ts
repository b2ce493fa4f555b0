/**
 * Worker
 *
 * One of W concurrent loops that:
 * 1. Claims the next item from the shared queue
 * 2. Skips it if the checkpoint already has it Completed
 * 3. Fetches it once, streaming into a partial file
 * 4. Records Completed or Failed and flushes on cadence
 * 5. Exits when the queue is empty or stopped
 *
 * Errors for a single item are recorded, never thrown.
 */

import chalk from "chalk";
import { classifyDownloadError } from "../http/pdf-client.js";
import { TaskStatus } from "../types/enums.js";
import { errorMessage } from "../types/errors.js";
import { logger } from "../utils/logger.js";
import type { TaskQueue } from "./task-queue.js";
import type { ItemOutcome, WorkerContext, WorkerResult } from "./types.js";

/**
 * Main worker function
 */
export async function runWorker(
  workerId: string,
  queue: TaskQueue,
  context: WorkerContext,
): Promise<WorkerResult> {
  const { store, resolver, source, timeoutMs } = context;
  const result: WorkerResult = {
    workerId,
    processed: 0,
    succeeded: 0,
    failed: 0,
    skipped: 0,
    errors: [],
  };

  logger.debug(chalk.gray(`[${workerId}] Started`));

  while (true) {
    const item = queue.claimNext();
    if (!item) {
      break;
    }

    if (store.getStatus(item.key) === TaskStatus.Completed) {
      result.skipped++;
      logger.debug(chalk.gray(`[${workerId}] Already completed: ${item.key}`));
      continue;
    }

    result.processed++;
    store.markInProgress(item.key);
    logger.debug(chalk.gray(`[${workerId}] Processing: ${item.key}`));

    let outcome: ItemOutcome;
    try {
      const body = await source.open(item.url);
      const bytes = await resolver.commit(item, body);
      store.markCompleted(item.key);
      result.succeeded++;
      outcome = {
        key: item.key,
        workerId,
        status: TaskStatus.Completed,
        bytes,
        attempts: store.getEntry(item.key)?.attempts ?? 1,
      };
      logger.debug(chalk.green(`[${workerId}] Completed: ${item.key} (${bytes} bytes)`));
    } catch (error) {
      const failure = classifyDownloadError(error, item.url, timeoutMs);
      const entry = store.markFailed(item.key, failure.message);
      result.failed++;
      result.errors.push(`${item.key}: ${failure.message}`);
      outcome = {
        key: item.key,
        workerId,
        status: TaskStatus.Failed,
        reason: failure.message,
        attempts: entry.attempts,
      };
      logger.debug(chalk.red(`[${workerId}] Failed: ${item.key} - ${failure.message}`));
    }

    context.onItemDone?.(outcome);

    try {
      await store.flushIfDue();
    } catch (error) {
      // The final flush retries and reports; keep downloading meanwhile
      logger.error(chalk.red(`[${workerId}] Checkpoint save failed: ${errorMessage(error)}`));
    }

    if (context.requestDelayMs && context.requestDelayMs > 0 && !queue.isStopped()) {
      await sleep(context.requestDelayMs);
    }
  }

  logger.debug(
    chalk.gray(`[${workerId}] Finished: ${result.succeeded} succeeded, ${result.failed} failed`),
  );

  return result;
}

/**
 * Sleep utility
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
