import fs from "fs";
import chalk from "chalk";
import { CheckpointStore } from "../checkpoint/checkpoint-store.js";
import { PdfClient, type PdfSource } from "../http/pdf-client.js";
import { loadRecords } from "../sources/record-source.js";
import { TargetResolver } from "../sources/target-resolver.js";
import type { RecordLoadResult } from "../sources/types.js";
import {
  DEFAULT_BASE_URL,
  DEFAULT_FLUSH_EVERY,
  DEFAULT_MIN_BYTES,
  DEFAULT_TIMEOUT_SECONDS,
  DEFAULT_WORKERS,
  EXIT_FAILED_ITEMS,
  EXIT_INTERRUPTED,
  EXIT_OK,
} from "../types/constants.js";
import { CoordinatorPhase, RunMode } from "../types/enums.js";
import { errorMessage, FatalConfigError } from "../types/errors.js";
import { logger } from "../utils/logger.js";
import { ProgressBars, ProgressReporter } from "../utils/progress.js";
import { computePendingSet, TaskQueue } from "./task-queue.js";
import type {
  CoordinatorOptions,
  CoordinatorResult,
  PendingSelection,
  WorkerPoolResult,
} from "./types.js";
import { clampWorkers, WorkerPool } from "./worker-pool.js";

type CheckpointSource = CoordinatorResult["checkpointSource"];

const EMPTY_POOL_RESULT: WorkerPoolResult = {
  totalWorkers: 0,
  processed: 0,
  succeeded: 0,
  failed: 0,
  skipped: 0,
  workers: [],
};

/**
 * Coordinator
 *
 * Drives one run through its phases:
 * 1. Init: validate the output directory and read the input
 * 2. Loading: load the checkpoint (or reset it for a clean start)
 * 3. Resolving: register keys, seed from disk, compute the pending set
 * 4. Running: workers download the pending set
 * 5. Draining: entered on cancel, no new items are dispatched
 * 6. Finalizing: final flush, checkpoint removed once everything is done
 * 7. Done: result with exit code
 */
export class Coordinator {
  private options: CoordinatorOptions;
  private mode: RunMode;
  private store: CheckpointStore;
  private resolver: TargetResolver;
  private source: PdfSource | null;
  private ownedClient: PdfClient | null = null;
  private pool: WorkerPool | null = null;
  private progress: ProgressReporter | null = null;
  private phase: CoordinatorPhase = CoordinatorPhase.Init;
  private cancelled = false;
  private startTime = 0;

  constructor(options: CoordinatorOptions) {
    this.options = options;
    this.mode = options.mode ?? RunMode.Resume;
    this.store = new CheckpointStore(options.outputDir, {
      flushEvery: options.flushEvery ?? DEFAULT_FLUSH_EVERY,
    });
    this.resolver = new TargetResolver(options.outputDir, options.minBytes ?? DEFAULT_MIN_BYTES);
    this.source = options.source ?? null;
  }

  getPhase(): CoordinatorPhase {
    return this.phase;
  }

  getStore(): CheckpointStore {
    return this.store;
  }

  /**
   * Request a graceful stop. In-flight downloads finish or time out, then
   * the checkpoint is flushed as usual.
   */
  cancel(): void {
    if (this.cancelled) {
      return;
    }
    this.cancelled = true;
    if (this.pool) {
      this.setPhase(CoordinatorPhase.Draining);
      this.pool.drain();
    }
  }

  isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Main run method
   */
  async run(): Promise<CoordinatorResult> {
    this.startTime = Date.now();

    try {
      // Phase 1: validate inputs before any state is written
      const records = this.init();

      // Phase 2: checkpoint
      this.setPhase(CoordinatorPhase.Loading);
      const { checkpointSource, recovered } = await this.loadCheckpoint();

      // Phase 3: pending set
      this.setPhase(CoordinatorPhase.Resolving);
      const { seeded, selection } = this.resolve(records, checkpointSource);
      await this.store.flush();

      // Phase 4: download
      let poolResult = EMPTY_POOL_RESULT;
      if (selection.pending.length > 0 && !this.cancelled) {
        this.setPhase(CoordinatorPhase.Running);
        poolResult = await this.download(selection);
      } else if (selection.pending.length === 0) {
        logger.info(chalk.green("Nothing to download."));
      }

      // Phase 5: persist
      this.setPhase(CoordinatorPhase.Finalizing);
      const checkpointCleared = await this.finalize();

      this.setPhase(CoordinatorPhase.Done);
      return this.buildResult({
        records,
        checkpointSource,
        recovered,
        seeded,
        selection,
        poolResult,
        checkpointCleared,
      });
    } finally {
      this.progress?.close();
      if (this.ownedClient) {
        await this.ownedClient.close();
      }
    }
  }

  private setPhase(phase: CoordinatorPhase): void {
    this.phase = phase;
    logger.debug(chalk.gray(`Phase: ${phase}`));
  }

  private init(): RecordLoadResult {
    const { inputPath, outputDir } = this.options;

    if (!fs.existsSync(inputPath)) {
      throw new FatalConfigError(`Input file not found: ${inputPath}`);
    }

    const records = loadRecords(inputPath, {
      baseUrl: this.options.baseUrl ?? DEFAULT_BASE_URL,
    });

    for (const skipped of records.skipped) {
      logger.debug(chalk.yellow(`Skipped ${skipped.location}: ${skipped.message}`));
    }
    if (records.skipped.length > 0) {
      logger.warn(
        chalk.yellow(`⚠ Skipped ${records.skipped.length} unusable record(s) in ${inputPath}`),
      );
    }
    if (records.duplicates > 0) {
      logger.info(chalk.gray(`Ignored ${records.duplicates} duplicate key(s)`));
    }
    if (records.items.length === 0) {
      throw new FatalConfigError(`No downloadable records in ${inputPath}`);
    }

    // Created only once there is something to put in it
    try {
      fs.mkdirSync(outputDir, { recursive: true });
      fs.accessSync(outputDir, fs.constants.W_OK);
    } catch (error) {
      throw new FatalConfigError(
        `Output directory ${outputDir} is not writable: ${errorMessage(error)}`,
      );
    }

    logger.info(chalk.cyan(`Loaded ${records.items.length} items from ${inputPath}`));
    return records;
  }

  private async loadCheckpoint(): Promise<{
    checkpointSource: CheckpointSource;
    recovered: number;
  }> {
    if (this.mode === RunMode.CleanStart) {
      await this.store.reset();
      logger.info(chalk.yellow("Clean start: previous progress discarded"));
      return { checkpointSource: "reset", recovered: 0 };
    }

    const loaded = await this.store.load();
    if (loaded.source === "checkpoint") {
      logger.info(
        chalk.cyan(`Resuming from checkpoint with ${loaded.entries} known items`),
      );
      if (loaded.recovered > 0) {
        logger.debug(chalk.gray(`Requeued ${loaded.recovered} interrupted item(s)`));
      }
    }
    return { checkpointSource: loaded.source, recovered: loaded.recovered };
  }

  private resolve(
    records: RecordLoadResult,
    checkpointSource: CheckpointSource,
  ): { seeded: number; selection: PendingSelection } {
    const keys = records.items.map((item) => item.key);

    this.store.setMode(this.mode);
    this.store.markStarted();
    this.store.register(keys);

    let seeded = 0;
    if (
      this.mode !== RunMode.CleanStart &&
      (checkpointSource === "fresh" || checkpointSource === "corrupt")
    ) {
      for (const key of this.resolver.findCompleted(keys)) {
        this.store.markCompleted(key, { countAttempt: false });
        seeded++;
      }
      if (seeded > 0) {
        logger.info(chalk.cyan(`Seeded ${seeded} item(s) already present on disk`));
      }
    }

    if (this.mode === RunMode.RetryFailed) {
      const reset = this.store.resetAttempts(keys);
      if (reset > 0) {
        logger.debug(chalk.gray(`Reset attempt counters for ${reset} failed item(s)`));
      }
    }

    const selection = computePendingSet(records.items, this.store.getEntries(), this.mode, {
      limit: this.options.limit,
      maxAttempts: this.options.maxAttempts,
    });

    if (selection.alreadyCompleted > 0) {
      logger.info(chalk.gray(`Skipping ${selection.alreadyCompleted} completed item(s)`));
    }
    if (selection.capped > 0) {
      logger.info(
        chalk.gray(`Holding back ${selection.capped} item(s) at the attempt limit`),
      );
    }
    if (selection.deferred > 0) {
      logger.info(chalk.gray(`Deferring ${selection.deferred} item(s) past the limit`));
    }

    return { seeded, selection };
  }

  private getSource(): PdfSource {
    if (this.source) {
      return this.source;
    }
    this.ownedClient = new PdfClient({ timeoutMs: this.timeoutMs() });
    this.source = this.ownedClient;
    return this.source;
  }

  private timeoutMs(): number {
    return this.options.timeoutMs ?? DEFAULT_TIMEOUT_SECONDS * 1000;
  }

  private async download(selection: PendingSelection): Promise<WorkerPoolResult> {
    this.resolver.ensureDirectory();

    const workers = clampWorkers(this.options.workers ?? DEFAULT_WORKERS);
    logger.info(
      chalk.cyan(`Downloading ${selection.pending.length} PDF(s) with ${workers} worker(s)`),
    );

    const progress = new ProgressReporter(selection.pending.length, {
      display: this.options.showProgress ? new ProgressBars() : undefined,
    });
    this.progress = progress;

    const queue = new TaskQueue(selection.pending);
    const pool = new WorkerPool(
      queue,
      {
        store: this.store,
        resolver: this.resolver,
        source: this.getSource(),
        timeoutMs: this.timeoutMs(),
        requestDelayMs: this.options.requestDelayMs,
        onItemDone: (outcome) => progress.record(outcome),
      },
      { workers },
    );
    this.pool = pool;

    pool.start();
    // A cancel that arrived while the pool was being built
    if (this.cancelled) {
      this.setPhase(CoordinatorPhase.Draining);
      pool.drain();
    }

    const result = await pool.waitForCompletion();
    progress.finish();
    return result;
  }

  /**
   * Final flush always runs, including after a cancel
   */
  private async finalize(): Promise<boolean> {
    await this.store.flush();

    if (this.store.isAllCompleted()) {
      await this.store.clear();
      logger.debug(chalk.gray(`Removed checkpoint ${this.store.checkpointPath}`));
      return true;
    }
    return false;
  }

  private buildResult(parts: {
    records: RecordLoadResult;
    checkpointSource: CheckpointSource;
    recovered: number;
    seeded: number;
    selection: PendingSelection;
    poolResult: WorkerPoolResult;
    checkpointCleared: boolean;
  }): CoordinatorResult {
    const counts = this.store.counts();
    const failedKeys = this.store.failedEntries().map((entry) => entry.key);

    let exitCode = EXIT_OK;
    if (failedKeys.length > 0) {
      exitCode = EXIT_FAILED_ITEMS;
    } else if (this.cancelled) {
      exitCode = EXIT_INTERRUPTED;
    }

    return {
      mode: this.mode,
      totalRecords: parts.records.totalRecords,
      items: parts.records.items.length,
      skippedRecords: parts.records.skipped.length,
      duplicateRecords: parts.records.duplicates,
      seeded: parts.seeded,
      recovered: parts.recovered,
      checkpointSource: parts.checkpointSource,
      selection: parts.selection,
      attempted: parts.poolResult.processed,
      succeeded: parts.poolResult.succeeded,
      failed: parts.poolResult.failed,
      bytesDownloaded: this.progress?.snapshot().bytes ?? 0,
      counts,
      summary: this.store.summary(),
      failedKeys,
      cancelled: this.cancelled,
      checkpointCleared: parts.checkpointCleared,
      duration: Date.now() - this.startTime,
      workersUsed: parts.poolResult.totalWorkers,
      exitCode,
    };
  }
}
