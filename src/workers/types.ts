/**
 * Type definitions for the download engine
 */

import type { CheckpointStore } from "../checkpoint/checkpoint-store.js";
import type { CheckpointSummary, StatusCounts } from "../checkpoint/types.js";
import type { PdfSource } from "../http/pdf-client.js";
import type { TargetResolver } from "../sources/target-resolver.js";
import type { DownloadItem } from "../sources/types.js";
import type { RunMode, TaskStatus } from "../types/enums.js";

/**
 * Result of one fetch attempt, reported once per attempted item
 */
export type ItemOutcome =
  | {
      key: string;
      workerId: string;
      status: TaskStatus.Completed;
      bytes: number;
      attempts: number;
    }
  | {
      key: string;
      workerId: string;
      status: TaskStatus.Failed;
      reason: string;
      attempts: number;
    };

/**
 * Pending set for one run, as computed from the input and the checkpoint
 */
export interface PendingSelection {
  pending: DownloadItem[];
  /** Input items already Completed in the checkpoint */
  alreadyCompleted: number;
  /** Failed items held back by the attempt cap */
  capped: number;
  /** Items left for a later run by the limit */
  deferred: number;
}

export interface PendingSelectionOptions {
  limit?: number;
  maxAttempts?: number;
}

/**
 * Everything a worker needs, passed explicitly instead of shared globals
 */
export interface WorkerContext {
  store: CheckpointStore;
  resolver: TargetResolver;
  source: PdfSource;
  timeoutMs: number;
  requestDelayMs?: number;
  onItemDone?: (outcome: ItemOutcome) => void;
}

/**
 * Result from a worker run
 */
export interface WorkerResult {
  workerId: string;
  processed: number;
  succeeded: number;
  failed: number;
  /** Claimed items found already Completed */
  skipped: number;
  errors: string[];
}

/**
 * Options for the WorkerPool
 */
export interface WorkerPoolOptions {
  workers: number;
}

/**
 * Result from the WorkerPool
 */
export interface WorkerPoolResult {
  totalWorkers: number;
  processed: number;
  succeeded: number;
  failed: number;
  skipped: number;
  workers: WorkerResult[];
}

/**
 * Options for the Coordinator
 */
export interface CoordinatorOptions {
  inputPath: string;
  outputDir: string;
  mode?: RunMode;
  workers?: number;
  timeoutMs?: number;
  limit?: number;
  flushEvery?: number;
  maxAttempts?: number;
  requestDelayMs?: number;
  minBytes?: number;
  baseUrl?: string;
  showProgress?: boolean;
  /** Defaults to a PdfClient owned (and closed) by the coordinator */
  source?: PdfSource;
}

/**
 * Result from the Coordinator run
 */
export interface CoordinatorResult {
  mode: RunMode;
  totalRecords: number;
  items: number;
  skippedRecords: number;
  duplicateRecords: number;
  seeded: number;
  recovered: number;
  checkpointSource: "fresh" | "checkpoint" | "corrupt" | "reset";
  selection: PendingSelection;
  attempted: number;
  succeeded: number;
  failed: number;
  /** Bytes written by this run's successful downloads */
  bytesDownloaded: number;
  counts: StatusCounts;
  summary: CheckpointSummary;
  failedKeys: string[];
  cancelled: boolean;
  checkpointCleared: boolean;
  duration: number;
  workersUsed: number;
  exitCode: number;
}
