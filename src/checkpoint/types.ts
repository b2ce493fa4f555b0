import type { RunMode, TaskStatus } from "../types/enums.js";
import type { CheckpointCorruptionError } from "../types/errors.js";

/**
 * Durable status of one key. A `Failed` entry carries the reason of its
 * last attempt in `error`; `attempts` counts every fetch ever made for it.
 */
export interface CheckpointEntry {
  key: string;
  status: TaskStatus;
  attempts: number;
  error: string | null;
  updatedAt: number;
}

export interface CheckpointState {
  entries: Map<string, CheckpointEntry>;
  startTime: string | null;
  lastUpdate: string | null;
  /** Mode of the run that wrote the snapshot */
  mode: RunMode | null;
}

/**
 * Counts per status over every known key
 */
export interface StatusCounts {
  total: number;
  pending: number;
  inProgress: number;
  completed: number;
  failed: number;
}

/**
 * Where the loaded state came from: no file, a readable file, or a file
 * that had to be discarded.
 */
export type LoadSource = "fresh" | "checkpoint" | "corrupt";

export interface LoadResult {
  source: LoadSource;
  entries: number;
  /** Entries that were InProgress on disk and went back to Pending */
  recovered: number;
  error?: CheckpointCorruptionError;
}

/**
 * Human-readable summary written next to the checkpoint. Never read back.
 */
export interface CheckpointSummary {
  downloaded: number;
  failed: number;
  pending: number;
  total: number;
  percentage: number;
  startTime: string | null;
  lastUpdate: string | null;
  mode: RunMode | null;
}

export interface CheckpointStoreOptions {
  /** Flush after this many terminal transitions */
  flushEvery?: number;
  now?: () => Date;
}
