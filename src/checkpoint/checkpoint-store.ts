import fs from "fs";
import fsp from "fs/promises";
import path from "path";
import pLimit from "p-limit";
import initSqlJs, { type Database, type SqlJsStatic } from "sql.js";
import chalk from "chalk";
import {
  CHECKPOINT_DIR_NAME,
  CHECKPOINT_FILE_NAME,
  CHECKPOINT_SCHEMA_VERSION,
  DEFAULT_FLUSH_EVERY,
  SUMMARY_FILE_NAME,
} from "../types/constants.js";
import { RunMode, TaskStatus } from "../types/enums.js";
import { CheckpointCorruptionError, errorMessage } from "../types/errors.js";
import { logger } from "../utils/logger.js";
import type {
  CheckpointEntry,
  CheckpointState,
  CheckpointStoreOptions,
  CheckpointSummary,
  LoadResult,
  StatusCounts,
} from "./types.js";

type MetadataKey = "schema_version" | "start_time" | "last_update" | "total_known" | "mode";

interface ItemRow {
  key: string;
  status: number;
  attempts: number;
  error: string | null;
  updated_at: number;
}

interface MetadataRow {
  key: string;
  value: string;
}

function toTaskStatus(value: number): TaskStatus | null {
  switch (value) {
    case TaskStatus.Pending:
      return TaskStatus.Pending;
    case TaskStatus.InProgress:
      return TaskStatus.InProgress;
    case TaskStatus.Completed:
      return TaskStatus.Completed;
    case TaskStatus.Failed:
      return TaskStatus.Failed;
    default:
      return null;
  }
}

function toEntry(row: unknown): CheckpointEntry | null {
  if (
    typeof row !== "object" ||
    row === null ||
    !("key" in row) ||
    !("status" in row) ||
    !("attempts" in row) ||
    !("error" in row) ||
    !("updated_at" in row)
  ) {
    return null;
  }
  const { key, status, attempts, error, updated_at } = row;
  if (
    typeof key !== "string" ||
    typeof status !== "number" ||
    typeof attempts !== "number" ||
    (error !== null && typeof error !== "string") ||
    typeof updated_at !== "number"
  ) {
    return null;
  }
  const taskStatus = toTaskStatus(status);
  if (taskStatus === null) {
    return null;
  }
  return { key, status: taskStatus, attempts, error, updatedAt: updated_at };
}

function toMetadataRow(row: unknown): MetadataRow | null {
  if (typeof row !== "object" || row === null || !("key" in row) || !("value" in row)) {
    return null;
  }
  const { key, value } = row;
  if (typeof key !== "string" || typeof value !== "string") {
    return null;
  }
  return { key, value };
}

function toRunMode(value: string | undefined): RunMode | null {
  switch (value) {
    case RunMode.Resume:
      return RunMode.Resume;
    case RunMode.RetryFailed:
      return RunMode.RetryFailed;
    case RunMode.CleanStart:
      return RunMode.CleanStart;
    default:
      return null;
  }
}

function emptyState(): CheckpointState {
  return { entries: new Map(), startTime: null, lastUpdate: null, mode: null };
}

let sqlJs: Promise<SqlJsStatic> | null = null;

/**
 * sql.js compiles its WASM once per process. The package is CommonJS, so
 * the init function is reached through `default`.
 */
export function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) {
    sqlJs = initSqlJs.default();
  }
  return sqlJs;
}

function selectAll(db: Database, sql: string): unknown[] {
  const statement = db.prepare(sql);
  try {
    const rows: unknown[] = [];
    while (statement.step()) {
      rows.push(statement.getAsObject());
    }
    return rows;
  } finally {
    statement.free();
  }
}

async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  await fsp.writeFile(tmpPath, data, "utf-8");
  await fsp.rename(tmpPath, filePath);
}

/**
 * Checkpoint Store
 *
 * Keeps the status of every key in memory and persists it as a SQLite
 * snapshot. A flush builds the database in memory, exports it to
 * `checkpoint.db.tmp` and renames that over `checkpoint.db`, so a crash mid-write leaves the previous
 * snapshot intact. `state.json` is rewritten the same way on every flush.
 *
 * Location: {outputDir}/.paper-dl/
 */
export class CheckpointStore {
  readonly checkpointDir: string;
  readonly checkpointPath: string;
  readonly summaryPath: string;

  private state: CheckpointState = emptyState();
  private flushEvery: number;
  private transitionsSinceFlush = 0;
  private now: () => Date;
  // One writer at a time for both files
  private lock = pLimit(1);

  constructor(outputDir: string, options: CheckpointStoreOptions = {}) {
    this.checkpointDir = path.join(outputDir, CHECKPOINT_DIR_NAME);
    this.checkpointPath = path.join(this.checkpointDir, CHECKPOINT_FILE_NAME);
    this.summaryPath = path.join(this.checkpointDir, SUMMARY_FILE_NAME);
    this.flushEvery = Math.max(1, options.flushEvery ?? DEFAULT_FLUSH_EVERY);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Check if a checkpoint file exists
   */
  exists(): boolean {
    return fs.existsSync(this.checkpointPath);
  }

  /**
   * Load the checkpoint into memory. Never throws: a missing file gives an
   * empty state, an unreadable one gives an empty state and a warning.
   */
  async load(): Promise<LoadResult> {
    this.state = emptyState();
    this.transitionsSinceFlush = 0;

    if (!this.exists()) {
      return { source: "fresh", entries: 0, recovered: 0 };
    }

    try {
      this.state = await this.readSnapshot();
    } catch (error) {
      const corruption = new CheckpointCorruptionError(
        `Checkpoint could not be read, starting without prior progress: ${errorMessage(error)}`,
        this.checkpointPath,
        error,
      );
      logger.warn(chalk.yellow(`⚠ ${corruption.message}`));
      this.state = emptyState();
      return { source: "corrupt", entries: 0, recovered: 0, error: corruption };
    }

    const recovered = this.resetInProgress();
    return { source: "checkpoint", entries: this.state.entries.size, recovered };
  }

  private async readSnapshot(): Promise<CheckpointState> {
    const SQL = await loadSqlJs();
    const db = new SQL.Database(await fsp.readFile(this.checkpointPath));

    try {
      const metadata = new Map<string, string>();
      for (const row of selectAll(db, "SELECT key, value FROM metadata")) {
        const parsed = toMetadataRow(row);
        if (!parsed) {
          throw new Error("Malformed metadata row");
        }
        metadata.set(parsed.key, parsed.value);
      }

      const version = metadata.get("schema_version");
      if (version !== CHECKPOINT_SCHEMA_VERSION) {
        throw new Error(`Unsupported checkpoint schema version: ${version ?? "(missing)"}`);
      }

      const entries = new Map<string, CheckpointEntry>();
      for (const row of selectAll(db, "SELECT key, status, attempts, error, updated_at FROM items")) {
        const entry = toEntry(row);
        if (!entry) {
          throw new Error("Malformed item row");
        }
        entries.set(entry.key, entry);
      }

      return {
        entries,
        startTime: metadata.get("start_time") || null,
        lastUpdate: metadata.get("last_update") || null,
        mode: toRunMode(metadata.get("mode")),
      };
    } finally {
      db.close();
    }
  }

  getEntry(key: string): CheckpointEntry | undefined {
    return this.state.entries.get(key);
  }

  getStatus(key: string): TaskStatus | undefined {
    return this.state.entries.get(key)?.status;
  }

  /**
   * Read-only view of all entries, for pending-set computation
   */
  getEntries(): ReadonlyMap<string, CheckpointEntry> {
    return this.state.entries;
  }

  get startTime(): string | null {
    return this.state.startTime;
  }

  setMode(mode: RunMode): void {
    this.state.mode = mode;
  }

  /**
   * Record the run start time unless a previous run already did
   */
  markStarted(): void {
    if (!this.state.startTime) {
      this.state.startTime = this.now().toISOString();
    }
  }

  /**
   * Add unknown keys as Pending. Returns how many were new.
   */
  register(keys: Iterable<string>): number {
    let added = 0;
    for (const key of keys) {
      if (!this.state.entries.has(key)) {
        this.state.entries.set(key, {
          key,
          status: TaskStatus.Pending,
          attempts: 0,
          error: null,
          updatedAt: Date.now(),
        });
        added++;
      }
    }
    return added;
  }

  markInProgress(key: string): void {
    const entry = this.ensureEntry(key);
    if (entry.status === TaskStatus.Completed) {
      return;
    }
    entry.status = TaskStatus.InProgress;
    entry.updatedAt = Date.now();
  }

  markCompleted(key: string, options: { countAttempt?: boolean } = {}): void {
    const entry = this.ensureEntry(key);
    if (entry.status === TaskStatus.Completed) {
      return;
    }
    entry.status = TaskStatus.Completed;
    entry.error = null;
    if (options.countAttempt ?? true) {
      entry.attempts++;
    }
    entry.updatedAt = Date.now();
    this.transitionsSinceFlush++;
  }

  /**
   * Completed entries stay completed: a late failure report for a key that
   * already succeeded is ignored.
   */
  markFailed(key: string, reason: string): CheckpointEntry {
    const entry = this.ensureEntry(key);
    if (entry.status === TaskStatus.Completed) {
      return entry;
    }
    entry.status = TaskStatus.Failed;
    entry.error = reason;
    entry.attempts++;
    entry.updatedAt = Date.now();
    this.transitionsSinceFlush++;
    return entry;
  }

  /**
   * Zero the attempt count of the given Failed keys. Returns how many changed.
   */
  resetAttempts(keys: Iterable<string>): number {
    let reset = 0;
    for (const key of keys) {
      const entry = this.state.entries.get(key);
      if (entry && entry.status === TaskStatus.Failed && entry.attempts > 0) {
        entry.attempts = 0;
        reset++;
      }
    }
    return reset;
  }

  /**
   * Reset in-progress entries back to pending (for resume)
   */
  resetInProgress(): number {
    let reset = 0;
    for (const entry of this.state.entries.values()) {
      if (entry.status === TaskStatus.InProgress) {
        entry.status = TaskStatus.Pending;
        reset++;
      }
    }
    return reset;
  }

  private ensureEntry(key: string): CheckpointEntry {
    let entry = this.state.entries.get(key);
    if (!entry) {
      this.register([key]);
      entry = this.state.entries.get(key);
    }
    if (!entry) {
      throw new Error(`Checkpoint entry for ${key} could not be created`);
    }
    return entry;
  }

  counts(): StatusCounts {
    const counts: StatusCounts = {
      total: this.state.entries.size,
      pending: 0,
      inProgress: 0,
      completed: 0,
      failed: 0,
    };

    for (const entry of this.state.entries.values()) {
      switch (entry.status) {
        case TaskStatus.Pending:
          counts.pending++;
          break;
        case TaskStatus.InProgress:
          counts.inProgress++;
          break;
        case TaskStatus.Completed:
          counts.completed++;
          break;
        case TaskStatus.Failed:
          counts.failed++;
          break;
      }
    }

    return counts;
  }

  isAllCompleted(): boolean {
    const counts = this.counts();
    return counts.total > 0 && counts.completed === counts.total;
  }

  failedEntries(): CheckpointEntry[] {
    return [...this.state.entries.values()]
      .filter((entry) => entry.status === TaskStatus.Failed)
      .sort((a, b) => a.key.localeCompare(b.key));
  }

  summary(): CheckpointSummary {
    const counts = this.counts();
    return {
      downloaded: counts.completed,
      failed: counts.failed,
      pending: counts.pending + counts.inProgress,
      total: counts.total,
      percentage: Math.round((counts.completed / Math.max(1, counts.total)) * 10000) / 100,
      startTime: this.state.startTime,
      lastUpdate: this.state.lastUpdate,
      mode: this.state.mode,
    };
  }

  /**
   * Persist the current state. Concurrent callers are serialized.
   */
  flush(): Promise<void> {
    return this.lock(async () => {
      this.state.lastUpdate = this.now().toISOString();
      this.transitionsSinceFlush = 0;

      // Captured before the first await: later transitions go to the next flush
      const rows: ItemRow[] = [...this.state.entries.values()].map((entry) => ({
        key: entry.key,
        status: entry.status === TaskStatus.InProgress ? TaskStatus.Pending : entry.status,
        attempts: entry.attempts,
        error: entry.error,
        updated_at: entry.updatedAt,
      }));
      const metadata: Array<[MetadataKey, string]> = [
        ["schema_version", CHECKPOINT_SCHEMA_VERSION],
        ["start_time", this.state.startTime ?? ""],
        ["last_update", this.state.lastUpdate],
        ["total_known", String(rows.length)],
        ["mode", this.state.mode ?? ""],
      ];
      const summary = this.summary();

      await fsp.mkdir(this.checkpointDir, { recursive: true });
      const snapshot = await this.buildSnapshot(rows, metadata);
      const tmpPath = `${this.checkpointPath}.tmp`;
      await fsp.writeFile(tmpPath, snapshot);
      await fsp.rename(tmpPath, this.checkpointPath);

      await writeFileAtomic(this.summaryPath, `${JSON.stringify(summary, null, 2)}\n`);
      logger.debug(chalk.gray(`Checkpoint saved (${rows.length} keys)`));
    });
  }

  private async buildSnapshot(
    rows: ItemRow[],
    metadata: Array<[MetadataKey, string]>,
  ): Promise<Uint8Array> {
    const SQL = await loadSqlJs();
    const db = new SQL.Database();

    try {
      db.exec(`
        CREATE TABLE items (
          key TEXT PRIMARY KEY,
          status INTEGER NOT NULL,
          attempts INTEGER NOT NULL DEFAULT 0,
          error TEXT,
          updated_at INTEGER NOT NULL
        );
        CREATE TABLE metadata (
          key TEXT PRIMARY KEY,
          value TEXT NOT NULL
        );
        CREATE INDEX idx_status ON items(status);
      `);

      const insertItem = db.prepare(
        "INSERT INTO items (key, status, attempts, error, updated_at) VALUES (?, ?, ?, ?, ?)",
      );
      const insertMetadata = db.prepare("INSERT INTO metadata (key, value) VALUES (?, ?)");

      try {
        db.exec("BEGIN TRANSACTION");
        for (const row of rows) {
          insertItem.run([row.key, row.status, row.attempts, row.error, row.updated_at]);
        }
        for (const [key, value] of metadata) {
          insertMetadata.run([key, value]);
        }
        db.exec("COMMIT");
      } finally {
        insertItem.free();
        insertMetadata.free();
      }

      return db.export();
    } finally {
      db.close();
    }
  }

  /**
   * Flush when enough terminal transitions have accumulated.
   */
  async flushIfDue(): Promise<boolean> {
    if (this.transitionsSinceFlush < this.flushEvery) {
      return false;
    }
    await this.flush();
    return true;
  }

  /**
   * Delete the checkpoint after a fully successful run. The summary file
   * stays behind as the record of that run.
   */
  clear(): Promise<void> {
    return this.lock(async () => {
      await fsp.rm(this.checkpointPath, { force: true });
    });
  }

  /**
   * Forget all progress (clean start)
   */
  reset(): Promise<void> {
    return this.lock(async () => {
      await fsp.rm(this.checkpointPath, { force: true });
      await fsp.rm(this.summaryPath, { force: true });
      this.state = emptyState();
      this.transitionsSinceFlush = 0;
    });
  }
}
