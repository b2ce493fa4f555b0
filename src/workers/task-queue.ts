import type { CheckpointEntry } from "../checkpoint/types.js";
import type { DownloadItem } from "../sources/types.js";
import { RunMode, TaskStatus } from "../types/enums.js";
import type { PendingSelection, PendingSelectionOptions } from "./types.js";

/**
 * Decide which input items a run attempts.
 *
 * - resume: everything not Completed; Failed items are retried unless they
 *   reached `maxAttempts`
 * - retry-failed: everything not Completed, no attempt cap
 * - clean-start: everything
 *
 * `limit` truncates the result after selection. Pure: no I/O, input order kept.
 */
export function computePendingSet(
  items: readonly DownloadItem[],
  entries: ReadonlyMap<string, CheckpointEntry>,
  mode: RunMode,
  options: PendingSelectionOptions = {},
): PendingSelection {
  let alreadyCompleted = 0;
  let capped = 0;
  const selected: DownloadItem[] = [];

  for (const item of items) {
    const entry = entries.get(item.key);

    if (mode === RunMode.CleanStart) {
      selected.push(item);
      continue;
    }

    if (entry?.status === TaskStatus.Completed) {
      alreadyCompleted++;
      continue;
    }

    if (
      mode === RunMode.Resume &&
      options.maxAttempts !== undefined &&
      entry?.status === TaskStatus.Failed &&
      entry.attempts >= options.maxAttempts
    ) {
      capped++;
      continue;
    }

    selected.push(item);
  }

  const limit = options.limit;
  const pending =
    limit !== undefined && limit >= 0 && selected.length > limit ? selected.slice(0, limit) : selected;

  return {
    pending,
    alreadyCompleted,
    capped,
    deferred: selected.length - pending.length,
  };
}

/**
 * Task Queue
 *
 * In-memory queue shared by all workers. Each key is handed out at most
 * once per run; after `stop()` no further items are handed out, which is
 * how a cancelled run drains.
 */
export class TaskQueue {
  private items: readonly DownloadItem[];
  private cursor: number;
  private claimed: Set<string>;
  private stopped: boolean;

  constructor(items: readonly DownloadItem[]) {
    this.items = items;
    this.cursor = 0;
    this.claimed = new Set();
    this.stopped = false;
  }

  /**
   * Claim next pending item. Returns null when the queue is empty or stopped.
   */
  claimNext(): DownloadItem | null {
    while (!this.stopped && this.cursor < this.items.length) {
      const item = this.items[this.cursor++];
      if (!item || this.claimed.has(item.key)) {
        continue;
      }
      this.claimed.add(item.key);
      return item;
    }
    return null;
  }

  /**
   * Stop handing out work (for graceful shutdown)
   */
  stop(): void {
    this.stopped = true;
  }

  isStopped(): boolean {
    return this.stopped;
  }

  get size(): number {
    return this.items.length;
  }

  get remaining(): number {
    return this.stopped ? 0 : this.items.length - this.cursor;
  }
}
