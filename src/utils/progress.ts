import { MultiProgressBars } from "multi-progress-bars";
import chalk from "chalk";
import { TaskStatus } from "../types/enums.js";
import type { ItemOutcome } from "../workers/types.js";

const PDF_TASK = "PDF Downloads";

export interface ProgressSnapshot {
  total: number;
  completed: number;
  failed: number;
  remaining: number;
  /** Share of `total` that reached a terminal state, 0..1 */
  ratio: number;
  bytes: number;
  startedAt: number;
  lastEventAt: number | null;
}

/**
 * Where progress is shown. The reporter works without one.
 */
export interface ProgressDisplay {
  start(snapshot: ProgressSnapshot): void;
  update(snapshot: ProgressSnapshot): void;
  finish(snapshot: ProgressSnapshot): void;
  close(): void;
}

/**
 * Terminal progress bar
 */
export class ProgressBars implements ProgressDisplay {
  private mpb: MultiProgressBars | null = null;

  start(snapshot: ProgressSnapshot): void {
    if (!this.mpb) {
      this.mpb = new MultiProgressBars({
        anchor: "bottom",
        persist: true,
        border: true,
        initMessage: " Download Progress ",
      });
    }
    this.mpb.addTask(PDF_TASK, {
      type: "percentage",
      barTransformFn: chalk.green,
      nameTransformFn: chalk.green.bold,
      message: formatMessage(snapshot),
    });
  }

  update(snapshot: ProgressSnapshot): void {
    if (!this.mpb) return;
    this.mpb.updateTask(PDF_TASK, {
      percentage: snapshot.ratio,
      message: formatMessage(snapshot),
    });
  }

  finish(snapshot: ProgressSnapshot): void {
    if (!this.mpb) return;
    this.mpb.done(PDF_TASK, {
      message: `${snapshot.completed} downloaded ✓${snapshot.failed > 0 ? `, ${snapshot.failed} failed` : ""}`,
      barTransformFn: snapshot.failed > 0 ? chalk.yellow : chalk.green,
    });
  }

  close(): void {
    if (this.mpb) {
      this.mpb.close();
      this.mpb = null;
    }
  }
}

function formatMessage(snapshot: ProgressSnapshot): string {
  const done = snapshot.completed + snapshot.failed;
  const failed = snapshot.failed > 0 ? chalk.red(` (${snapshot.failed} failed)`) : "";
  return `${done}/${snapshot.total} PDFs${failed}`;
}

/**
 * Progress Reporter
 *
 * Counts terminal item events for the current run. Derived data only: the
 * checkpoint store stays the authority on item status.
 */
export class ProgressReporter {
  private total: number;
  private completed = 0;
  private failed = 0;
  private bytes = 0;
  private startedAt: number;
  private lastEventAt: number | null = null;
  private display?: ProgressDisplay;
  private now: () => number;

  constructor(total: number, options: { display?: ProgressDisplay; now?: () => number } = {}) {
    this.total = total;
    this.display = options.display;
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
    this.display?.start(this.snapshot());
  }

  record(outcome: ItemOutcome): void {
    if (outcome.status === TaskStatus.Completed) {
      this.completed++;
      this.bytes += outcome.bytes;
    } else {
      this.failed++;
    }
    this.lastEventAt = this.now();
    this.display?.update(this.snapshot());
  }

  snapshot(): ProgressSnapshot {
    const done = this.completed + this.failed;
    return {
      total: this.total,
      completed: this.completed,
      failed: this.failed,
      remaining: Math.max(0, this.total - done),
      ratio: this.total === 0 ? 1 : Math.min(1, done / this.total),
      bytes: this.bytes,
      startedAt: this.startedAt,
      lastEventAt: this.lastEventAt,
    };
  }

  finish(): ProgressSnapshot {
    const snapshot = this.snapshot();
    this.display?.finish(snapshot);
    return snapshot;
  }

  close(): void {
    this.display?.close();
  }
}
