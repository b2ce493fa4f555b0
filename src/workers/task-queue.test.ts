import { describe, expect, it } from "vitest";
import type { CheckpointEntry } from "../checkpoint/types.js";
import type { DownloadItem } from "../sources/types.js";
import { RunMode, TaskStatus } from "../types/enums.js";
import { computePendingSet, TaskQueue } from "./task-queue.js";

const items: DownloadItem[] = ["a", "b", "c", "d"].map((key) => ({
  key,
  url: `https://example.org/${key}.pdf`,
}));

function entry(key: string, status: TaskStatus, attempts = 0): [string, CheckpointEntry] {
  return [key, { key, status, attempts, error: null, updatedAt: 0 }];
}

const entries = new Map<string, CheckpointEntry>([
  entry("a", TaskStatus.Completed, 1),
  entry("b", TaskStatus.Failed, 3),
  entry("c", TaskStatus.Pending),
]);

const keysOf = (selected: DownloadItem[]) => selected.map((item) => item.key);

describe("computePendingSet", () => {
  it("resume selects everything not completed, in input order", () => {
    const selection = computePendingSet(items, entries, RunMode.Resume);
    expect(keysOf(selection.pending)).toEqual(["b", "c", "d"]);
    expect(selection.alreadyCompleted).toBe(1);
    expect(selection.capped).toBe(0);
    expect(selection.deferred).toBe(0);
  });

  it("resume holds back keys at the attempt cap", () => {
    const selection = computePendingSet(items, entries, RunMode.Resume, { maxAttempts: 3 });
    expect(keysOf(selection.pending)).toEqual(["c", "d"]);
    expect(selection.capped).toBe(1);
  });

  it("retry-failed ignores the attempt cap and never selects Completed", () => {
    const selection = computePendingSet(items, entries, RunMode.RetryFailed, { maxAttempts: 3 });
    expect(keysOf(selection.pending)).toEqual(["b", "c", "d"]);
    expect(selection.capped).toBe(0);
  });

  it("clean-start selects every item", () => {
    const selection = computePendingSet(items, entries, RunMode.CleanStart);
    expect(keysOf(selection.pending)).toEqual(["a", "b", "c", "d"]);
    expect(selection.alreadyCompleted).toBe(0);
  });

  it("limit truncates after selection", () => {
    const selection = computePendingSet(items, entries, RunMode.Resume, { limit: 2 });
    expect(keysOf(selection.pending)).toEqual(["b", "c"]);
    expect(selection.deferred).toBe(1);

    const none = computePendingSet(items, entries, RunMode.Resume, { limit: 0 });
    expect(none.pending).toEqual([]);
    expect(none.deferred).toBe(3);
  });

  it("is empty when everything is completed", () => {
    const done = new Map(items.map((item) => entry(item.key, TaskStatus.Completed, 1)));
    const selection = computePendingSet(items, done, RunMode.RetryFailed);
    expect(selection.pending).toEqual([]);
    expect(selection.alreadyCompleted).toBe(4);
  });
});

describe("TaskQueue", () => {
  it("hands out each key once", () => {
    const queue = new TaskQueue([...items, { key: "a", url: "https://example.org/again.pdf" }]);

    const claimed: string[] = [];
    let next = queue.claimNext();
    while (next) {
      claimed.push(next.key);
      next = queue.claimNext();
    }

    expect(claimed).toEqual(["a", "b", "c", "d"]);
    expect(queue.remaining).toBe(0);
  });

  it("stops handing out work after stop()", () => {
    const queue = new TaskQueue(items);
    expect(queue.claimNext()?.key).toBe("a");

    queue.stop();

    expect(queue.isStopped()).toBe(true);
    expect(queue.claimNext()).toBeNull();
    expect(queue.remaining).toBe(0);
    expect(queue.size).toBe(4);
  });
});
