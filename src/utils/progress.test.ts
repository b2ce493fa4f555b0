import { describe, expect, it } from "vitest";
import { TaskStatus } from "../types/enums.js";
import type { ProgressDisplay, ProgressSnapshot } from "./progress.js";
import { ProgressReporter } from "./progress.js";

class RecordingDisplay implements ProgressDisplay {
  events: Array<[string, ProgressSnapshot]> = [];
  closed = false;

  start(snapshot: ProgressSnapshot): void {
    this.events.push(["start", snapshot]);
  }
  update(snapshot: ProgressSnapshot): void {
    this.events.push(["update", snapshot]);
  }
  finish(snapshot: ProgressSnapshot): void {
    this.events.push(["finish", snapshot]);
  }
  close(): void {
    this.closed = true;
  }
}

describe("ProgressReporter", () => {
  it("counts terminal events and derives the remainder", () => {
    let clock = 1000;
    const reporter = new ProgressReporter(4, { now: () => clock });

    clock = 1500;
    reporter.record({
      key: "a",
      workerId: "worker-1",
      status: TaskStatus.Completed,
      bytes: 2048,
      attempts: 1,
    });
    reporter.record({
      key: "b",
      workerId: "worker-2",
      status: TaskStatus.Failed,
      reason: "HTTP 404",
      attempts: 1,
    });

    expect(reporter.snapshot()).toEqual({
      total: 4,
      completed: 1,
      failed: 1,
      remaining: 2,
      ratio: 0.5,
      bytes: 2048,
      startedAt: 1000,
      lastEventAt: 1500,
    });
  });

  it("drives the display through its lifecycle", () => {
    const display = new RecordingDisplay();
    const reporter = new ProgressReporter(1, { display, now: () => 0 });

    reporter.record({
      key: "a",
      workerId: "worker-1",
      status: TaskStatus.Completed,
      bytes: 10,
      attempts: 1,
    });
    const final = reporter.finish();
    reporter.close();

    expect(display.events.map(([name]) => name)).toEqual(["start", "update", "finish"]);
    expect(display.events[0]?.[1].ratio).toBe(0);
    expect(final.ratio).toBe(1);
    expect(display.closed).toBe(true);
  });

  it("reports an empty run as complete", () => {
    expect(new ProgressReporter(0).snapshot().ratio).toBe(1);
  });
});
