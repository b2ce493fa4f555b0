/**
 * Item status codes, as stored in the checkpoint
 * 0 = Pending (not started, or interrupted)
 * 1 = In Progress (a worker claimed it)
 * 2 = Completed (file written in full)
 * 3 = Failed (last attempt did not produce a file)
 */
export enum TaskStatus {
  Pending = 0,
  InProgress = 1,
  Completed = 2,
  Failed = 3,
}

export enum RunMode {
  Resume = "resume",
  RetryFailed = "retry-failed",
  CleanStart = "clean-start",
}

export enum CoordinatorPhase {
  Init = "init",
  Loading = "loading",
  Resolving = "resolving",
  Running = "running",
  Draining = "draining",
  Finalizing = "finalizing",
  Done = "done",
}

export type RecordFormat = "csv" | "json" | "ndjson";
