import chalk from "chalk";
import type { CheckpointEntry, CheckpointSummary } from "../checkpoint/types.js";
import { RunMode } from "../types/enums.js";
import type { CoordinatorResult } from "../workers/types.js";
import { getAsciiArt } from "./ascii.js";
import { logger } from "./logger.js";

const FAILED_KEYS_SHOWN = 10;

export interface RunConfiguration {
  inputPath: string;
  outputDir: string;
  mode: RunMode;
  workers: number;
  timeoutSeconds: number;
  limit?: number;
  maxAttempts?: number;
  requestDelayMs?: number;
  baseUrl: string;
  verbose: boolean;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  const totalSeconds = Math.round(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) {
    return `${seconds}s`;
  }
  const hours = Math.floor(minutes / 60);
  if (hours === 0) {
    return `${minutes}m ${seconds}s`;
  }
  return `${hours}h ${minutes % 60}m ${seconds}s`;
}

export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
}

function describeMode(mode: RunMode): string {
  switch (mode) {
    case RunMode.Resume:
      return "Resume (skip completed)";
    case RunMode.RetryFailed:
      return "Retry failed (fresh attempt budget)";
    case RunMode.CleanStart:
      return "Clean start (checkpoint discarded)";
  }
}

export function showHeader(version: string): void {
  logger.info(chalk.cyan(getAsciiArt("paper-dl")));
  logger.info(chalk.cyan.bold(`Resumable PDF downloader (Version ${version})`));
}

export function showConfiguration(config: RunConfiguration): void {
  logger.info(chalk.cyan("\nConfiguration:"));
  logger.info(chalk.white(`  Input: ${config.inputPath}`));
  logger.info(chalk.white(`  Output: ${config.outputDir}`));
  logger.info(chalk.white(`  Mode: ${describeMode(config.mode)}`));
  logger.info(chalk.white(`  Workers: ${config.workers}`));
  logger.info(chalk.white(`  Timeout: ${config.timeoutSeconds}s`));
  if (config.limit !== undefined) {
    logger.info(chalk.white(`  Limit: ${config.limit} items`));
  }
  if (config.maxAttempts !== undefined) {
    logger.info(chalk.white(`  Max attempts: ${config.maxAttempts}`));
  }
  if (config.requestDelayMs) {
    logger.info(chalk.white(`  Delay between requests: ${config.requestDelayMs}ms`));
  }
  logger.info(chalk.white(`  Base URL: ${config.baseUrl}`));
  logger.info(chalk.white(`  Verbose: ${config.verbose ? "Yes" : "No"}`));
}

function showFailedKeys(keys: string[], reasons: Map<string, string | null>): void {
  if (keys.length === 0) {
    return;
  }
  logger.info(chalk.red(`\n  Failed items (${keys.length}):`));
  for (const key of keys.slice(0, FAILED_KEYS_SHOWN)) {
    const reason = reasons.get(key);
    logger.info(chalk.red(`    ${key}${reason ? chalk.gray(` - ${reason}`) : ""}`));
  }
  if (keys.length > FAILED_KEYS_SHOWN) {
    logger.info(chalk.gray(`    ... and ${keys.length - FAILED_KEYS_SHOWN} more`));
  }
}

export function showRunSummary(
  result: CoordinatorResult,
  reasons: Map<string, string | null> = new Map(),
): void {
  const { summary } = result;
  logger.info(chalk.cyan(`\n========================================`));
  logger.info(chalk.cyan(`Download Summary:`));
  logger.info(chalk.white(`  Input records: ${result.totalRecords}`));
  if (result.skippedRecords > 0) {
    logger.info(chalk.yellow(`  Unusable records: ${result.skippedRecords}`));
  }
  if (result.duplicateRecords > 0) {
    logger.info(chalk.yellow(`  Duplicate keys ignored: ${result.duplicateRecords}`));
  }
  if (result.seeded > 0) {
    logger.info(chalk.white(`  Found on disk: ${result.seeded}`));
  }
  logger.info(chalk.white(`  Attempted this run: ${result.attempted}`));
  logger.info(
    chalk.green(
      `  Downloaded this run: ${result.succeeded} (${formatBytes(result.bytesDownloaded)})`,
    ),
  );
  if (result.failed > 0) {
    logger.info(chalk.red(`  Failed this run: ${result.failed}`));
  }
  if (result.selection.deferred > 0) {
    logger.info(chalk.gray(`  Deferred by --limit: ${result.selection.deferred}`));
  }
  if (result.selection.capped > 0) {
    logger.info(chalk.gray(`  Held back by --max-attempts: ${result.selection.capped}`));
  }
  logger.info(
    chalk.white(
      `  Overall: ${summary.downloaded}/${summary.total} (${summary.percentage}%), ${summary.failed} failed, ${summary.pending} pending`,
    ),
  );
  logger.info(chalk.white(`  Duration: ${formatDuration(result.duration)}`));
  showFailedKeys(result.failedKeys, reasons);

  if (result.cancelled) {
    logger.info(chalk.yellow(`\n  Run interrupted. Run again to resume.`));
  } else if (result.failed > 0 || summary.failed > 0) {
    logger.info(chalk.yellow(`\n  Re-run with --retry-failed to try failed items again,`));
    logger.info(chalk.yellow(`  or lower --workers if the server is throttling.`));
  }
  if (result.checkpointCleared) {
    logger.info(chalk.green(`  All items downloaded. Checkpoint removed.`));
  }
  logger.info(chalk.cyan(`========================================`));
}

export function showStatus(
  summary: CheckpointSummary,
  failed: CheckpointEntry[],
  checkpointPath: string,
): void {
  logger.info(chalk.cyan(`\nCheckpoint: ${checkpointPath}`));
  logger.info(chalk.white(`  Mode of last run: ${summary.mode ?? "unknown"}`));
  logger.info(chalk.white(`  Started: ${summary.startTime ?? "never"}`));
  logger.info(chalk.white(`  Last update: ${summary.lastUpdate ?? "never"}`));
  logger.info(chalk.green(`  Downloaded: ${summary.downloaded}`));
  logger.info(chalk.red(`  Failed: ${summary.failed}`));
  logger.info(chalk.white(`  Pending: ${summary.pending}`));
  logger.info(chalk.white(`  Total: ${summary.total} (${summary.percentage}% done)`));
  showFailedKeys(
    failed.map((entry) => entry.key),
    new Map(failed.map((entry) => [entry.key, entry.error])),
  );
}
