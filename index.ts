#!/usr/bin/env node
/**
 * paper-dl CLI
 *
 * Downloads the PDF of every record in a CSV / JSON / NDJSON export with a
 * pool of concurrent workers. Progress is checkpointed under
 * {output}/.paper-dl/ so an interrupted run resumes where it stopped.
 *
 * @module index
 */

// ============================================================================
// SECTION 1: IMPORTS
// ============================================================================

import { Command, InvalidArgumentError, Option } from "commander";
import chalk from "chalk";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { CheckpointStore } from "./src/checkpoint/checkpoint-store.js";
import { PdfClient } from "./src/http/pdf-client.js";
import {
  DEFAULT_BASE_URL,
  DEFAULT_FLUSH_EVERY,
  DEFAULT_INPUT_FILE_NAME,
  DEFAULT_MIN_BYTES,
  DEFAULT_TIMEOUT_SECONDS,
  DEFAULT_WORKERS,
  EXIT_FATAL_CONFIG,
  EXIT_INTERRUPTED,
  EXIT_OK,
  MAX_WORKERS,
} from "./src/types/constants.js";
import { RunMode } from "./src/types/enums.js";
import { errorMessage, FatalConfigError, HttpStatusError } from "./src/types/errors.js";
import {
  installConsoleBridge,
  isVerboseMode,
  logger,
  setVerboseMode,
} from "./src/utils/logger.js";
import { confirmAction } from "./src/utils/prompt.js";
import {
  showConfiguration,
  showHeader,
  showRunSummary,
  showStatus,
} from "./src/utils/helpers.js";
import { Coordinator, clampWorkers } from "./src/workers/index.js";

// ============================================================================
// SECTION 2: CONSTANTS & CONFIGURATION
// ============================================================================

type CliOptions = {
  input?: string;
  output?: string;
  workers: number;
  timeout: number;
  resume?: boolean;
  retryFailed?: boolean;
  cleanStart?: boolean;
  limit?: number;
  flushEvery: number;
  maxAttempts?: number;
  delay: number;
  minBytes: number;
  baseUrl: string;
  preflight: boolean;
  status: boolean;
  yes: boolean;
  progress: boolean;
  verbose: boolean;
};

/**
 * Version from package.json, which sits next to index.ts in the source
 * tree and one level up from dist/index.js.
 */
function readVersion(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  for (const candidate of [here, path.dirname(here)]) {
    const packageJsonPath = path.join(candidate, "package.json");
    if (!fs.existsSync(packageJsonPath)) {
      continue;
    }
    const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, "utf-8"));
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "version" in parsed &&
      typeof parsed.version === "string"
    ) {
      return parsed.version;
    }
  }
  return "0.0.0";
}

const VERSION = readVersion();

// ============================================================================
// SECTION 3: ARGUMENT PARSERS
// ============================================================================

function parseInteger(min: number, max = Number.MAX_SAFE_INTEGER) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
      throw new InvalidArgumentError(
        max === Number.MAX_SAFE_INTEGER
          ? `Must be an integer >= ${min}.`
          : `Must be an integer between ${min} and ${max}.`,
      );
    }
    return parsed;
  };
}

function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive number of seconds.");
  }
  return parsed;
}

function parseBaseUrl(value: string): string {
  if (!URL.canParse(value)) {
    throw new InvalidArgumentError("Must be an http(s) URL.");
  }
  const { protocol } = new URL(value);
  if (protocol !== "http:" && protocol !== "https:") {
    throw new InvalidArgumentError("Must be an http(s) URL.");
  }
  return value.replace(/\/+$/, "");
}

function selectMode(options: CliOptions): RunMode {
  if (options.cleanStart) {
    return RunMode.CleanStart;
  }
  if (options.retryFailed) {
    return RunMode.RetryFailed;
  }
  return RunMode.Resume;
}

// ============================================================================
// SECTION 4: SUBCOMMAND-LIKE FLAGS
// ============================================================================

async function printStatus(outputDir: string): Promise<number> {
  const store = new CheckpointStore(outputDir);
  const loaded = await store.load();

  if (loaded.source === "fresh") {
    if (fs.existsSync(store.summaryPath)) {
      logger.info(chalk.green(`No checkpoint in ${outputDir}; last run finished.`));
      logger.info(chalk.gray(`Summary: ${store.summaryPath}`));
    } else {
      logger.info(chalk.yellow(`No checkpoint in ${outputDir}.`));
    }
    return EXIT_OK;
  }
  if (loaded.source === "corrupt") {
    return EXIT_FATAL_CONFIG;
  }

  showStatus(store.summary(), store.failedEntries(), store.checkpointPath);
  return EXIT_OK;
}

async function runPreflight(baseUrl: string, timeoutMs: number): Promise<void> {
  const client = new PdfClient({ timeoutMs });
  logger.info(chalk.gray(`Checking connectivity to ${baseUrl}...`));
  try {
    await client.checkConnectivity(baseUrl);
    logger.success(`${baseUrl} is reachable`);
  } catch (error) {
    if (error instanceof HttpStatusError) {
      // The host answered; the landing page status does not matter
      logger.success(`${baseUrl} is reachable (HTTP ${error.statusCode})`);
      return;
    }
    throw new FatalConfigError(`Cannot reach ${baseUrl}: ${errorMessage(error)}`);
  } finally {
    await client.close();
  }
}

// ============================================================================
// SECTION 5: MAIN APPLICATION
// ============================================================================

const program = new Command();

/**
 * Main application entry point. Returns the process exit code.
 */
async function main(): Promise<number> {
  // -------------------------------------------------------------------------
  // CLI Setup
  // -------------------------------------------------------------------------
  program
    .name("paper-dl")
    .description("Resumable concurrent PDF downloader for submission exports")
    .version(VERSION)
    .option("-i, --input <path>", `Record file (default: <output>/../${DEFAULT_INPUT_FILE_NAME})`)
    .option("-o, --output <dir>", "Output directory (required)")
    .option(
      "-w, --workers <number>",
      `Concurrent downloads (1-${MAX_WORKERS})`,
      parseInteger(1, MAX_WORKERS),
      DEFAULT_WORKERS,
    )
    .option(
      "-t, --timeout <seconds>",
      "Per-request timeout in seconds",
      parseSeconds,
      DEFAULT_TIMEOUT_SECONDS,
    )
    .addOption(
      new Option("--resume", "Skip completed items, retry the rest (default)").conflicts([
        "retryFailed",
        "cleanStart",
      ]),
    )
    .addOption(
      new Option("--retry-failed", "Retry failed items with a fresh attempt count").conflicts([
        "resume",
        "cleanStart",
      ]),
    )
    .addOption(
      new Option("--clean-start", "Discard the checkpoint and download everything").conflicts([
        "resume",
        "retryFailed",
      ]),
    )
    .option("-l, --limit <number>", "Process at most this many items", parseInteger(0))
    .option(
      "--flush-every <number>",
      "Save the checkpoint after this many finished items",
      parseInteger(1),
      DEFAULT_FLUSH_EVERY,
    )
    .option(
      "--max-attempts <number>",
      "In resume mode, hold back items that failed this many times",
      parseInteger(1),
    )
    .option("--delay <ms>", "Pause between items per worker", parseInteger(0), 0)
    .option(
      "--min-bytes <number>",
      "Smallest file size that counts as downloaded",
      parseInteger(1),
      DEFAULT_MIN_BYTES,
    )
    .addOption(
      new Option("--base-url <url>", "Base for relative PDF links")
        .env("PAPER_DL_BASE_URL")
        .argParser(parseBaseUrl)
        .default(DEFAULT_BASE_URL),
    )
    .option("--preflight", "Check connectivity to the base URL first", false)
    .option("--status", "Print the checkpoint summary and exit", false)
    .option("-y, --yes", "Skip the clean-start confirmation", false)
    .option("--no-progress", "Disable progress bars")
    .option("-v, --verbose", "Show verbose debug output", false)
    .configureHelp({
      sortSubcommands: true,
      helpWidth: 80,
    })
    .addHelpText(
      "after",
      `
    Examples:
    - Download everything: paper-dl -o ./downloads
    - Explicit input: paper-dl -i ./submissions.jsonl -o ./downloads
    - More workers: paper-dl -o ./downloads -w 8
    - Retry failures: paper-dl -o ./downloads --retry-failed
    - Start over: paper-dl -o ./downloads --clean-start -y
    - Inspect progress: paper-dl -o ./downloads --status
    - Checkpoint: {output}/.paper-dl/checkpoint.db
    - Files: {output}/pdfs/{key}.pdf
      `,
    )
    .parse();

  // -------------------------------------------------------------------------
  // Parse Options Early
  // -------------------------------------------------------------------------
  const options = program.opts<CliOptions>();
  setVerboseMode(options.verbose || isVerboseMode());
  installConsoleBridge();

  if (!options.output) {
    throw new FatalConfigError("--output <dir> is required");
  }
  const outputDir = path.resolve(options.output);

  if (options.status) {
    return printStatus(outputDir);
  }

  const inputPath = path.resolve(
    options.input ?? path.join(outputDir, "..", DEFAULT_INPUT_FILE_NAME),
  );
  const mode = selectMode(options);
  const timeoutMs = Math.round(options.timeout * 1000);

  showHeader(VERSION);
  showConfiguration({
    inputPath,
    outputDir,
    mode,
    workers: clampWorkers(options.workers),
    timeoutSeconds: options.timeout,
    limit: options.limit,
    maxAttempts: options.maxAttempts,
    requestDelayMs: options.delay,
    baseUrl: options.baseUrl,
    verbose: isVerboseMode(),
  });

  // -------------------------------------------------------------------------
  // Confirmation & Preflight
  // -------------------------------------------------------------------------
  if (mode === RunMode.CleanStart && !options.yes && process.stdin.isTTY) {
    const proceed = await confirmAction({
      message: `Discard all saved progress in ${outputDir}?`,
      default: false,
    });
    if (!proceed) {
      logger.info(chalk.gray("Aborted."));
      return EXIT_OK;
    }
  }

  if (options.preflight) {
    await runPreflight(options.baseUrl, timeoutMs);
  }

  // -------------------------------------------------------------------------
  // Execute Download Workflow
  // -------------------------------------------------------------------------
  const coordinator = new Coordinator({
    inputPath,
    outputDir,
    mode,
    workers: options.workers,
    timeoutMs,
    limit: options.limit,
    flushEvery: options.flushEvery,
    maxAttempts: options.maxAttempts,
    requestDelayMs: options.delay,
    minBytes: options.minBytes,
    baseUrl: options.baseUrl,
    showProgress: options.progress && process.stdout.isTTY === true,
  });

  // -------------------------------------------------------------------------
  // Setup Signal Handlers for Graceful Interruption
  // -------------------------------------------------------------------------
  const onSignal = (signal: NodeJS.Signals): void => {
    if (coordinator.isCancelled()) {
      logger.info(chalk.red(`\n⚠ Received ${signal} again, exiting without a final save`));
      process.exit(EXIT_INTERRUPTED);
    }
    logger.info(
      chalk.yellow(`\n\n⚠ Received ${signal}, finishing in-flight downloads and saving progress...`),
    );
    logger.info(chalk.gray("Press Ctrl+C again to exit immediately."));
    coordinator.cancel();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    const result = await coordinator.run();
    const reasons = new Map(
      coordinator
        .getStore()
        .failedEntries()
        .map((entry) => [entry.key, entry.error]),
    );
    showRunSummary(result, reasons);
    return result.exitCode;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

// ============================================================================
// SECTION 6: ERROR HANDLING
// ============================================================================

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    if (error instanceof FatalConfigError) {
      logger.error(chalk.red(`\n✖ ${error.message}`));
      process.exitCode = EXIT_FATAL_CONFIG;
      return;
    }
    logger.error(chalk.red(`\n✖ Unexpected error: ${errorMessage(error)}`));
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    process.exitCode = 1;
  });
