import chalk from "chalk";

const originalConsole = {
  log: console.log.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
};

let isVerbose = process.env.PAPER_DL_VERBOSE === "true";
let isSilent = false;

export function setVerboseMode(verbose: boolean): void {
  isVerbose = verbose;
}

export function isVerboseMode(): boolean {
  return isVerbose;
}

/**
 * Suppress all output (tests).
 */
export function setSilentMode(silent: boolean): void {
  isSilent = silent;
}

function logWith(method: "log" | "warn" | "error", args: unknown[]): void {
  if (isSilent) {
    return;
  }
  originalConsole[method](...args);
}

export const logger = {
  debug(...args: unknown[]): void {
    if (!isVerbose) {
      return;
    }
    logWith("log", args);
  },
  info(...args: unknown[]): void {
    logWith("log", args);
  },
  success(message: string): void {
    logWith("log", [chalk.green(`✓ ${message}`)]);
  },
  warn(...args: unknown[]): void {
    logWith("warn", args);
  },
  error(...args: unknown[]): void {
    logWith("error", args);
  },
};

export function installConsoleBridge(): void {
  console.log = (...args: unknown[]) => logger.info(...args);
  console.warn = (...args: unknown[]) => logger.warn(...args);
  console.error = (...args: unknown[]) => logger.error(...args);
}
