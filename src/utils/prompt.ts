import { confirm } from "@inquirer/prompts";
import chalk from "chalk";
import { EXIT_INTERRUPTED } from "../types/constants.js";
import { logger } from "./logger.js";

type CleanupFn = () => Promise<void> | void;

export interface ConfirmOptions {
  message: string;
  default?: boolean;
  cleanup?: CleanupFn;
}

function isExitPromptError(error: unknown): boolean {
  return error instanceof Error && error.name === "ExitPromptError";
}

async function handlePromptExit(cleanup?: CleanupFn): Promise<never> {
  logger.info(chalk.yellow("\n\n⚠ Prompt cancelled by user (Ctrl+C)"));
  if (cleanup) {
    logger.info(chalk.gray("Cleaning up resources..."));
    await cleanup();
  }
  logger.info(chalk.gray("Exiting..."));
  process.exit(EXIT_INTERRUPTED);
}

export async function confirmAction(options: ConfirmOptions): Promise<boolean> {
  try {
    return await confirm({
      message: options.message,
      default: options.default,
    });
  } catch (error) {
    if (isExitPromptError(error)) {
      await handlePromptExit(options.cleanup);
    }
    throw error;
  }
}
