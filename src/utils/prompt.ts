import { confirm } from "@inquirer/prompts";
import chalk from "chalk";
import { logger } from "./logger.js";

type CleanupFn = () => Promise<void> | void;

export type ConfirmPromptOptions = {
  message: string;
  default?: boolean;
  cleanup?: CleanupFn;
};

function isExitPromptError(error: unknown): boolean {
  return error instanceof Error && error.name === "ExitPromptError";
}

async function handlePromptExit(cleanup?: CleanupFn): Promise<never> {
  logger.info(chalk.yellow("\n\n⚠ Prompt cancelled by user (Ctrl+C)"));
  logger.info(chalk.gray("Cleaning up resources..."));
  if (cleanup) {
    await cleanup();
  }
  logger.info(chalk.gray("Exiting..."));
  process.exit(130);
}

/**
 * Yes/no question. Ctrl+C runs `cleanup` and exits with 130.
 */
export async function confirmPrompt(options: ConfirmPromptOptions): Promise<boolean> {
  try {
    return await confirm({
      message: options.message,
      default: options.default,
    });
  } catch (error) {
    if (isExitPromptError(error)) {
      return handlePromptExit(options.cleanup);
    }
    throw error;
  }
}
