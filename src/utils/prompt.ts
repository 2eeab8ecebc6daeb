import { confirm, input } from "@inquirer/prompts";
import chalk from "chalk";
import { PromptType } from "../types/enums.js";
import { logger } from "./logger.js";

type CleanupFn = () => Promise<void> | void;

type BasePromptOptions = {
  message: string;
  cleanup?: CleanupFn;
};

export type InputPromptOptions = BasePromptOptions & {
  type: PromptType.Input;
  default?: string;
  validate?: (value: string) => boolean | string;
};

export type ConfirmPromptOptions = BasePromptOptions & {
  type: PromptType.Confirm;
  default?: boolean;
};

export type PromptOptions = InputPromptOptions | ConfirmPromptOptions;

export function isExitPromptError(error: unknown): boolean {
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
 * Ask one question. Ctrl+C runs `cleanup` and exits with 130.
 */
export async function prompt(options: InputPromptOptions): Promise<string>;
export async function prompt(options: ConfirmPromptOptions): Promise<boolean>;
export async function prompt(options: PromptOptions): Promise<string | boolean> {
  try {
    switch (options.type) {
      case PromptType.Input:
        return await input({
          message: options.message,
          default: options.default,
          validate: options.validate,
        });
      case PromptType.Confirm:
        return await confirm({
          message: options.message,
          default: options.default,
        });
    }
  } catch (error) {
    if (isExitPromptError(error)) {
      await handlePromptExit(options.cleanup);
    }
    throw error;
  }
}
