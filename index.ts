#!/usr/bin/env node
/**
 * subgrab
 *
 * Downloads subtitles for a batch of video URLs with yt-dlp, in parallel,
 * and writes one cleaned plain-text transcript per video.
 *
 * @module index
 * @license MIT
 */

// ============================================================================
// SECTION 1: IMPORTS
// ============================================================================

import { Command } from "commander";
import chalk from "chalk";
import fs from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";
import { ConfigError, loadRunConfig, type RunConfig } from "./src/config.js";
import { errorMessage } from "./src/errors.js";
import { createYtDlpStages } from "./src/subtitles/yt-dlp.js";
import { DEFAULT_WORKERS, MAX_WORKERS, PROGRESS_REFRESH_MS } from "./src/types/constants.js";
import { PromptType } from "./src/types/enums.js";
import { prepareDirectories, removeDirectory } from "./src/utils/files.js";
import {
  cleanupAfterPromptExit,
  showConfiguration,
  showHeader,
  showRunSummary,
} from "./src/utils/helpers.js";
import {
  installConsoleBridge,
  logger,
  setVerboseMode,
} from "./src/utils/logger.js";
import {
  addJobsProgressTask,
  closeProgressBars,
  markTaskDone,
  renderProgress,
} from "./src/utils/progress.js";
import { isExitPromptError, prompt } from "./src/utils/prompt.js";
import { Ticker } from "./src/utils/ticker.js";
import { Coordinator, summarizeRun, type RunOutcome } from "./src/workers/index.js";

// ============================================================================
// SECTION 2: CONSTANTS & CONFIGURATION
// ============================================================================

const packageJsonSchema = z.object({ version: z.string() });

/** Works from the sources (tsx) and from dist/ after a build */
function readVersion(): string {
  const candidates = ["./package.json", "../package.json"].map((relative) =>
    fileURLToPath(new URL(relative, import.meta.url)),
  );
  const packageJsonPath = candidates.find((candidate) => fs.existsSync(candidate));
  if (!packageJsonPath) {
    return "0.0.0";
  }
  const parsed = packageJsonSchema.safeParse(
    JSON.parse(fs.readFileSync(packageJsonPath, "utf-8")),
  );
  return parsed.success ? parsed.data.version : "0.0.0";
}

const VERSION = readVersion();

const EXIT_CODES: Record<RunOutcome, number> = {
  success: 0,
  partial: 1,
  cancelled: 130,
};

interface CliOptions {
  outputDir?: string;
  tempDir?: string;
  workers?: string;
  lang?: string;
  ytDlp?: string;
  timeout?: string;
  keepTemp: boolean;
  verbose: boolean;
  interactive: boolean;
}

installConsoleBridge();

const program = new Command();

// ============================================================================
// SECTION 3: TERMINAL USER INTERFACE
// ============================================================================

function parseIdentifierList(value: string): string[] {
  return value
    .split(/[\s,]+/)
    .map((entry) => entry.trim())
    .filter((entry) => entry !== "");
}

interface InteractiveAnswers {
  identifiers: string[];
  workers: string;
  keepTemp: boolean;
  verbose: boolean;
}

async function runInteractiveMode(
  initialIdentifiers: string[],
  initialOptions: CliOptions,
): Promise<InteractiveAnswers> {
  const urlsInput = await prompt({
    type: PromptType.Input,
    message: "Video URLs (separated by spaces or commas):",
    default: initialIdentifiers.join(" "),
    validate: (value) => {
      if (parseIdentifierList(value).length === 0) {
        return "Enter at least one URL";
      }
      return true;
    },
    cleanup: cleanupAfterPromptExit,
  });

  const workers = await prompt({
    type: PromptType.Input,
    message: `Number of parallel workers (1-${MAX_WORKERS}):`,
    default: initialOptions.workers || String(DEFAULT_WORKERS),
    validate: (value) => {
      const num = parseInt(value, 10);
      if (isNaN(num) || num < 1 || num > MAX_WORKERS) {
        return `Please enter a number between 1 and ${MAX_WORKERS}`;
      }
      return true;
    },
    cleanup: cleanupAfterPromptExit,
  });

  const keepTemp = await prompt({
    type: PromptType.Confirm,
    message: "Keep raw subtitle files after the run?",
    default: initialOptions.keepTemp,
    cleanup: cleanupAfterPromptExit,
  });

  const verbose = await prompt({
    type: PromptType.Confirm,
    message: "Enable verbose output?",
    default: initialOptions.verbose,
    cleanup: cleanupAfterPromptExit,
  });

  return {
    identifiers: parseIdentifierList(urlsInput),
    workers,
    keepTemp,
    verbose,
  };
}

// ============================================================================
// SECTION 4: DOWNLOAD WORKFLOW
// ============================================================================

async function runDownloads(
  identifiers: string[],
  config: RunConfig,
  onCoordinator: (coordinator: Coordinator) => void,
): Promise<RunOutcome> {
  prepareDirectories(config.tempDir, config.outputDir);

  const coordinator = new Coordinator(identifiers, {
    workers: config.workers,
    paths: {
      tempDir: config.tempDir,
      outputDir: config.outputDir,
      format: config.format,
    },
    stages: createYtDlpStages(config),
    logger,
    onRender: renderProgress,
  });
  onCoordinator(coordinator);

  addJobsProgressTask(coordinator.snapshot());
  const ticker = new Ticker(() => coordinator.tick(), PROGRESS_REFRESH_MS);
  ticker.start();

  const snapshot = await coordinator.run().finally(() => ticker.stop());

  // Last frame so the bar shows the final counts
  coordinator.tick();
  const summary = summarizeRun(snapshot);
  if (summary.outcome === "success") {
    markTaskDone("Complete", chalk.green);
  } else if (summary.outcome === "partial") {
    markTaskDone(`${summary.failed} failed`, chalk.red);
  } else {
    markTaskDone("Cancelled", chalk.yellow);
  }
  closeProgressBars();

  if (summary.outcome === "cancelled") {
    logger.info(
      chalk.gray(`Stopped with ${coordinator.getActiveWorkerCount()} workers still busy`),
    );
  }

  showRunSummary(summary, coordinator.elapsed());

  if (config.keepTemp) {
    logger.info(chalk.gray(`Raw subtitles kept in ${config.tempDir}`));
  } else {
    removeDirectory(config.tempDir);
  }

  return summary.outcome;
}

// ============================================================================
// SECTION 5: MAIN APPLICATION
// ============================================================================

/**
 * Main application entry point. Resolves with the process exit code.
 */
async function main(): Promise<number> {
  // -------------------------------------------------------------------------
  // CLI Setup
  // -------------------------------------------------------------------------
  program
    .name("subgrab")
    .description("Download and clean subtitles for a batch of videos in parallel")
    .version(VERSION)
    .argument("[identifiers...]", "Video URLs to fetch subtitles for")
    .option("-o, --output-dir <path>", "Directory for cleaned transcripts (default: cleaned)")
    .option("-t, --temp-dir <path>", "Scratch directory for raw subtitles (default: tmp)")
    .option("-w, --workers <number>", `Number of parallel workers (1-${MAX_WORKERS})`)
    .option("-l, --lang <code>", "Subtitle language code (default: en)")
    .option("--yt-dlp <path>", "Path to the yt-dlp binary (env: SUBGRAB_YT_DLP)")
    .option("--timeout <ms>", "Kill a yt-dlp call after this many milliseconds")
    .option("--keep-temp", "Keep raw subtitle files after the run", false)
    .option("-v, --verbose", "Show verbose debug output", false)
    .option(
      "-i, --interactive",
      "Interactive mode: prompt for URLs and workers (flags provided will be pre-filled)",
      false,
    )
    .configureHelp({
      sortSubcommands: true,
      helpWidth: 80,
    })
    .addHelpText(
      "after",
      `
    Examples:
    - Interactive mode: subgrab
    - Single video: subgrab https://www.youtube.com/watch?v=abc123
    - Four workers: subgrab -w 4 https://youtu.be/abc123 https://youtu.be/def456
    - Spanish subtitles into ./out: subgrab -l es -o ./out https://youtu.be/abc123
      `,
    )
    .parse();

  const options = program.opts<CliOptions>();
  let identifiers = program.args;

  // -------------------------------------------------------------------------
  // Setup Signal Handlers for Graceful Interruption
  // -------------------------------------------------------------------------
  let coordinator: Coordinator | null = null;
  let interruptCount = 0;

  process.on("SIGINT", () => {
    interruptCount++;
    if (!coordinator || interruptCount > 1) {
      closeProgressBars();
      logger.info(chalk.yellow("\n\n⚠ Interrupted by user (Ctrl+C)"));
      logger.info(chalk.gray("Exiting..."));
      process.exit(130);
    }
    logger.info(
      chalk.yellow("\n\n⚠ Interrupted by user (Ctrl+C), stopping"),
    );
    logger.info(chalk.gray("Press Ctrl+C again to exit immediately"));
    coordinator.cancel();
  });

  process.on("SIGTERM", () => {
    logger.info(chalk.gray("\n\n⚠ Received SIGTERM"));
    closeProgressBars();
    process.exit(143);
  });

  // -------------------------------------------------------------------------
  // Collect Inputs
  // -------------------------------------------------------------------------
  showHeader(VERSION);

  let { workers, keepTemp, verbose } = options;
  if (options.interactive || identifiers.length === 0) {
    const answers = await runInteractiveMode(identifiers, options);
    ({ identifiers, workers, keepTemp, verbose } = answers);
  }

  let config: RunConfig;
  try {
    config = loadRunConfig({
      outputDir: options.outputDir,
      tempDir: options.tempDir,
      workers,
      language: options.lang,
      ytDlpPath: options.ytDlp,
      stageTimeoutMs: options.timeout,
      keepTemp,
      verbose,
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      for (const issue of error.issues) {
        console.error(chalk.red(`Error: ${issue}`));
      }
      return 1;
    }
    throw error;
  }

  setVerboseMode(config.verbose);
  showConfiguration(config, identifiers.length);
  console.log(chalk.green("\nStarting download process...\n"));

  // -------------------------------------------------------------------------
  // Execute Download Workflow
  // -------------------------------------------------------------------------
  const outcome = await runDownloads(identifiers, config, (created) => {
    coordinator = created;
  });
  return EXIT_CODES[outcome];
}

// ============================================================================
// SECTION 6: ERROR HANDLING
// ============================================================================

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    closeProgressBars();
    if (isExitPromptError(error)) {
      process.exit(130);
    }
    console.error(chalk.red(errorMessage(error)));
    process.exit(1);
  });
