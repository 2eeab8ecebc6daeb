import chalk from "chalk";
import type { RunConfig } from "../config.js";
import type { RunSummary } from "../workers/snapshot.js";
import { getAsciiArt } from "./ascii.js";
import { closeProgressBars } from "./progress.js";

export function showHeader(version: string): void {
  console.log(chalk.red.bold("\n"));
  console.log(chalk.red(getAsciiArt("subgrab")));
  console.log(
    chalk.red.bold(`\nParallel subtitle transcript downloader (Version ${version})`),
  );
}

export function cleanupAfterPromptExit(): void {
  closeProgressBars();
}

export function showConfiguration(config: RunConfig, videoCount: number): void {
  console.log(chalk.cyan("\nCollected inputs:"));
  console.log(chalk.white(`  Videos: ${videoCount}`));
  console.log(chalk.white(`  Output directory: ${config.outputDir}`));
  console.log(chalk.white(`  Temp directory: ${config.tempDir}`));
  console.log(chalk.white(`  Language: ${config.language}`));
  console.log(chalk.white(`  Workers: ${config.workers}`));
  console.log(chalk.white(`  yt-dlp: ${config.ytDlpPath}`));
  if (config.stageTimeoutMs !== undefined) {
    console.log(chalk.white(`  Stage timeout: ${config.stageTimeoutMs}ms`));
  }
  console.log(chalk.white(`  Keep temp files: ${config.keepTemp ? "Yes" : "No"}`));
  console.log(chalk.white(`  Verbose: ${config.verbose ? "Yes" : "No"}`));
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.round(ms / 1000));
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) {
    return `${seconds}s`;
  }
  return `${minutes}m ${seconds}s`;
}

/**
 * Plain summary lines, without colour. The first line is the headline.
 */
export function formatSummaryLines(
  summary: RunSummary,
  durationMs: number,
): string[] {
  const headline =
    summary.outcome === "success"
      ? "All transcripts ready"
      : summary.outcome === "partial"
        ? "Finished with failures"
        : "Cancelled";

  const lines = [
    `${headline} in ${formatDuration(durationMs)}`,
    `  Downloaded: ${summary.completed}`,
    `  Already present: ${summary.skipped}`,
  ];
  if (summary.failed > 0) {
    lines.push(`  Failed: ${summary.failed}`);
  }
  if (summary.pending > 0) {
    lines.push(`  Not finished: ${summary.pending}`);
  }
  for (const failure of summary.failures) {
    const label = failure.title || failure.identifier;
    lines.push(`  ✖ ${label}: ${failure.message}`);
  }
  return lines;
}

export function showRunSummary(summary: RunSummary, durationMs: number): void {
  const color =
    summary.outcome === "success"
      ? chalk.green
      : summary.outcome === "partial"
        ? chalk.red
        : chalk.yellow;

  const [headline, ...rest] = formatSummaryLines(summary, durationMs);
  console.log(chalk.cyan(`\n========================================`));
  console.log(color.bold(headline));
  for (const line of rest) {
    console.log(line.startsWith("  ✖") ? chalk.red(line) : chalk.white(line));
  }
  console.log(chalk.cyan(`========================================`));
}
