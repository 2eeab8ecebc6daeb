import { spawn } from "child_process";
import fs from "fs";
import path from "path";
import type { RunConfig } from "../config.js";
import { FetchError, ResolutionError, errorMessage } from "../errors.js";
import { logger } from "../utils/logger.js";
import { getRawArtifactPath } from "../utils/files.js";
import type { StageOperations } from "../workers/types.js";
import { extractVideoId } from "./video-id.js";
import { normalizeSubtitleFile } from "./vtt.js";

export interface YtDlpOptions {
  binary: string;
  language: string;
  format: string;
  timeoutMs?: number;
}

export interface ProcessOutcome {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export function buildTitleArgs(url: string): string[] {
  return ["--quiet", "--no-warnings", "--skip-download", "--print", "title", url];
}

/**
 * yt-dlp writes `<template>.<lang>.<format>` for subtitles; the output
 * template is the bare content key.
 */
export function buildDownloadArgs(
  url: string,
  contentKey: string,
  outputDir: string,
  options: Pick<YtDlpOptions, "language" | "format">,
): string[] {
  return [
    "--quiet",
    "--no-warnings",
    url,
    "--skip-download",
    "--write-sub",
    "--write-auto-sub",
    "--sub-lang",
    options.language,
    "--convert-subs",
    options.format,
    "--restrict-filenames",
    "-o",
    path.join(outputDir, contentKey),
  ];
}

/**
 * Run the downloader to completion, collecting its output.
 * Rejects only when the process cannot be spawned.
 */
export function runYtDlp(
  binary: string,
  args: string[],
  timeoutMs?: number,
): Promise<ProcessOutcome> {
  return new Promise((resolve, reject) => {
    logger.debug(`[yt-dlp] ${binary} ${args.join(" ")}`);

    const child = spawn(binary, args, { stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let timer: ReturnType<typeof setTimeout> | null = null;

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGTERM");
      }, timeoutMs);
    }

    // Decode across chunk boundaries; titles are often multibyte
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", (error) => {
      if (timer) clearTimeout(timer);
      reject(error);
    });

    child.on("close", (code, signal) => {
      if (timer) clearTimeout(timer);
      resolve({ code, signal, stdout, stderr, timedOut });
    });
  });
}

function describeExit(outcome: ProcessOutcome): string {
  const detail = outcome.stderr.trim().split("\n").pop() ?? "";
  const status =
    outcome.code !== null
      ? `exit code ${outcome.code}`
      : `signal ${outcome.signal ?? "unknown"}`;
  return detail ? `${status}: ${detail}` : status;
}

export async function fetchTitle(
  url: string,
  options: YtDlpOptions,
): Promise<string> {
  let outcome: ProcessOutcome;
  try {
    outcome = await runYtDlp(options.binary, buildTitleArgs(url), options.timeoutMs);
  } catch (error) {
    throw new ResolutionError(
      `Could not run ${options.binary}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  if (outcome.timedOut) {
    throw new ResolutionError(`Title lookup timed out after ${options.timeoutMs}ms`);
  }
  if (outcome.code !== 0) {
    throw new ResolutionError(`Title lookup failed (${describeExit(outcome)})`);
  }

  // --print emits one line per video; the first is ours
  return outcome.stdout.trim().split("\n")[0]?.trim() ?? "";
}

/**
 * Find what yt-dlp wrote for this key (`<key>.<lang>.<format>` or
 * `<key>.<format>`) and move it to `<key>.<format>`.
 */
export function settleArtifact(
  contentKey: string,
  outputDir: string,
  options: Pick<YtDlpOptions, "language" | "format">,
): string | null {
  const expected = getRawArtifactPath(contentKey, outputDir, options.format);
  if (fs.existsSync(expected)) {
    return expected;
  }

  const preferred = path.join(
    outputDir,
    `${contentKey}.${options.language}.${options.format}`,
  );
  const candidates = fs.existsSync(preferred)
    ? [preferred]
    : fs
        .readdirSync(outputDir)
        .filter(
          (file) =>
            file.startsWith(`${contentKey}.`) &&
            file.endsWith(`.${options.format}`),
        )
        .sort()
        .map((file) => path.join(outputDir, file));

  const found = candidates[0];
  if (!found) {
    return null;
  }

  fs.renameSync(found, expected);
  return expected;
}

export async function downloadSubtitles(
  url: string,
  contentKey: string,
  outputDir: string,
  options: YtDlpOptions,
): Promise<void> {
  let outcome: ProcessOutcome;
  try {
    outcome = await runYtDlp(
      options.binary,
      buildDownloadArgs(url, contentKey, outputDir, options),
      options.timeoutMs,
    );
  } catch (error) {
    throw new FetchError(
      "tool-failed",
      `Could not run ${options.binary}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  if (outcome.timedOut) {
    throw new FetchError(
      "timeout",
      `Subtitle download timed out after ${options.timeoutMs}ms`,
    );
  }
  if (outcome.code !== 0) {
    throw new FetchError(
      "tool-failed",
      `Subtitle download failed (${describeExit(outcome)})`,
    );
  }

  settleArtifact(contentKey, outputDir, options);
}

/**
 * Production stage operations backed by yt-dlp.
 */
export function createYtDlpStages(config: RunConfig): StageOperations {
  const options: YtDlpOptions = {
    binary: config.ytDlpPath,
    language: config.language,
    format: config.format,
    timeoutMs: config.stageTimeoutMs,
  };

  return {
    resolveTitle: (identifier) => fetchTitle(identifier, options),
    deriveContentKey: extractVideoId,
    fetchAsset: (identifier, contentKey, destination) =>
      downloadSubtitles(identifier, contentKey, destination, options),
    normalizeContent: normalizeSubtitleFile,
  };
}
