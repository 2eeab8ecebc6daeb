import { NormalizeError, errorMessage } from "../errors.js";
import { readTextFile, writeTextFile } from "../utils/files.js";

const HEADER_TOKEN = "WEBVTT";
const ARROW = "-->";
// "00:00:00.000 --> 00:00:00.000"
const MIN_TIMING_LENGTH = 29;

export function isNumber(line: string): boolean {
  return /^[0-9]+$/.test(line);
}

/**
 * Fixed-width check for a cue timing line such as
 * `00:00:01.000 --> 00:00:02.500 align:start`.
 */
export function isTimestamp(line: string): boolean {
  return (
    line.length >= MIN_TIMING_LENGTH &&
    line[2] === ":" &&
    line[5] === ":" &&
    line[8] === "." &&
    line.includes(ARROW)
  );
}

/** Drop everything between `<` and `>` in one pass. Tags do not nest. */
export function stripTags(line: string): string {
  let out = "";
  let inTag = false;
  for (const char of line) {
    if (char === "<") {
      inTag = true;
      continue;
    }
    if (char === ">") {
      inTag = false;
      continue;
    }
    if (!inTag) {
      out += char;
    }
  }
  return out;
}

/**
 * Header, cue counters, cue timings, markup and blank lines out.
 */
export function removeArtifacts(lines: readonly string[]): string[] {
  const out: string[] = [];
  for (const raw of lines) {
    const line = raw.trim();
    if (line === "" || line === HEADER_TOKEN) {
      continue;
    }
    if (isNumber(line) || isTimestamp(line)) {
      continue;
    }
    const text = stripTags(line);
    if (text === "") {
      continue;
    }
    out.push(text);
  }
  return out;
}

/** Collapse runs of identical lines. Only the previous kept line is compared. */
export function dedupeLines(lines: readonly string[]): string[] {
  const out: string[] = [];
  let previous = "";
  for (const line of lines) {
    if (line !== "" && line !== previous) {
      out.push(line);
      previous = line;
    }
  }
  return out;
}

export function cleanSubtitleLines(lines: readonly string[]): string[] {
  return dedupeLines(removeArtifacts(lines));
}

export function cleanSubtitleText(raw: string): string {
  return cleanSubtitleLines(raw.split("\n")).join("\n");
}

/**
 * Read a raw subtitle file, clean it, write the transcript.
 */
export async function normalizeSubtitleFile(
  rawPath: string,
  outputPath: string,
): Promise<void> {
  let raw: string;
  try {
    raw = await readTextFile(rawPath);
  } catch (error) {
    throw new NormalizeError(
      `Cannot read subtitle file ${rawPath}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  try {
    await writeTextFile(outputPath, cleanSubtitleText(raw));
  } catch (error) {
    throw new NormalizeError(
      `Cannot write transcript ${outputPath}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
}
