import fs from "fs";
import path from "path";

const MAX_FILENAME_LENGTH = 100;
const FALLBACK_FILENAME = "untitled";

/**
 * Turn an arbitrary title into a portable file name.
 * Keeps letters, digits, `-`, `_` and `.`; whitespace and separators become `-`.
 */
export function sanitizeFilename(
  name: string,
  fallback: string = FALLBACK_FILENAME,
): string {
  let sanitized = name
    .replace(/[\s/\\:"']+/g, "-")
    .replace(/[?*]/g, "")
    .replace(/[^a-zA-Z0-9\-_.]+/g, "")
    .replace(/-{2,}/g, "-")
    .replace(/_{2,}/g, "_")
    .replace(/\.{2,}/g, ".")
    .replace(/^[-_.]+|[-_]+$/g, "");

  if (sanitized.length > MAX_FILENAME_LENGTH) {
    sanitized = sanitized.slice(0, MAX_FILENAME_LENGTH).replace(/[-_]+$/, "");
  }

  return sanitized || fallback;
}

/**
 * Raw artifact location, keyed only by content key so concurrent workers
 * never have to guess which file is theirs.
 */
export function getRawArtifactPath(
  contentKey: string,
  tempDir: string,
  format: string,
): string {
  if (!contentKey) {
    throw new Error("Content key cannot be empty");
  }
  return path.join(tempDir, `${contentKey}.${format}`);
}

/**
 * `<outputDir>/<sanitized title>.txt`. A title with nothing portable in it
 * (e.g. entirely non-Latin) is named after `fallbackName` instead, so two
 * such videos never share a transcript.
 */
export function getCleanedOutputPath(
  title: string,
  outputDir: string,
  fallbackName?: string,
): string {
  if (!title) {
    throw new Error("Title cannot be empty");
  }
  const fallback =
    fallbackName === undefined ? FALLBACK_FILENAME : sanitizeFilename(fallbackName);
  return path.join(outputDir, `${sanitizeFilename(title, fallback)}.txt`);
}

export function fileExists(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

export async function readTextFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, "utf8");
}

export async function writeTextFile(
  filePath: string,
  content: string,
): Promise<void> {
  await fs.promises.writeFile(filePath, content, "utf8");
}

/**
 * Recreate the scratch directory empty and make sure the output directory
 * exists. The output directory is never cleared: existing transcripts are
 * what lets a later run skip work.
 */
export function prepareDirectories(tempDir: string, outputDir: string): void {
  fs.rmSync(tempDir, { recursive: true, force: true });
  fs.mkdirSync(tempDir, { recursive: true });
  fs.mkdirSync(outputDir, { recursive: true });
}

export function removeDirectory(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
