/**
 * Job-level error taxonomy.
 *
 * Every failure inside a job's pipeline is captured as one of these and stored
 * on the job record; none of them ever aborts the coordinator or another job.
 */

export type JobErrorKind = "resolution" | "identifier" | "fetch" | "normalize";

export class JobError extends Error {
  readonly kind: JobErrorKind;

  constructor(kind: JobErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "JobError";
    this.kind = kind;
  }
}

/** Title lookup failed. */
export class ResolutionError extends JobError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("resolution", message, options);
    this.name = "ResolutionError";
  }
}

/** The content key could not be derived from the identifier. */
export class IdentifierParseError extends JobError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("identifier", message, options);
    this.name = "IdentifierParseError";
  }
}

/**
 * "tool-failed" - the downloader exited non-zero or could not be spawned
 * "no-content"  - the downloader succeeded but left no subtitle file behind
 * "timeout"     - the downloader was killed after the configured stage timeout
 */
export type FetchFailureReason = "tool-failed" | "no-content" | "timeout";

export class FetchError extends JobError {
  readonly reason: FetchFailureReason;

  constructor(
    reason: FetchFailureReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("fetch", message, options);
    this.name = "FetchError";
    this.reason = reason;
  }
}

export class NormalizeError extends JobError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("normalize", message, options);
    this.name = "NormalizeError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "Unknown error";
}

/**
 * Wrap anything thrown by a stage into a JobError of the given kind.
 * JobErrors pass through untouched.
 */
export function toJobError(
  kind: JobErrorKind,
  error: unknown,
  context: string,
): JobError {
  if (error instanceof JobError) {
    return error;
  }

  const message = `${context}: ${errorMessage(error)}`;
  switch (kind) {
    case "resolution":
      return new ResolutionError(message, { cause: error });
    case "identifier":
      return new IdentifierParseError(message, { cause: error });
    case "fetch":
      return new FetchError("tool-failed", message, { cause: error });
    case "normalize":
      return new NormalizeError(message, { cause: error });
  }
}
