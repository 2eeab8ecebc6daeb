import { z } from "zod";
import {
  DEFAULT_LANGUAGE,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_SUBTITLE_FORMAT,
  DEFAULT_TEMP_DIR,
  DEFAULT_WORKERS,
  DEFAULT_YT_DLP_BINARY,
  MAX_WORKERS,
  YT_DLP_ENV_VAR,
} from "./types/constants.js";
import { SUBTITLE_FORMATS } from "./types/enums.js";

/**
 * Run configuration.
 *
 * Built once per invocation and passed explicitly into the coordinator and
 * the stage operations. Nothing reads directories or tool paths from globals.
 */
export const runConfigSchema = z.object({
  outputDir: z.string().trim().min(1).default(DEFAULT_OUTPUT_DIR),
  tempDir: z.string().trim().min(1).default(DEFAULT_TEMP_DIR),
  workers: z.coerce
    .number()
    .int("workers must be a whole number")
    .min(1, "workers must be at least 1")
    .max(MAX_WORKERS, `workers must be at most ${MAX_WORKERS}`)
    .default(DEFAULT_WORKERS),
  language: z
    .string()
    .regex(/^[A-Za-z][A-Za-z-]*$/, "language must be a subtitle language code")
    .default(DEFAULT_LANGUAGE),
  format: z.enum(SUBTITLE_FORMATS).default(DEFAULT_SUBTITLE_FORMAT),
  ytDlpPath: z.string().trim().min(1).default(DEFAULT_YT_DLP_BINARY),
  stageTimeoutMs: z.coerce.number().int().positive().optional(),
  keepTemp: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type RunConfig = z.infer<typeof runConfigSchema>;

/** Option values as they arrive from the command line or a caller */
export interface RunConfigInput {
  outputDir?: string;
  tempDir?: string;
  workers?: string | number;
  language?: string;
  format?: string;
  ytDlpPath?: string;
  stageTimeoutMs?: string | number;
  keepTemp?: boolean;
  verbose?: boolean;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Validate raw option values, filling defaults. The yt-dlp binary falls back
 * to the SUBGRAB_YT_DLP environment variable when not given explicitly.
 */
export function loadRunConfig(
  input: RunConfigInput,
  env: NodeJS.ProcessEnv = process.env,
): RunConfig {
  const envBinary = env[YT_DLP_ENV_VAR];
  const result = runConfigSchema.safeParse({
    ...input,
    ytDlpPath: input.ytDlpPath ?? (envBinary || undefined),
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      ),
    );
  }

  return result.data;
}
