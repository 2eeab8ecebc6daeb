export const DEFAULT_OUTPUT_DIR = "cleaned";
export const DEFAULT_TEMP_DIR = "tmp";
export const DEFAULT_LANGUAGE = "en";
export const DEFAULT_SUBTITLE_FORMAT = "vtt";
export const DEFAULT_YT_DLP_BINARY = "yt-dlp";
export const DEFAULT_WORKERS = 1;
export const MAX_WORKERS = 16;

/** Redraw interval for the progress bar, in milliseconds */
export const PROGRESS_REFRESH_MS = 200;

export const YT_DLP_ENV_VAR = "SUBGRAB_YT_DLP";
