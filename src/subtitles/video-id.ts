import { IdentifierParseError } from "../errors.js";

const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]+$/;
const PATH_PREFIXES = ["embed", "shorts", "live", "v"];

/**
 * Extract the video id from a watch, short-link, embed, shorts or live URL.
 * The id doubles as the content key naming the raw subtitle file.
 */
export function extractVideoId(identifier: string): string {
  const trimmed = identifier.trim();
  if (!trimmed) {
    throw new IdentifierParseError("URL cannot be empty");
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch (error) {
    throw new IdentifierParseError(`Not a valid URL: ${identifier}`, {
      cause: error,
    });
  }

  const host = url.hostname.toLowerCase().replace(/^(www\.|m\.)/, "");
  const segments = url.pathname.split("/").filter(Boolean);
  let candidate: string | undefined;

  if (host === "youtu.be") {
    candidate = segments[0];
  } else if (url.searchParams.has("v")) {
    candidate = url.searchParams.get("v") ?? undefined;
  } else {
    const prefixIndex = segments.findIndex((segment) =>
      PATH_PREFIXES.includes(segment),
    );
    if (prefixIndex !== -1) {
      candidate = segments[prefixIndex + 1];
    }
  }

  if (!candidate) {
    throw new IdentifierParseError(`Not a recognized video URL: ${identifier}`);
  }
  if (!VIDEO_ID_PATTERN.test(candidate)) {
    throw new IdentifierParseError(
      `Video id "${candidate}" in ${identifier} contains unsupported characters`,
    );
  }

  return candidate;
}
