import { describe, it, expect } from "vitest";
import { ConfigError, loadRunConfig } from "../../src/config.js";

function issuesOf(action: () => unknown): string[] {
  try {
    action();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe("loadRunConfig", () => {
  it("should fill every default", () => {
    expect(loadRunConfig({}, {})).toEqual({
      outputDir: "cleaned",
      tempDir: "tmp",
      workers: 1,
      language: "en",
      format: "vtt",
      ytDlpPath: "yt-dlp",
      keepTemp: false,
      verbose: false,
    });
  });

  it("should coerce numeric options given as strings", () => {
    const config = loadRunConfig({ workers: "4", stageTimeoutMs: "5000" }, {});

    expect(config.workers).toBe(4);
    expect(config.stageTimeoutMs).toBe(5000);
  });

  it("should reject worker counts outside 1..16", () => {
    expect(issuesOf(() => loadRunConfig({ workers: "0" }, {}))).toEqual([
      "workers: workers must be at least 1",
    ]);
    expect(issuesOf(() => loadRunConfig({ workers: 17 }, {}))).toEqual([
      "workers: workers must be at most 16",
    ]);
    expect(issuesOf(() => loadRunConfig({ workers: "2.5" }, {}))).toEqual([
      "workers: workers must be a whole number",
    ]);
  });

  it("should reject a non-positive stage timeout", () => {
    const issues = issuesOf(() => loadRunConfig({ stageTimeoutMs: "0" }, {}));

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^stageTimeoutMs: /);
  });

  it("should reject malformed language codes", () => {
    expect(issuesOf(() => loadRunConfig({ language: "12" }, {}))).toEqual([
      "language: language must be a subtitle language code",
    ]);
    expect(loadRunConfig({ language: "en-US" }, {}).language).toBe("en-US");
  });

  it("should report every issue in the error message", () => {
    expect(() => loadRunConfig({ workers: "0", language: "12" }, {})).toThrow(
      "Invalid configuration: workers: workers must be at least 1; language: language must be a subtitle language code",
    );
  });

  it("should take the yt-dlp binary from the environment", () => {
    expect(loadRunConfig({}, { SUBGRAB_YT_DLP: "/opt/bin/yt-dlp" }).ytDlpPath).toBe(
      "/opt/bin/yt-dlp",
    );
  });

  it("should prefer an explicit yt-dlp path over the environment", () => {
    const config = loadRunConfig(
      { ytDlpPath: "./yt-dlp" },
      { SUBGRAB_YT_DLP: "/opt/bin/yt-dlp" },
    );

    expect(config.ytDlpPath).toBe("./yt-dlp");
  });

  it("should ignore an empty environment override", () => {
    expect(loadRunConfig({}, { SUBGRAB_YT_DLP: "" }).ytDlpPath).toBe("yt-dlp");
  });
});
