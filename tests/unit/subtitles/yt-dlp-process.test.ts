import { describe, it, expect, vi, beforeEach } from "vitest";
import { EventEmitter, once } from "events";
import { PassThrough } from "stream";
import { fetchTitle } from "../../../src/subtitles/yt-dlp.js";

const spawnMock = vi.hoisted(() => vi.fn());

vi.mock("child_process", () => ({ spawn: spawnMock }));

class FakeChild extends EventEmitter {
  stdout = new PassThrough();
  stderr = new PassThrough();
  kill = vi.fn();
}

const options = { binary: "yt-dlp", language: "en", format: "vtt" };

describe("yt-dlp output decoding", () => {
  let child: FakeChild;

  beforeEach(() => {
    child = new FakeChild();
    spawnMock.mockReset();
    spawnMock.mockReturnValue(child);
  });

  it("should keep a multibyte title intact when it arrives split across chunks", async () => {
    const bytes = Buffer.from("日本語のタイトル\n", "utf8");

    const result = fetchTitle("https://youtu.be/abc123", options);
    // Split inside the first character's three-byte sequence
    child.stdout.write(bytes.subarray(0, 1));
    child.stdout.write(bytes.subarray(1));
    child.stdout.end();
    child.stderr.end();
    await once(child.stdout, "end");
    child.emit("close", 0, null);

    await expect(result).resolves.toBe("日本語のタイトル");
    expect(spawnMock).toHaveBeenCalledTimes(1);
  });
});
