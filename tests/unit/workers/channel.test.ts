import { describe, it, expect } from "vitest";
import { Channel, createJobQueue } from "../../../src/workers/channel.js";

describe("Channel", () => {
  it("should deliver buffered values in send order", async () => {
    const channel = new Channel<number>();
    channel.send(1);
    channel.send(2);

    expect(channel.size).toBe(2);
    expect(await channel.receive()).toBe(1);
    expect(await channel.receive()).toBe(2);
    expect(channel.size).toBe(0);
  });

  it("should hand a value straight to a waiting receiver", async () => {
    const channel = new Channel<string>();
    const pending = channel.receive();

    channel.send("a");

    expect(await pending).toBe("a");
    expect(channel.size).toBe(0);
  });

  it("should give each value to exactly one receiver", async () => {
    const channel = new Channel<number>();
    const first = channel.receive();
    const second = channel.receive();

    channel.send(10);
    channel.send(20);

    expect(await Promise.all([first, second])).toEqual([10, 20]);
  });

  it("should drain buffered values after close, then yield undefined", async () => {
    const channel = new Channel<number>();
    channel.send(7);
    channel.close();

    expect(channel.isClosed()).toBe(true);
    expect(await channel.receive()).toBe(7);
    expect(await channel.receive()).toBeUndefined();
  });

  it("should release waiting receivers on close", async () => {
    const channel = new Channel<number>();
    const pending = channel.receive();

    channel.close();

    expect(await pending).toBeUndefined();
  });

  it("should refuse sends after close", () => {
    const channel = new Channel<number>();
    channel.close();
    channel.close();

    expect(() => channel.send(1)).toThrow("Cannot send on a closed channel");
  });

  it("should iterate until closed", async () => {
    const channel = new Channel<number>();
    channel.send(1);
    channel.send(2);
    setTimeout(() => {
      channel.send(3);
      channel.close();
    }, 0);

    const seen: number[] = [];
    for await (const value of channel) {
      seen.push(value);
    }

    expect(seen).toEqual([1, 2, 3]);
  });
});

describe("createJobQueue", () => {
  it("should contain every index once and be closed", async () => {
    const queue = createJobQueue(3);

    expect(queue.isClosed()).toBe(true);
    const seen: number[] = [];
    for await (const index of queue) {
      seen.push(index);
    }
    expect(seen).toEqual([0, 1, 2]);
  });

  it("should be empty and closed for zero jobs", async () => {
    const queue = createJobQueue(0);

    expect(await queue.receive()).toBeUndefined();
  });
});
