import { describe, it, expect } from "vitest";
import { FetchError } from "../../../src/errors.js";
import {
  createCoordinatorState,
  isTerminalPhase,
  reduceCoordinator,
  type CoordinatorState,
} from "../../../src/workers/state.js";
import type { JobResult } from "../../../src/workers/types.js";

const IDS = ["https://youtu.be/a1", "https://youtu.be/b2"];

function completed(index: number, title = `Title ${index}`): JobResult {
  return {
    index,
    job: {
      identifier: IDS[index] ?? "unknown",
      title,
      status: "completed",
      outputPath: `cleaned/${title}.txt`,
    },
    error: null,
  };
}

function failed(index: number): JobResult {
  const error = new FetchError("tool-failed", "download failed");
  return {
    index,
    job: { identifier: IDS[index] ?? "unknown", title: "", status: "failed", error },
    error,
  };
}

function running(): CoordinatorState {
  return reduceCoordinator(createCoordinatorState(IDS, 2), { type: "start" }).state;
}

describe("coordinator state", () => {
  describe("createCoordinatorState", () => {
    it("should start idle with every job pending", () => {
      const state = createCoordinatorState(IDS, 3);

      expect(state).toEqual({
        jobs: [
          { identifier: IDS[0], title: "", status: "pending" },
          { identifier: IDS[1], title: "", status: "pending" },
        ],
        completedCount: 0,
        total: 2,
        workerCount: 3,
        cancelRequested: false,
        phase: "idle",
      });
    });

    it("should clamp the worker count to at least one", () => {
      expect(createCoordinatorState(IDS, 0).workerCount).toBe(1);
      expect(createCoordinatorState(IDS, -4).workerCount).toBe(1);
      expect(createCoordinatorState(IDS, Number.NaN).workerCount).toBe(1);
      expect(createCoordinatorState(IDS, Number.POSITIVE_INFINITY).workerCount).toBe(1);
      expect(createCoordinatorState(IDS, 2.7).workerCount).toBe(2);
    });
  });

  describe("start", () => {
    it("should launch workers and wait for the first result", () => {
      const { state, effects } = reduceCoordinator(createCoordinatorState(IDS, 2), {
        type: "start",
      });

      expect(state.phase).toBe("running");
      expect(effects).toEqual([{ type: "launch-workers" }, { type: "await-result" }]);
    });

    it("should finish at once for an empty run", () => {
      const { state, effects } = reduceCoordinator(createCoordinatorState([], 4), {
        type: "start",
      });

      expect(state.phase).toBe("completed");
      expect(effects).toEqual([{ type: "finish" }]);
    });

    it("should ignore a second start", () => {
      const state = running();

      const transition = reduceCoordinator(state, { type: "start" });

      expect(transition.state).toBe(state);
      expect(transition.effects).toEqual([]);
    });
  });

  describe("result", () => {
    it("should fold a result into its slot and keep waiting", () => {
      const { state, effects } = reduceCoordinator(running(), {
        type: "result",
        result: completed(1),
      });

      expect(state.completedCount).toBe(1);
      expect(state.jobs[1]).toEqual(completed(1).job);
      expect(state.jobs[0]).toEqual({ identifier: IDS[0], title: "", status: "pending" });
      expect(effects).toEqual([{ type: "await-result" }]);
    });

    it("should not mutate the previous state", () => {
      const before = running();

      reduceCoordinator(before, { type: "result", result: completed(0) });

      expect(before.completedCount).toBe(0);
      expect(before.jobs[0]?.status).toBe("pending");
    });

    it("should complete once every job has reported", () => {
      let state = running();
      state = reduceCoordinator(state, { type: "result", result: failed(0) }).state;
      const last = reduceCoordinator(state, { type: "result", result: completed(1) });

      expect(last.state.phase).toBe("completed");
      expect(last.state.completedCount).toBe(2);
      expect(last.state.jobs.map((job) => job.status)).toEqual(["failed", "completed"]);
      expect(last.effects).toEqual([{ type: "finish" }]);
    });

    it("should ignore results with an out-of-range index", () => {
      const state = running();

      const transition = reduceCoordinator(state, { type: "result", result: completed(5) });

      expect(transition.state).toBe(state);
      expect(transition.effects).toEqual([]);
    });

    it("should ignore results before start", () => {
      const state = createCoordinatorState(IDS, 1);

      expect(reduceCoordinator(state, { type: "result", result: completed(0) }).state).toBe(
        state,
      );
    });
  });

  describe("cancel", () => {
    it("should stop a running coordinator", () => {
      const { state, effects } = reduceCoordinator(running(), { type: "cancel" });

      expect(state.phase).toBe("cancelled");
      expect(state.cancelRequested).toBe(true);
      expect(effects).toEqual([{ type: "finish" }]);
    });

    it("should drop results that arrive after a cancel", () => {
      const cancelled = reduceCoordinator(running(), { type: "cancel" }).state;

      const transition = reduceCoordinator(cancelled, { type: "result", result: completed(0) });

      expect(transition.state).toBe(cancelled);
      expect(transition.state.completedCount).toBe(0);
    });

    it("should have no effect once completed", () => {
      const done = reduceCoordinator(createCoordinatorState([], 1), { type: "start" }).state;

      const transition = reduceCoordinator(done, { type: "cancel" });

      expect(transition.state.cancelRequested).toBe(false);
      expect(transition.state.phase).toBe("completed");
    });
  });

  describe("tick", () => {
    it("should request a render without changing state", () => {
      const state = running();

      const transition = reduceCoordinator(state, { type: "tick" });

      expect(transition.state).toBe(state);
      expect(transition.effects).toEqual([{ type: "render" }]);
    });
  });

  it("should treat completed and cancelled as terminal", () => {
    expect(isTerminalPhase("completed")).toBe(true);
    expect(isTerminalPhase("cancelled")).toBe(true);
    expect(isTerminalPhase("running")).toBe(false);
    expect(isTerminalPhase("idle")).toBe(false);
  });
});
