import type { Job, JobResult } from "./types.js";

export type CoordinatorPhase = "idle" | "running" | "completed" | "cancelled";

export interface CoordinatorState {
  readonly jobs: readonly Job[];
  readonly completedCount: number;
  readonly total: number;
  readonly workerCount: number;
  readonly cancelRequested: boolean;
  readonly phase: CoordinatorPhase;
}

export interface StartSignal {
  type: "start";
}

export interface JobResultEvent {
  type: "result";
  result: JobResult;
}

export interface CancelSignal {
  type: "cancel";
}

export interface FrameTick {
  type: "tick";
}

export type CoordinatorEvent =
  | StartSignal
  | JobResultEvent
  | CancelSignal
  | FrameTick;

/**
 * What the coordinator must do after a transition.
 */
export type CoordinatorEffect =
  | { type: "launch-workers" }
  | { type: "await-result" }
  | { type: "render" }
  | { type: "finish" };

export interface Transition {
  state: CoordinatorState;
  effects: CoordinatorEffect[];
}

/** Whole number of workers, at least 1. NaN and infinities become 1. */
export function clampWorkerCount(workerCount: number): number {
  if (!Number.isFinite(workerCount)) {
    return 1;
  }
  return Math.max(1, Math.floor(workerCount));
}

export function createCoordinatorState(
  identifiers: readonly string[],
  workerCount: number,
): CoordinatorState {
  return {
    jobs: identifiers.map((identifier): Job => ({
      identifier,
      title: "",
      status: "pending",
    })),
    completedCount: 0,
    total: identifiers.length,
    workerCount: clampWorkerCount(workerCount),
    cancelRequested: false,
    phase: "idle",
  };
}

function unchanged(state: CoordinatorState): Transition {
  return { state, effects: [] };
}

function foldResult(state: CoordinatorState, result: JobResult): Transition {
  if (
    !Number.isInteger(result.index) ||
    result.index < 0 ||
    result.index >= state.total
  ) {
    return unchanged(state);
  }

  const jobs = state.jobs.slice();
  jobs[result.index] = result.job;
  const completedCount = state.completedCount + 1;

  if (completedCount >= state.total) {
    return {
      state: { ...state, jobs, completedCount, phase: "completed" },
      effects: [{ type: "finish" }],
    };
  }

  return {
    state: { ...state, jobs, completedCount },
    effects: [{ type: "await-result" }],
  };
}

/**
 * Coordinator transition function: idle → running → completed | cancelled.
 * Pure; the Coordinator class carries out the returned effects.
 */
export function reduceCoordinator(
  state: CoordinatorState,
  event: CoordinatorEvent,
): Transition {
  switch (event.type) {
    case "start":
      if (state.phase !== "idle") {
        return unchanged(state);
      }
      if (state.total === 0) {
        return {
          state: { ...state, phase: "completed" },
          effects: [{ type: "finish" }],
        };
      }
      return {
        state: { ...state, phase: "running" },
        effects: [{ type: "launch-workers" }, { type: "await-result" }],
      };

    case "result":
      if (state.phase !== "running") {
        return unchanged(state);
      }
      return foldResult(state, event.result);

    case "cancel":
      if (state.phase !== "running") {
        return unchanged(state);
      }
      return {
        state: { ...state, cancelRequested: true, phase: "cancelled" },
        effects: [{ type: "finish" }],
      };

    case "tick":
      return { state, effects: [{ type: "render" }] };
  }
}

export function isTerminalPhase(phase: CoordinatorPhase): boolean {
  return phase === "completed" || phase === "cancelled";
}
