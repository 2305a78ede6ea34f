/**
 * Stopwatch reducer
 *
 * Elapsed time is derived from timestamps carried on each action, not from
 * counting ticks, so a late or skipped interval never changes the reading.
 *
 * State Transition Rules:
 * - idle → running: START
 * - running → paused: PAUSE
 * - paused → running: RESUME
 * - paused → idle: RESET (ignored while running)
 * - LAP records a split only while running
 * - TICK refreshes elapsedMs only while running
 */

import type { StopwatchAction, StopwatchState } from './types';

export const initialStopwatchState: StopwatchState = {
  status: "idle",
  accumulatedMs: 0,
  startedAt: null,
  elapsedMs: 0,
  laps: [],
};

function runningElapsed(state: StopwatchState, now: number): number {
  if (state.startedAt === null) return state.accumulatedMs;
  return state.accumulatedMs + Math.max(0, now - state.startedAt);
}

export function stopwatchReducer(state: StopwatchState, action: StopwatchAction): StopwatchState {
  switch (action.type) {
    case "START":
      if (state.status !== "idle") return state;
      return { ...initialStopwatchState, status: "running", startedAt: action.now };

    case "PAUSE": {
      if (state.status !== "running") return state;
      const elapsed = runningElapsed(state, action.now);
      return {
        ...state,
        status: "paused",
        accumulatedMs: elapsed,
        elapsedMs: elapsed,
        startedAt: null,
      };
    }

    case "RESUME":
      if (state.status !== "paused") return state;
      return { ...state, status: "running", startedAt: action.now };

    case "RESET":
      if (state.status === "running") return state;
      return initialStopwatchState;

    case "LAP": {
      if (state.status !== "running") return state;
      const elapsed = runningElapsed(state, action.now);
      return { ...state, elapsedMs: elapsed, laps: [...state.laps, elapsed] };
    }

    case "TICK":
      if (state.status !== "running") return state;
      return { ...state, elapsedMs: runningElapsed(state, action.now) };

    default:
      return state;
  }
}

/**
 * Duration of each lap (difference between consecutive splits)
 */
export function lapDurations(laps: number[]): number[] {
  return laps.map((split, i) => split - (i === 0 ? 0 : laps[i - 1]));
}
