import { useCallback, useReducer } from 'react';
import { initialStopwatchState, stopwatchReducer } from '../state/stopwatchReducer';
import { useInterval } from './useInterval';

/** Display refresh rate while running */
export const STOPWATCH_TICK_MS = 10;

/**
 * Stopwatch driven by one interval that only exists while running.
 *
 * @param now - clock source, injectable for tests
 */
export function useStopwatch(now: () => number = Date.now) {
  const [state, dispatch] = useReducer(stopwatchReducer, initialStopwatchState);

  useInterval(
    () => {
      dispatch({ type: "TICK", now: now() });
    },
    state.status === "running" ? STOPWATCH_TICK_MS : null
  );

  const start = useCallback(() => dispatch({ type: "START", now: now() }), [now]);
  const pause = useCallback(() => dispatch({ type: "PAUSE", now: now() }), [now]);
  const resume = useCallback(() => dispatch({ type: "RESUME", now: now() }), [now]);
  const reset = useCallback(() => dispatch({ type: "RESET" }), []);
  const lap = useCallback(() => dispatch({ type: "LAP", now: now() }), [now]);

  return { ...state, start, pause, resume, reset, lap };
}
