/**
 * Type definitions for the reducer-driven demos
 *
 * Each demo owns a state shape and a discriminated union of actions.
 */

// ===== Todo list =====

export interface Todo {
  id: string;
  text: string;
  completed: boolean;
  /** Unix timestamp in milliseconds */
  createdAt: number;
}

export type TodoFilter = "all" | "active" | "completed";

export interface TodoState {
  todos: Todo[];
  filter: TodoFilter;
}

export type TodoAction =
  | { type: "ADD"; id: string; text: string; createdAt: number }
  | { type: "TOGGLE"; id: string }
  | { type: "EDIT"; id: string; text: string }
  | { type: "DELETE"; id: string }
  | { type: "CLEAR_COMPLETED" }
  | { type: "TOGGLE_ALL" }
  | { type: "SET_FILTER"; filter: TodoFilter };

// ===== Stopwatch =====

/**
 * Stopwatch status
 * - idle: never started, or reset
 * - running: counting
 * - paused: stopped with a reading on the display
 */
export type StopwatchStatus = "idle" | "running" | "paused";

export interface StopwatchState {
  status: StopwatchStatus;
  /** Time accumulated in earlier running periods */
  accumulatedMs: number;
  /** When the current running period began; null unless running */
  startedAt: number | null;
  /** Reading shown on the display, refreshed by TICK */
  elapsedMs: number;
  /** Lap split times, newest last */
  laps: number[];
}

export type StopwatchAction =
  | { type: "START"; now: number }
  | { type: "PAUSE"; now: number }
  | { type: "RESUME"; now: number }
  | { type: "RESET" }
  | { type: "LAP"; now: number }
  | { type: "TICK"; now: number };

// ===== Real-time ticker =====

export interface TickerQuote {
  price: number;
  /** Price before the latest update; null for the first quote */
  previous: number | null;
  updatedAt: number;
}

export interface TickerState {
  quotes: Record<string, TickerQuote>;
  /** Most recent messages, newest first */
  log: TickerLogEntry[];
  received: number;
}

export interface TickerLogEntry {
  seq: number;
  symbol: string;
  price: number;
  timestamp: number;
}

export type TickerAction =
  | { type: "MESSAGE"; symbol: string; price: number; timestamp: number }
  | { type: "CLEAR" };
