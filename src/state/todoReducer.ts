/**
 * Todo list reducer
 *
 * Rules:
 * - ADD trims the text; blank text is ignored
 * - EDIT with blank text deletes the todo
 * - TOGGLE_ALL completes everything if anything is still active,
 *   otherwise marks everything active again
 */

import type { Todo, TodoAction, TodoState } from './types';

export const initialTodoState: TodoState = {
  todos: [],
  filter: "all",
};

function isTodo(value: unknown): value is Todo {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value && typeof value.id === "string" &&
    "text" in value && typeof value.text === "string" &&
    "completed" in value && typeof value.completed === "boolean" &&
    "createdAt" in value && typeof value.createdAt === "number"
  );
}

/**
 * Shape check for persisted todo state
 */
export function isTodoState(value: unknown): value is TodoState {
  return (
    typeof value === "object" &&
    value !== null &&
    "todos" in value && Array.isArray(value.todos) && value.todos.every(isTodo) &&
    "filter" in value && (value.filter === "all" || value.filter === "active" || value.filter === "completed")
  );
}

export function todoReducer(state: TodoState, action: TodoAction): TodoState {
  switch (action.type) {
    case "ADD": {
      const text = action.text.trim();
      if (!text) return state;
      const todo: Todo = { id: action.id, text, completed: false, createdAt: action.createdAt };
      return { ...state, todos: [...state.todos, todo] };
    }

    case "TOGGLE":
      return {
        ...state,
        todos: state.todos.map((t) =>
          t.id === action.id ? { ...t, completed: !t.completed } : t
        ),
      };

    case "EDIT": {
      const text = action.text.trim();
      if (!text) {
        return { ...state, todos: state.todos.filter((t) => t.id !== action.id) };
      }
      return {
        ...state,
        todos: state.todos.map((t) => (t.id === action.id ? { ...t, text } : t)),
      };
    }

    case "DELETE":
      return { ...state, todos: state.todos.filter((t) => t.id !== action.id) };

    case "CLEAR_COMPLETED":
      return { ...state, todos: state.todos.filter((t) => !t.completed) };

    case "TOGGLE_ALL": {
      const anyActive = state.todos.some((t) => !t.completed);
      return {
        ...state,
        todos: state.todos.map((t) => ({ ...t, completed: anyActive })),
      };
    }

    case "SET_FILTER":
      return { ...state, filter: action.filter };

    default:
      return state;
  }
}

/**
 * Todos that pass the current filter, in insertion order
 */
export function selectVisibleTodos(state: TodoState): Todo[] {
  switch (state.filter) {
    case "active":
      return state.todos.filter((t) => !t.completed);
    case "completed":
      return state.todos.filter((t) => t.completed);
    default:
      return state.todos;
  }
}

export function countActive(state: TodoState): number {
  return state.todos.filter((t) => !t.completed).length;
}
