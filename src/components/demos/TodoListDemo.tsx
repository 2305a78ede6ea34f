import { useEffect, useReducer, useState } from 'react'
import type { FormEvent, KeyboardEvent } from 'react'
import { useLocalStorage } from '../../hooks/useLocalStorage.ts'
import { countActive, initialTodoState, isTodoState, selectVisibleTodos, todoReducer } from '../../state/todoReducer.ts'
import type { Todo, TodoAction, TodoFilter, TodoState } from '../../state/types.ts'
import { storageKey } from '../../config.ts'

const FILTERS: { id: TodoFilter; label: string }[] = [
  { id: 'all', label: 'All' },
  { id: 'active', label: 'Active' },
  { id: 'completed', label: 'Completed' },
]

let idSeq = 0

export function nextTodoId(): string {
  idSeq += 1
  return `todo-${Date.now().toString(36)}-${idSeq}`
}

// ── Row ──

type TodoRowProps = {
  todo: Todo
  dispatch: (action: TodoAction) => void
}

function TodoRow({ todo, dispatch }: TodoRowProps) {
  const [editing, setEditing] = useState(false)
  const [draft, setDraft] = useState(todo.text)

  function startEditing() {
    setDraft(todo.text)
    setEditing(true)
  }

  function commit() {
    dispatch({ type: 'EDIT', id: todo.id, text: draft })
    setEditing(false)
  }

  function handleKeyDown(e: KeyboardEvent<HTMLInputElement>) {
    if (e.key === 'Enter') commit()
    else if (e.key === 'Escape') setEditing(false)
  }

  return (
    <li className="flex items-center gap-3 px-3 py-2 group">
      <input
        type="checkbox"
        checked={todo.completed}
        onChange={() => dispatch({ type: 'TOGGLE', id: todo.id })}
        aria-label={`Mark "${todo.text}" ${todo.completed ? 'active' : 'complete'}`}
      />
      {editing ? (
        <input
          autoFocus
          value={draft}
          onChange={(e) => setDraft(e.target.value)}
          onKeyDown={handleKeyDown}
          onBlur={commit}
          aria-label={`Edit "${todo.text}"`}
          className="flex-1 px-2 py-1 rounded bg-slate-950 border border-slate-700 text-sm text-slate-200 outline-none"
        />
      ) : (
        <span
          onDoubleClick={startEditing}
          className={`flex-1 text-sm ${todo.completed ? 'line-through text-slate-500' : 'text-slate-200'}`}
        >
          {todo.text}
        </span>
      )}
      <button
        onClick={() => dispatch({ type: 'DELETE', id: todo.id })}
        aria-label={`Delete "${todo.text}"`}
        className="text-xs text-slate-600 hover:text-red-400 transition-colors"
      >
        ✕
      </button>
    </li>
  )
}

// ── TodoListDemo ──

type TodoListDemoProps = {
  createId?: () => string
  now?: () => number
}

export default function TodoListDemo({ createId = nextTodoId, now = Date.now }: TodoListDemoProps) {
  const [saved, setSaved] = useLocalStorage<TodoState>(storageKey('todos'), initialTodoState, isTodoState)
  const [state, dispatch] = useReducer(todoReducer, saved)
  const [text, setText] = useState('')

  useEffect(() => {
    setSaved(state)
  }, [state, setSaved])

  const visible = selectVisibleTodos(state)
  const active = countActive(state)
  const completed = state.todos.length - active

  function handleSubmit(e: FormEvent<HTMLFormElement>) {
    e.preventDefault()
    dispatch({ type: 'ADD', id: createId(), text, createdAt: now() })
    setText('')
  }

  return (
    <div className="rounded-lg border border-slate-800 bg-slate-950/60 overflow-hidden">
      <form onSubmit={handleSubmit} className="flex items-center gap-2 p-3 border-b border-slate-800">
        {state.todos.length > 0 && (
          <input
            type="checkbox"
            checked={active === 0}
            onChange={() => dispatch({ type: 'TOGGLE_ALL' })}
            aria-label="Toggle all"
          />
        )}
        <input
          value={text}
          onChange={(e) => setText(e.target.value)}
          placeholder="What needs to be done?"
          aria-label="New todo"
          className="flex-1 px-3 py-2 rounded-md bg-slate-950 border border-slate-700 text-sm text-slate-200 outline-none focus:border-indigo-500"
        />
        <button type="submit" className="px-3 py-2 rounded-md bg-indigo-600 hover:bg-indigo-500 text-white text-xs font-medium">
          Add
        </button>
      </form>

      <ul aria-label="Todos" className="divide-y divide-slate-800/60">
        {visible.map((todo) => (
          <TodoRow key={todo.id} todo={todo} dispatch={dispatch} />
        ))}
      </ul>

      {state.todos.length > 0 && (
        <div className="flex items-center justify-between gap-3 px-3 py-2 border-t border-slate-800 text-xs text-slate-500">
          <span>{active} {active === 1 ? 'item' : 'items'} left</span>
          <div className="flex gap-1">
            {FILTERS.map((f) => (
              <button
                key={f.id}
                onClick={() => dispatch({ type: 'SET_FILTER', filter: f.id })}
                aria-pressed={state.filter === f.id}
                className={`px-2 py-0.5 rounded ${state.filter === f.id ? 'bg-slate-800 text-slate-200' : 'hover:text-slate-300'}`}
              >
                {f.label}
              </button>
            ))}
          </div>
          <button
            onClick={() => dispatch({ type: 'CLEAR_COMPLETED' })}
            disabled={completed === 0}
            className="hover:text-slate-300 disabled:opacity-40"
          >
            Clear completed
          </button>
        </div>
      )}
    </div>
  )
}
