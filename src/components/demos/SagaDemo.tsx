import { useEffect, useRef, useState } from 'react'
import { Provider } from 'react-redux'
import { createAppStore, useAppDispatch, useAppSelector } from '../../saga/store.ts'
import type { AppStoreHandle } from '../../saga/store.ts'
import { fetchUsersRequested } from '../../saga/usersSlice.ts'
import { increment, incrementAsync } from '../../saga/counterSlice.ts'
import { createUsersApi } from '../../services/usersApi.ts'
import type { UsersApi } from '../../services/usersApi.ts'
import DemoSection from '../shared/DemoSection.tsx'

function UserSearch({ failing, onFailingChange }: { failing: boolean; onFailingChange: (value: boolean) => void }) {
  const dispatch = useAppDispatch()
  const { users, loading, error, requestCount, lastQuery } = useAppSelector(state => state.users)
  const [query, setQuery] = useState('')

  // Fire the first search once the saga is listening
  useEffect(() => {
    dispatch(fetchUsersRequested(''))
  }, [dispatch])

  return (
    <DemoSection id="takelatest-user-search" title="takeLatest: user search" description="Every keystroke dispatches a request; only the newest one is allowed to finish.">
      <div className="flex items-center gap-3 mb-2">
        <input
          value={query}
          onChange={(e) => {
            setQuery(e.target.value)
            dispatch(fetchUsersRequested(e.target.value))
          }}
          aria-label="Search users"
          placeholder="Search users…"
          className="flex-1 px-3 py-2 rounded-md bg-slate-950 border border-slate-700 text-sm text-slate-200 outline-none"
        />
        <label className="flex items-center gap-1.5 text-xs text-slate-400">
          <input type="checkbox" checked={failing} onChange={(e) => onFailingChange(e.target.checked)} />
          Simulate API failure
        </label>
      </div>
      <p className="text-[11px] text-slate-500 mb-2">
        {requestCount} requested · showing results for “{lastQuery}”{loading ? ' · loading…' : ''}
      </p>
      {error && <p role="alert" className="text-xs text-red-400 mb-2">{error}</p>}
      <ul aria-label="Users" className="space-y-1">
        {users.map(u => (
          <li key={u.id} className="text-sm text-slate-300">{u.name} <span className="text-slate-500 text-xs">{u.email}</span></li>
        ))}
      </ul>
    </DemoSection>
  )
}

function AsyncCounter() {
  const dispatch = useAppDispatch()
  const { value, pending } = useAppSelector(state => state.counter)

  return (
    <DemoSection id="takeevery-delayed-increments" title="takeEvery: delayed increments" description="Click fast: every click is kept and lands a second later.">
      <div className="flex items-center gap-3">
        <span className="text-2xl font-mono text-slate-100" data-testid="counter-value">{value}</span>
        <button onClick={() => dispatch(increment())} className="px-3 py-1 rounded bg-slate-800 text-xs text-slate-200">+1 now</button>
        <button onClick={() => dispatch(incrementAsync())} className="px-3 py-1 rounded bg-indigo-600 text-xs text-white">+1 after 1s</button>
        {pending > 0 && <span className="text-xs text-slate-500">{pending} pending</span>}
      </div>
    </DemoSection>
  )
}

type SagaDemoProps = {
  api?: UsersApi
  incrementDelayMs?: number
}

export default function SagaDemo({ api, incrementDelayMs }: SagaDemoProps) {
  const [failing, setFailing] = useState(false)
  const failingRef = useRef(failing)
  useEffect(() => {
    failingRef.current = failing
  }, [failing])

  // Store and root saga live and die together, so a remount gets a fresh pair
  const [app, setApp] = useState<AppStoreHandle | null>(null)

  useEffect(() => {
    const next = createAppStore(
      api ?? createUsersApi({ latencyMs: 600, shouldFail: () => failingRef.current }),
      { incrementDelayMs },
    )
    setApp(next)
    return () => next.task.cancel()
  }, [api, incrementDelayMs])

  if (!app) return null

  return (
    <Provider store={app.store}>
      <div className="space-y-8">
        <UserSearch failing={failing} onFailingChange={setFailing} />
        <AsyncCounter />
      </div>
    </Provider>
  )
}
