import { useCallback, useState } from 'react'
import { useDebounce } from '../../hooks/useDebounce.ts'
import { useThrottle } from '../../hooks/useThrottle.ts'
import { usePrevious } from '../../hooks/usePrevious.ts'
import { useLocalStorage } from '../../hooks/useLocalStorage.ts'
import { useFetch } from '../../hooks/useFetch.ts'
import { createUsersApi, SAMPLE_USERS } from '../../services/usersApi.ts'
import type { UsersApi } from '../../services/usersApi.ts'
import DemoSection from '../shared/DemoSection.tsx'
import { storageKey } from '../../config.ts'

const defaultApi = createUsersApi({ latencyMs: 700 })

function Readout({ label, value }: { label: string; value: string }) {
  return (
    <div className="px-3 py-2 rounded-md bg-slate-900/60 border border-slate-800">
      <p className="text-[10px] text-slate-500 uppercase tracking-wider">{label}</p>
      <p className="text-sm text-slate-200 font-mono truncate" data-testid={`readout-${label}`}>{value || '∅'}</p>
    </div>
  )
}

function TimingHooks() {
  const [text, setText] = useState('')
  const debounced = useDebounce(text, 500)
  const throttled = useThrottle(text, 500)

  return (
    <DemoSection id="usedebounce-vs-usethrottle" title="useDebounce vs useThrottle" description="Type quickly and watch when each value catches up.">
      <input
        value={text}
        onChange={(e) => setText(e.target.value)}
        aria-label="Type here"
        className="w-full mb-2 px-3 py-2 rounded-md bg-slate-950 border border-slate-700 text-sm text-slate-200 outline-none"
      />
      <div className="grid grid-cols-3 gap-2">
        <Readout label="raw" value={text} />
        <Readout label="debounced" value={debounced} />
        <Readout label="throttled" value={throttled} />
      </div>
    </DemoSection>
  )
}

function PreviousValue() {
  const [count, setCount] = useState(0)
  const previous = usePrevious(count)

  return (
    <DemoSection id="useprevious" title="usePrevious">
      <div className="flex items-center gap-3">
        <button onClick={() => setCount(c => c + 1)} className="px-3 py-1 rounded bg-slate-800 text-xs text-slate-200">
          Increment
        </button>
        <span className="text-xs text-slate-400">
          now <strong className="text-slate-200">{count}</strong>, before <strong className="text-slate-200">{previous ?? '—'}</strong>
        </span>
      </div>
    </DemoSection>
  )
}

function Scratchpad() {
  const [note, setNote, clearNote] = useLocalStorage(storageKey('scratchpad'), '')

  return (
    <DemoSection id="uselocalstorage" title="useLocalStorage" description="Survives a page reload.">
      <div className="flex items-start gap-2">
        <textarea
          value={note}
          onChange={(e) => setNote(e.target.value)}
          aria-label="Scratchpad"
          className="flex-1 min-h-16 px-3 py-2 rounded-md bg-slate-950 border border-slate-700 text-sm text-slate-200 outline-none"
        />
        <button onClick={clearNote} className="px-3 py-1 rounded bg-slate-800 text-xs text-slate-200">Clear</button>
      </div>
    </DemoSection>
  )
}

function UserLookup({ api }: { api: UsersApi }) {
  const [userId, setUserId] = useState(SAMPLE_USERS[0]?.id ?? 1)
  const fetchUser = useCallback(
    async () => {
      const users = await api.fetchUsers('')
      const match = users.find(u => u.id === userId)
      if (!match) throw new Error(`No user with id ${userId}`)
      return match
    },
    [api, userId],
  )
  const { data, loading, error, reload } = useFetch(fetchUser, [fetchUser])

  return (
    <DemoSection id="usefetch" title="useFetch" description="Changing the id aborts the request in flight.">
      <div className="flex items-center gap-2 mb-2">
        <select
          value={userId}
          onChange={(e) => setUserId(Number(e.target.value))}
          aria-label="User id"
          className="px-2 py-1 rounded bg-slate-950 border border-slate-700 text-sm text-slate-200"
        >
          {SAMPLE_USERS.map(u => <option key={u.id} value={u.id}>#{u.id}</option>)}
          <option value={999}>#999 (missing)</option>
        </select>
        <button onClick={reload} className="px-3 py-1 rounded bg-slate-800 text-xs text-slate-200">Reload</button>
      </div>
      {loading && <p role="status" className="text-xs text-slate-400">Loading…</p>}
      {!loading && error && <p role="alert" className="text-xs text-red-400">{error}</p>}
      {!loading && data && (
        <p className="text-sm text-slate-200">{data.name} <span className="text-slate-500">{data.email}</span></p>
      )}
    </DemoSection>
  )
}

export default function CustomHooksDemo({ api = defaultApi }: { api?: UsersApi }) {
  return (
    <div className="space-y-8">
      <TimingHooks />
      <PreviousValue />
      <Scratchpad />
      <UserLookup api={api} />
    </div>
  )
}
