import { useMemo, useState } from 'react'
import frameworks from '../../data/frameworks.json'
import { useDebounce } from '../../hooks/useDebounce.ts'
import { filterItems } from '../../utils/search.ts'
import { highlightMatch } from '../../utils/highlight.ts'
import { pluralizeResults } from '../../utils/formatters.ts'
import { config } from '../../config.ts'

export type SearchItem = {
  id: string
  name: string
  category: string
}

type SearchBarDemoProps = {
  items?: readonly SearchItem[]
  debounceMs?: number
}

function Highlighted({ text, query }: { text: string; query: string }) {
  return (
    <>
      {highlightMatch(text, query).map((seg, i) =>
        seg.match
          ? <mark key={i} className="bg-yellow-400/30 text-yellow-200 rounded-sm">{seg.text}</mark>
          : <span key={i}>{seg.text}</span>,
      )}
    </>
  )
}

export default function SearchBarDemo({ items = frameworks, debounceMs = config.searchDebounceMs }: SearchBarDemoProps) {
  const [query, setQuery] = useState('')
  const debouncedQuery = useDebounce(query, debounceMs)
  const results = useMemo(() => filterItems(items, debouncedQuery), [items, debouncedQuery])
  const pending = query !== debouncedQuery

  return (
    <div className="space-y-3">
      <div className="flex items-center gap-2">
        <input
          type="search"
          value={query}
          onChange={(e) => setQuery(e.target.value)}
          placeholder="Search frameworks…"
          aria-label="Search frameworks"
          className="flex-1 px-3 py-2 rounded-md bg-slate-950 border border-slate-700 text-sm text-slate-200 outline-none focus:border-indigo-500"
        />
        {query && (
          <button
            onClick={() => setQuery('')}
            aria-label="Clear search"
            className="px-2 py-2 text-xs text-slate-400 hover:text-slate-200"
          >
            ✕
          </button>
        )}
      </div>

      <p aria-live="polite" className="text-xs text-slate-500">
        {pending ? 'Searching…' : pluralizeResults(results.length)}
      </p>

      <ul aria-label="Results" className="grid grid-cols-1 sm:grid-cols-2 gap-2">
        {results.map((item) => (
          <li key={item.id} className="px-3 py-2 rounded-md bg-slate-900/60 border border-slate-800">
            <p className="text-sm text-slate-200"><Highlighted text={item.name} query={debouncedQuery} /></p>
            <p className="text-[11px] text-slate-500">{item.category}</p>
          </li>
        ))}
      </ul>
    </div>
  )
}
