import { useState } from 'react'
import entries from '../../data/glossary.json'
import { filterItems } from '../../utils/search.ts'

type GlossaryEntry = {
  term: string
  definition: string
  name: string      // search key
}

const GLOSSARY: readonly GlossaryEntry[] = entries.map(e => ({ ...e, name: e.term }))

export default function Glossary() {
  const [query, setQuery] = useState('')
  const matches = filterItems(GLOSSARY, query)

  return (
    <div>
      <input
        value={query}
        onChange={(e) => setQuery(e.target.value)}
        aria-label="Filter glossary"
        placeholder="Filter terms…"
        className="w-full max-w-xs mb-4 px-3 py-1.5 rounded-md bg-slate-950 border border-slate-700 text-sm text-slate-200 outline-none"
      />
      <dl className="grid grid-cols-1 md:grid-cols-2 gap-3">
        {matches.map(e => (
          <div key={e.term} className="p-3 rounded-lg bg-slate-900/40 border border-slate-800/50">
            <dt className="text-sm font-medium text-slate-200">{e.term}</dt>
            <dd className="text-xs text-slate-400 mt-1">{e.definition}</dd>
          </div>
        ))}
      </dl>
      {matches.length === 0 && <p className="text-xs text-slate-500">No matching terms.</p>}
    </div>
  )
}
