import { useId, useRef, useState } from 'react'
import countries from '../../data/countries.json'
import { useAutocomplete } from '../../hooks/useAutocomplete.ts'
import { useOnClickOutside } from '../../hooks/useOnClickOutside.ts'
import { createSuggestionSource } from '../../services/suggestions.ts'
import type { SearchFn } from '../../services/suggestions.ts'
import { highlightMatch } from '../../utils/highlight.ts'
import { config } from '../../config.ts'

const countrySearch = createSuggestionSource(countries, 250)

type AutocompleteProps = {
  search: SearchFn
  label: string
  debounceMs?: number
  onSelect?: (value: string) => void
}

export function Autocomplete({ search, label, debounceMs = config.searchDebounceMs, onSelect }: AutocompleteProps) {
  const listId = useId()
  const container = useRef<HTMLDivElement>(null)
  const ac = useAutocomplete(search, { debounceMs, onSelect })

  useOnClickOutside(container, ac.close)

  const expanded = ac.open && ac.suggestions.length > 0
  const optionId = (i: number) => `${listId}-option-${i}`

  return (
    <div ref={container} className="relative">
      <input
        role="combobox"
        aria-label={label}
        aria-expanded={expanded}
        aria-controls={listId}
        aria-autocomplete="list"
        aria-activedescendant={expanded && ac.highlighted >= 0 ? optionId(ac.highlighted) : undefined}
        value={ac.query}
        onChange={(e) => ac.setQuery(e.target.value)}
        onKeyDown={ac.onKeyDown}
        placeholder="Start typing…"
        className="w-full px-3 py-2 rounded-md bg-slate-950 border border-slate-700 text-sm text-slate-200 outline-none focus:border-indigo-500"
      />
      {ac.loading && <span role="status" className="absolute right-3 top-2.5 text-[10px] text-slate-500">Loading…</span>}
      {ac.error && <p role="alert" className="mt-1 text-xs text-red-400">{ac.error}</p>}

      {expanded && (
        <ul
          id={listId}
          role="listbox"
          aria-label={`${label} suggestions`}
          className="absolute z-10 mt-1 w-full rounded-md bg-slate-900 border border-slate-700 shadow-lg overflow-hidden"
        >
          {ac.suggestions.map((s, i) => (
            <li
              key={s}
              id={optionId(i)}
              role="option"
              aria-selected={i === ac.highlighted}
              onMouseDown={(e) => {
                // keep focus in the input
                e.preventDefault()
                ac.select(s)
              }}
              onMouseEnter={() => ac.setHighlighted(i)}
              className={`px-3 py-1.5 text-sm cursor-pointer ${i === ac.highlighted ? 'bg-indigo-500/20 text-slate-100' : 'text-slate-300'}`}
            >
              {highlightMatch(s, ac.query).map((seg, si) =>
                seg.match ? <strong key={si}>{seg.text}</strong> : <span key={si}>{seg.text}</span>,
              )}
            </li>
          ))}
        </ul>
      )}
    </div>
  )
}

export default function AutocompleteDemo({ search = countrySearch }: { search?: SearchFn }) {
  const [selected, setSelected] = useState<string | null>(null)

  return (
    <div className="space-y-3 max-w-md">
      <Autocomplete search={search} label="Country" onSelect={setSelected} />
      <p className="text-xs text-slate-500">
        Selected: <span className="text-slate-300">{selected ?? 'nothing yet'}</span>
      </p>
    </div>
  )
}
