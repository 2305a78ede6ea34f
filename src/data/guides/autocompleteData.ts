import type { Guide } from './types'

export const autocompleteGuide: Guide = {
  id: 'guide-autocomplete',
  title: 'Autocomplete',
  subtitle: 'Debounce, cancel, cache, and never show a stale answer',
  color: 'violet',
  icon: '💡',
  sections: [
    {
      id: 'race',
      title: 'The Race Condition',
      content: [
        {
          type: 'text',
          body: 'Type "ca", then "can". Two requests are in flight. If the answer for "ca" arrives last, a naive component shows suggestions for the wrong query. Aborting the old request and checking that a response still belongs to the latest query closes that gap.',
        },
        {
          type: 'diagram',
          nodes: [
            { id: 'type', label: 'Keystroke', icon: '⌨️' },
            { id: 'debounce', label: 'Debounce', icon: '⏳' },
            { id: 'cache', label: 'Cache hit?', icon: '🗃️' },
            { id: 'fetch', label: 'search(q, signal)', icon: '📡' },
            { id: 'show', label: 'Show if latest', icon: '📋' },
          ],
          connections: [
            { from: 'type', to: 'debounce' },
            { from: 'debounce', to: 'cache' },
            { from: 'cache', to: 'fetch', label: 'miss' },
            { from: 'fetch', to: 'show' },
          ],
        },
        {
          type: 'code',
          language: 'typescript',
          code: `controllerRef.current?.abort()
const controller = new AbortController()
controllerRef.current = controller
latestKey.current = key

search(key, controller.signal).then(results => {
  cache.current.set(key, results)
  if (latestKey.current !== key) return   // superseded
  setSuggestions(results)
}, onError)`,
        },
        {
          type: 'concept-card',
          term: 'AbortController',
          explanation: 'Cancels the previous request so the network and the server stop working on an answer nobody wants.',
        },
        {
          type: 'concept-card',
          term: 'Cache',
          explanation: 'Answers are kept per normalised query, so backspacing to an earlier query shows results instantly.',
        },
      ],
    },
    {
      id: 'keyboard',
      title: 'Keyboard and ARIA',
      content: [
        {
          type: 'text',
          body: 'The input has role="combobox" and points at the listbox with aria-controls. The highlighted option is announced through aria-activedescendant, so focus never leaves the input while the arrow keys move through the list.',
        },
        {
          type: 'comparison',
          leftLabel: 'Key',
          rightLabel: 'Effect',
          rows: [
            { label: 'ArrowDown', left: 'Next option', right: 'Wraps from last to first' },
            { label: 'ArrowUp', left: 'Previous option', right: 'Wraps from first to last' },
            { label: 'Enter', left: 'Select', right: 'Fills the input and closes' },
            { label: 'Escape', left: 'Close', right: 'Keeps the typed text' },
          ],
        },
        {
          type: 'quiz',
          question: 'Why do the options select on mousedown instead of click?',
          options: [
            'mousedown fires before the input blurs, so the list is still there',
            'click does not fire on list items',
            'mousedown is faster to type-check',
          ],
          correctIndex: 0,
          explanation: 'Clicking an option blurs the input first. If blur closes the list, the click lands on nothing. mousedown runs before blur.',
        },
      ],
    },
  ],
  connections: [
    { concept: 'Hook', file: 'src/hooks/useAutocomplete.ts', description: 'Debounce, abort, cache and keyboard handling' },
    { concept: 'Suggestion source', file: 'src/services/suggestions.ts', description: 'Prefix matches with simulated latency, abortable' },
    { concept: 'Combobox', file: 'src/components/demos/AutocompleteDemo.tsx', description: 'ARIA roles and option rendering' },
  ],
}
