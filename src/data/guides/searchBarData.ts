import type { Guide } from './types'

export const searchBarGuide: Guide = {
  id: 'guide-search-bar',
  title: 'Search Bar',
  subtitle: 'A controlled input, a debounced query and derived results',
  color: 'blue',
  icon: '🔍',
  sections: [
    {
      id: 'controlled',
      title: 'Controlled Input',
      content: [
        {
          type: 'text',
          body: 'The input value lives in React state and every keystroke goes through onChange. The list of results is not stored anywhere: it is derived from the items and the debounced query on every render.',
        },
        {
          type: 'code',
          language: 'typescript',
          code: `const [query, setQuery] = useState('')
const debounced = useDebounce(query, 300)
const results = useMemo(() => filterItems(items, debounced), [items, debounced])`,
        },
        {
          type: 'callout',
          tone: 'tip',
          body: 'Derived state does not belong in useState. Storing the filtered list separately means keeping two pieces of state in sync by hand.',
        },
      ],
    },
    {
      id: 'debounce',
      title: 'Why Debounce',
      content: [
        {
          type: 'text',
          body: 'Filtering a short list on each keystroke is cheap, but the same component backed by a server would send a request per character. Debouncing waits until the user pauses before the query takes effect.',
        },
        {
          type: 'comparison',
          leftLabel: 'Immediate',
          rightLabel: 'Debounced (300 ms)',
          rows: [
            { label: 'Typing "react"', left: '5 filters / requests', right: '1 filter / request' },
            { label: 'Feedback', left: 'Instant', right: 'After a short pause' },
          ],
        },
        {
          type: 'concept-card',
          term: 'Highlighting',
          explanation: 'highlightMatch splits a label into matching and non-matching segments so the match can be wrapped in <mark> without dangerouslySetInnerHTML.',
        },
        {
          type: 'concept-card',
          term: 'Live region',
          explanation: 'An aria-live element announces the result count to screen readers when it changes.',
        },
        {
          type: 'quiz',
          question: 'Where should the filtered results live?',
          options: ['In a second useState updated in an effect', 'Computed from items and query during render', 'In a ref'],
          correctIndex: 1,
          explanation: 'Results are a pure function of the items and the query, so computing them during render (memoised if expensive) keeps a single source of truth.',
        },
      ],
    },
  ],
  connections: [
    { concept: 'Filtering', file: 'src/utils/search.ts', description: 'Case-insensitive substring match on the trimmed query' },
    { concept: 'Highlighting', file: 'src/utils/highlight.ts', description: 'Splits text into match segments' },
    { concept: 'Debounce hook', file: 'src/hooks/useDebounce.ts', description: 'Delays the value until it stops changing' },
  ],
}
