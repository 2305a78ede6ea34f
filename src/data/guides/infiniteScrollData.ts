import type { Guide } from './types'

export const infiniteScrollGuide: Guide = {
  id: 'guide-infinite-scroll',
  title: 'Infinite Scroll',
  subtitle: 'Load the next page when the reader reaches the bottom, without a scroll listener',
  color: 'cyan',
  icon: '♾️',
  sections: [
    {
      id: 'idea',
      title: 'The Idea',
      content: [
        {
          type: 'text',
          body: 'A long feed is fetched one page at a time. An empty "sentinel" element sits after the last item; when it scrolls into view, the next page is requested and appended. The page number returned by the server tells us whether there is anything left to load.',
        },
        {
          type: 'diagram',
          nodes: [
            { id: 'scroll', label: 'User scrolls', icon: '🖱️' },
            { id: 'sentinel', label: 'Sentinel visible', icon: '👁️' },
            { id: 'fetch', label: 'fetchPage(n)', icon: '📡' },
            { id: 'append', label: 'Append items', icon: '➕' },
          ],
          connections: [
            { from: 'scroll', to: 'sentinel' },
            { from: 'sentinel', to: 'fetch', label: 'loadMore' },
            { from: 'fetch', to: 'append' },
          ],
        },
        {
          type: 'concept-card',
          term: 'IntersectionObserver',
          explanation: 'A browser API that calls you back when an element enters or leaves the viewport (or another root). The browser does the geometry off the main scroll path.',
          example: 'new IntersectionObserver(cb, { rootMargin: "200px" })',
        },
        {
          type: 'concept-card',
          term: 'Sentinel',
          explanation: 'An empty element placed after the list purely so it can be observed.',
        },
        {
          type: 'concept-card',
          term: 'Cursor / next page',
          explanation: 'The server answers each page with a pointer to the next one, or null when the list is exhausted.',
        },
      ],
    },
    {
      id: 'guards',
      title: 'Guarding loadMore',
      content: [
        {
          type: 'text',
          body: 'The observer can fire several times while a request is still in flight, and it keeps firing after an error if the sentinel stays visible. loadMore therefore refuses to run while loading, after an error (until Retry), and once there is no next page.',
        },
        {
          type: 'code',
          language: 'typescript',
          code: `const loadMore = useCallback(() => {
  if (state.loading || state.error !== null || state.nextPage === null) return
  load(state.nextPage)
}, [load, state.loading, state.error, state.nextPage])`,
          caption: 'load() also checks an in-flight ref, so two calls in the same render still send one request',
        },
        {
          type: 'comparison',
          leftLabel: 'scroll event listener',
          rightLabel: 'IntersectionObserver',
          rows: [
            { label: 'Fires', left: 'On every scroll frame', right: 'Only when visibility changes' },
            { label: 'Geometry', left: 'You call getBoundingClientRect', right: 'Browser computes it' },
            { label: 'Throttling', left: 'Needed', right: 'Not needed' },
          ],
        },
        {
          type: 'callout',
          tone: 'warning',
          body: 'Disconnect the observer in the effect cleanup. A leaked observer keeps calling loadMore after the list has unmounted.',
        },
        {
          type: 'quiz',
          question: 'The sentinel is visible and the last request failed. What should happen on the next intersection?',
          options: [
            'Request the same page again immediately',
            'Nothing until the user presses Retry',
            'Skip to the following page',
          ],
          correctIndex: 1,
          explanation: 'Retrying automatically on every intersection can hammer a failing server. The error blocks loadMore until the user asks to retry.',
        },
      ],
    },
  ],
  connections: [
    { concept: 'Paging state', file: 'src/hooks/useInfiniteScroll.ts', description: 'items, nextPage, loading, error and the loadMore guard' },
    { concept: 'Observer hook', file: 'src/hooks/useIntersectionObserver.ts', description: 'Observes the sentinel and disconnects on cleanup' },
    { concept: 'Fake API', file: 'src/services/feed.ts', description: 'Deterministic pages with optional periodic failures' },
  ],
}
