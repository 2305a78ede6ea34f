import { useMemo, useRef, useState } from 'react'
import { useInfiniteScroll } from '../../hooks/useInfiniteScroll.ts'
import type { PageFetcher } from '../../hooks/useInfiniteScroll.ts'
import { useIntersectionObserver } from '../../hooks/useIntersectionObserver.ts'
import { createFeedSource } from '../../services/feed.ts'
import type { FeedItem } from '../../services/feed.ts'
import { config } from '../../config.ts'

const FEED_TOTAL = 57

type FeedListProps = {
  fetchPage: PageFetcher<FeedItem>
  pageSize: number
}

export function FeedList({ fetchPage, pageSize }: FeedListProps) {
  const { items, loading, error, hasMore, loadMore, retry } = useInfiniteScroll(fetchPage, pageSize)
  const sentinel = useRef<HTMLDivElement>(null)

  useIntersectionObserver(sentinel, loadMore, {
    rootMargin: '120px',
    enabled: hasMore && !loading && error === null,
  })

  return (
    <div className="h-80 overflow-y-auto rounded-lg border border-slate-800 bg-slate-950/60">
      <ul aria-label="Feed" className="divide-y divide-slate-800/60">
        {items.map((item) => (
          <li key={item.id} className="px-4 py-3">
            <p className="text-sm text-slate-200 font-medium">{item.title}</p>
            <p className="text-xs text-slate-500">{item.body}</p>
          </li>
        ))}
      </ul>

      {loading && (
        <p role="status" className="px-4 py-3 text-xs text-slate-400">Loading…</p>
      )}

      {error !== null && (
        <div role="alert" className="flex items-center justify-between px-4 py-3 text-xs text-red-400 bg-red-500/5">
          <span>{error}</span>
          <button
            onClick={retry}
            className="px-2 py-1 rounded bg-slate-800 hover:bg-slate-700 text-slate-200 transition-colors"
          >
            Retry
          </button>
        </div>
      )}

      {!hasMore && (
        <p className="px-4 py-3 text-xs text-slate-500 text-center">You've reached the end</p>
      )}

      {hasMore && <div ref={sentinel} data-testid="feed-sentinel" className="h-1" />}
    </div>
  )
}

export default function InfiniteScrollDemo() {
  const [flaky, setFlaky] = useState(false)

  // A new source per mode; the list is keyed on it so it starts over
  const fetchPage = useMemo(
    () => createFeedSource({ total: FEED_TOTAL, latencyMs: 500, failEvery: flaky ? 3 : undefined }),
    [flaky],
  )

  return (
    <div className="space-y-3">
      <label className="flex items-center gap-2 text-xs text-slate-400">
        <input type="checkbox" checked={flaky} onChange={(e) => setFlaky(e.target.checked)} />
        Flaky network (every third request fails)
      </label>
      <FeedList key={flaky ? 'flaky' : 'stable'} fetchPage={fetchPage} pageSize={config.feedPageSize} />
    </div>
  )
}
