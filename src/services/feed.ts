// In-process paginated "API" for the infinite scroll demo.
// Latency is simulated with setTimeout so loading states are visible.

export type FeedItem = {
  id: number
  title: string
  body: string
}

export type FeedPage = {
  items: FeedItem[]
  nextPage: number | null      // null → no more pages
}

export type FetchPage = (page: number, pageSize: number) => Promise<FeedPage>

export type FeedSourceOptions = {
  total: number
  latencyMs?: number
  failEvery?: number           // every n-th call rejects
}

export function buildFeedItems(start: number, end: number, total: number): FeedItem[] {
  const items: FeedItem[] = []
  for (let i = start; i < end; i++) {
    items.push({ id: i + 1, title: `Post #${i + 1}`, body: `Item ${i + 1} of ${total}` })
  }
  return items
}

export function createFeedSource({ total, latencyMs = 400, failEvery }: FeedSourceOptions): FetchPage {
  let calls = 0

  return (page, pageSize) => {
    calls += 1
    const shouldFail = failEvery !== undefined && failEvery > 0 && calls % failEvery === 0

    return new Promise<FeedPage>((resolve, reject) => {
      setTimeout(() => {
        if (shouldFail) {
          reject(new Error(`Failed to load page ${page + 1}`))
          return
        }
        const start = page * pageSize
        const end = Math.min(total, start + pageSize)
        resolve({
          items: buildFeedItems(start, end, total),
          nextPage: end < total ? page + 1 : null,
        })
      }, latencyMs)
    })
  }
}
