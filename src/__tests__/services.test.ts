import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { buildFeedItems, createFeedSource } from '../services/feed.ts'
import { MAX_SUGGESTIONS, createSuggestionSource, findSuggestions } from '../services/suggestions.ts'
import { createSimulatedTicker, parseTickerMessage } from '../services/ticker.ts'
import type { TickerMessage } from '../services/ticker.ts'
import { SAMPLE_USERS, createUsersApi, filterUsers } from '../services/usersApi.ts'

beforeEach(() => {
  vi.useFakeTimers()
})

afterEach(() => {
  vi.useRealTimers()
})

describe('feed source', () => {
  it('builds deterministic items', () => {
    expect(buildFeedItems(0, 2, 5)).toEqual([
      { id: 1, title: 'Post #1', body: 'Item 1 of 5' },
      { id: 2, title: 'Post #2', body: 'Item 2 of 5' },
    ])
  })

  it('serves pages until the total is reached', async () => {
    const fetchPage = createFeedSource({ total: 25, latencyMs: 100 })

    const first = fetchPage(0, 10)
    await vi.advanceTimersByTimeAsync(100)
    const page0 = await first
    expect(page0.items.map(i => i.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10])
    expect(page0.nextPage).toBe(1)

    const last = fetchPage(2, 10)
    await vi.advanceTimersByTimeAsync(100)
    const page2 = await last
    expect(page2.items.map(i => i.id)).toEqual([21, 22, 23, 24, 25])
    expect(page2.nextPage).toBeNull()
  })

  it('fails every n-th call', async () => {
    const fetchPage = createFeedSource({ total: 100, latencyMs: 10, failEvery: 2 })

    const ok = fetchPage(0, 10)
    await vi.advanceTimersByTimeAsync(10)
    await expect(ok).resolves.toMatchObject({ nextPage: 1 })

    const failing = expect(fetchPage(1, 10)).rejects.toThrow('Failed to load page 2')
    await vi.advanceTimersByTimeAsync(10)
    await failing
  })
})

describe('suggestions', () => {
  it('finds prefix matches case-insensitively', () => {
    expect(findSuggestions(['Canada', 'Cameroon', 'Chile', 'cambodia'], 'CA')).toEqual(['Canada', 'Cameroon', 'cambodia'])
    expect(findSuggestions(['Canada'], '  ')).toEqual([])
  })

  it('caps the number of suggestions', () => {
    const words = Array.from({ length: 10 }, (_, i) => `a${i}`)
    expect(findSuggestions(words, 'a')).toHaveLength(MAX_SUGGESTIONS)
  })

  it('resolves after the latency', async () => {
    const search = createSuggestionSource(['Chile', 'China'], 50)
    const result = search('chi', new AbortController().signal)
    await vi.advanceTimersByTimeAsync(50)
    await expect(result).resolves.toEqual(['Chile', 'China'])
  })

  it('rejects with an AbortError when aborted', async () => {
    const search = createSuggestionSource(['Chile'], 50)
    const controller = new AbortController()
    const result = search('chi', controller.signal)
    controller.abort()
    await expect(result).rejects.toMatchObject({ name: 'AbortError' })
  })

  it('rejects immediately for an already aborted signal', async () => {
    const search = createSuggestionSource(['Chile'], 50)
    await expect(search('chi', AbortSignal.abort())).rejects.toMatchObject({ name: 'AbortError' })
  })
})

describe('parseTickerMessage', () => {
  it('accepts a well-formed frame', () => {
    expect(parseTickerMessage('{"symbol":"ACME","price":1.5,"timestamp":10}'))
      .toEqual({ symbol: 'ACME', price: 1.5, timestamp: 10 })
  })

  it('drops malformed JSON with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    expect(parseTickerMessage('nope')).toBeNull()
    expect(warn).toHaveBeenCalledTimes(1)
  })

  it('drops frames with the wrong shape', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    expect(parseTickerMessage('{"symbol":"","price":1,"timestamp":1}')).toBeNull()
    expect(parseTickerMessage('{"symbol":"ACME","price":"1","timestamp":1}')).toBeNull()
    expect(parseTickerMessage('{"symbol":"ACME","price":1}')).toBeNull()
    expect(parseTickerMessage('[1,2,3]')).toBeNull()
  })
})

describe('createSimulatedTicker', () => {
  function collect(seed: number) {
    const messages: TickerMessage[] = []
    const stop = createSimulatedTicker({
      onMessage: m => messages.push(m),
      symbols: { ACME: 100 },
      intervalMs: 1000,
      seed,
      now: () => 5,
    })
    return { messages, stop }
  }

  it('emits one rounded quote per interval', () => {
    const { messages, stop } = collect(1)
    vi.advanceTimersByTime(3000)
    stop()

    expect(messages).toHaveLength(3)
    for (const m of messages) {
      expect(m.symbol).toBe('ACME')
      expect(m.timestamp).toBe(5)
      expect(Math.round(m.price * 100) / 100).toBe(m.price)
    }
  })

  it('moves at most one percent per step', () => {
    const { messages, stop } = collect(3)
    vi.advanceTimersByTime(1000)
    stop()
    expect(messages[0].price).toBeGreaterThanOrEqual(99)
    expect(messages[0].price).toBeLessThanOrEqual(101)
  })

  it('is reproducible for a seed', () => {
    const a = collect(9)
    const b = collect(9)
    vi.advanceTimersByTime(5000)
    a.stop()
    b.stop()
    expect(a.messages).toEqual(b.messages)
  })

  it('stops emitting after stop()', () => {
    const { messages, stop } = collect(1)
    vi.advanceTimersByTime(1000)
    stop()
    vi.advanceTimersByTime(5000)
    expect(messages).toHaveLength(1)
  })
})

describe('users api', () => {
  it('filters by name or email', () => {
    expect(filterUsers(SAMPLE_USERS, 'ada').map(u => u.name)).toEqual(['Ada Lovelace'])
    expect(filterUsers(SAMPLE_USERS, 'EXAMPLE.COM')).toHaveLength(12)
    expect(filterUsers(SAMPLE_USERS, ' ')).toHaveLength(12)
  })

  it('answers after the latency', async () => {
    const api = createUsersApi({ latencyMs: 200 })
    const result = api.fetchUsers('liskov')
    await vi.advanceTimersByTimeAsync(200)
    await expect(result).resolves.toEqual([{ id: 5, name: 'Barbara Liskov', email: 'barbara@example.com' }])
  })

  it('fails when told to', async () => {
    const api = createUsersApi({ latencyMs: 200, shouldFail: () => true })
    const failing = expect(api.fetchUsers('')).rejects.toThrow('User service unavailable')
    await vi.advanceTimersByTimeAsync(200)
    await failing
  })
})
