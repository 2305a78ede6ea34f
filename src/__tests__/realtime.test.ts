import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { act, renderHook } from '@testing-library/react'
import { backoffDelay, useWebSocket } from '../hooks/useWebSocket.ts'
import { useTickerFeed } from '../hooks/useTickerFeed.ts'
import { useStopwatch } from '../hooks/useStopwatch.ts'
import { FakeWebSocket } from './helpers/webSocket.ts'

beforeEach(() => {
  FakeWebSocket.reset()
  vi.stubGlobal('WebSocket', FakeWebSocket)
  vi.useFakeTimers()
})

afterEach(() => {
  vi.useRealTimers()
})

describe('backoffDelay', () => {
  it('doubles from 500 ms up to 8 s', () => {
    expect([0, 1, 2, 3, 4, 5, 10].map(backoffDelay)).toEqual([500, 1000, 2000, 4000, 8000, 8000, 8000])
  })
})

describe('useWebSocket', () => {
  it('stays idle without a URL', () => {
    const { result } = renderHook(() => useWebSocket(null, { onMessage: vi.fn() }))
    expect(result.current.status).toBe('idle')
    expect(FakeWebSocket.instances).toHaveLength(0)
  })

  it('opens, delivers text frames and sends', () => {
    const onMessage = vi.fn()
    const { result } = renderHook(() => useWebSocket('ws://test', { onMessage }))
    expect(result.current.status).toBe('connecting')

    const socket = FakeWebSocket.latest()
    expect(socket.url).toBe('ws://test')
    act(() => { socket.open() })
    expect(result.current.status).toBe('open')

    act(() => {
      socket.receive('hello')
      socket.receive(42)
    })
    expect(onMessage).toHaveBeenCalledTimes(1)
    expect(onMessage).toHaveBeenCalledWith('hello')

    expect(result.current.send('ping')).toBe(true)
    expect(socket.sent).toEqual(['ping'])
  })

  it('refuses to send before the socket is open', () => {
    const { result } = renderHook(() => useWebSocket('ws://test', { onMessage: vi.fn() }))
    expect(result.current.send('early')).toBe(false)
  })

  it('reconnects with exponential backoff', () => {
    const { result } = renderHook(() => useWebSocket('ws://test', { onMessage: vi.fn() }))

    act(() => { FakeWebSocket.latest().drop() })
    expect(result.current.status).toBe('reconnecting')
    expect(result.current.attempts).toBe(1)

    act(() => { vi.advanceTimersByTime(499) })
    expect(FakeWebSocket.instances).toHaveLength(1)
    act(() => { vi.advanceTimersByTime(1) })
    expect(FakeWebSocket.instances).toHaveLength(2)
    expect(result.current.status).toBe('connecting')

    act(() => { FakeWebSocket.latest().drop() })
    expect(result.current.attempts).toBe(2)
    act(() => { vi.advanceTimersByTime(999) })
    expect(FakeWebSocket.instances).toHaveLength(2)
    act(() => { vi.advanceTimersByTime(1) })
    expect(FakeWebSocket.instances).toHaveLength(3)

    act(() => { FakeWebSocket.latest().open() })
    expect(result.current.status).toBe('open')
    expect(result.current.attempts).toBe(0)
  })

  it('stays closed when reconnect is off', () => {
    const { result } = renderHook(() => useWebSocket('ws://test', { onMessage: vi.fn(), reconnect: false }))
    act(() => { FakeWebSocket.latest().drop() })
    act(() => { vi.advanceTimersByTime(10_000) })
    expect(result.current.status).toBe('closed')
    expect(FakeWebSocket.instances).toHaveLength(1)
  })

  it('keeps sending on the new socket when the old one finishes closing late', () => {
    FakeWebSocket.deferClose = true
    const { result, rerender } = renderHook(
      ({ url }) => useWebSocket(url, { onMessage: vi.fn() }),
      { initialProps: { url: 'ws://a' } },
    )
    const first = FakeWebSocket.latest()
    act(() => { first.open() })

    rerender({ url: 'ws://b' })
    const second = FakeWebSocket.latest()
    expect(second.url).toBe('ws://b')
    act(() => { second.open() })
    act(() => { first.deliverClose() })

    expect(result.current.status).toBe('open')
    expect(result.current.send('ping')).toBe(true)
    expect(second.sent).toEqual(['ping'])
    act(() => { vi.advanceTimersByTime(10_000) })
    expect(FakeWebSocket.instances).toHaveLength(2)
  })

  it('closes for good on unmount', () => {
    const { unmount } = renderHook(() => useWebSocket('ws://test', { onMessage: vi.fn() }))
    const socket = FakeWebSocket.latest()
    act(() => { socket.open() })

    unmount()
    expect(socket.closedByClient).toBe(true)
    act(() => { vi.advanceTimersByTime(10_000) })
    expect(FakeWebSocket.instances).toHaveLength(1)
  })
})

describe('useTickerFeed', () => {
  it('runs the simulator when no URL is configured', () => {
    const { result } = renderHook(() => useTickerFeed(null, { seed: 1, intervalMs: 100 }))
    expect(result.current.status).toBe('simulated')
    expect(result.current.source).toBe('simulated')

    act(() => { vi.advanceTimersByTime(300) })
    expect(result.current.received).toBe(3)
    expect(result.current.log).toHaveLength(3)
    expect(FakeWebSocket.instances).toHaveLength(0)

    act(() => { result.current.clear() })
    expect(result.current.received).toBe(0)
    expect(result.current.quotes).toEqual({})
  })

  it('applies valid socket frames and drops the rest', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const { result } = renderHook(() => useTickerFeed('ws://quotes'))
    const socket = FakeWebSocket.latest()

    act(() => {
      socket.open()
      socket.receive('{"symbol":"ACME","price":101.5,"timestamp":1000}')
      socket.receive('not json')
    })

    expect(result.current.status).toBe('open')
    expect(result.current.received).toBe(1)
    expect(result.current.quotes.ACME).toEqual({ price: 101.5, previous: null, updatedAt: 1000 })
    expect(warn).toHaveBeenCalledTimes(1)
  })
})

describe('useStopwatch', () => {
  it('reads elapsed time from the clock while running', () => {
    const { result } = renderHook(() => useStopwatch())

    act(() => { result.current.start() })
    act(() => { vi.advanceTimersByTime(1230) })
    expect(result.current.elapsedMs).toBe(1230)

    act(() => { result.current.pause() })
    act(() => { vi.advanceTimersByTime(500) })
    expect(result.current.elapsedMs).toBe(1230)
    expect(result.current.status).toBe('paused')

    act(() => { result.current.resume() })
    act(() => { vi.advanceTimersByTime(100) })
    act(() => { result.current.lap() })
    expect(result.current.laps).toEqual([1330])

    act(() => { result.current.pause() })
    act(() => { result.current.reset() })
    expect(result.current.status).toBe('idle')
    expect(result.current.elapsedMs).toBe(0)
  })
})
