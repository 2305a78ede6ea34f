import { createRandom } from '../utils/random.ts'

export type TickerMessage = {
  symbol: string
  price: number
  timestamp: number
}

/**
 * Parse one frame from the ticker socket. Anything that is not a
 * `{ symbol, price, timestamp }` object is dropped.
 */
export function parseTickerMessage(raw: string): TickerMessage | null {
  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch (err) {
    console.warn('Dropping malformed ticker frame:', err)
    return null
  }

  if (
    typeof data !== 'object' || data === null ||
    !('symbol' in data) || !('price' in data) || !('timestamp' in data) ||
    typeof data.symbol !== 'string' || data.symbol === '' ||
    typeof data.price !== 'number' || !Number.isFinite(data.price) ||
    typeof data.timestamp !== 'number'
  ) {
    console.warn('Dropping ticker frame with unexpected shape:', raw)
    return null
  }

  return { symbol: data.symbol, price: data.price, timestamp: data.timestamp }
}

export const DEFAULT_SYMBOLS: Record<string, number> = {
  ACME: 120.0,
  GLOBX: 48.5,
  INIT: 310.25,
  UMBR: 12.8,
}

export type SimulatedTickerOptions = {
  onMessage: (message: TickerMessage) => void
  symbols?: Record<string, number>
  intervalMs?: number
  seed?: number
  now?: () => number
}

/**
 * A random-walk price feed driven by a single setInterval.
 * Returns a stop function.
 */
export function createSimulatedTicker({
  onMessage,
  symbols = DEFAULT_SYMBOLS,
  intervalMs = 1000,
  seed = 42,
  now = Date.now,
}: SimulatedTickerOptions): () => void {
  const random = createRandom(seed)
  const prices = new Map(Object.entries(symbols))
  const names = [...prices.keys()]

  const id = setInterval(() => {
    const symbol = names[Math.floor(random() * names.length)]
    const previous = prices.get(symbol) ?? 0
    const change = (random() - 0.5) * 0.02 * previous
    const price = Math.max(0.01, Math.round((previous + change) * 100) / 100)
    prices.set(symbol, price)
    onMessage({ symbol, price, timestamp: now() })
  }, intervalMs)

  return () => clearInterval(id)
}
