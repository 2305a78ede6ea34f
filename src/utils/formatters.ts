function pad2(n: number): string {
  return n.toString().padStart(2, '0')
}

/**
 * Format a stopwatch reading as MM:SS.cc, or H:MM:SS.cc once it passes an hour.
 */
export function formatStopwatch(ms: number): string {
  const safe = Math.max(0, Math.floor(ms))
  const centis = Math.floor((safe % 1000) / 10)
  const totalSeconds = Math.floor(safe / 1000)
  const seconds = totalSeconds % 60
  const totalMinutes = Math.floor(totalSeconds / 60)

  if (totalMinutes >= 60) {
    const hours = Math.floor(totalMinutes / 60)
    return `${hours}:${pad2(totalMinutes % 60)}:${pad2(seconds)}.${pad2(centis)}`
  }
  return `${pad2(totalMinutes)}:${pad2(seconds)}.${pad2(centis)}`
}

/**
 * Format a price with two decimals.
 */
export function formatPrice(price: number): string {
  return price.toFixed(2)
}

/**
 * Format a Unix timestamp in milliseconds as HH:MM:SS (local time).
 */
export function formatClock(timestampMs: number): string {
  const date = new Date(timestampMs)
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
}

/**
 * "1 result", "3 results", "No results"
 */
export function pluralizeResults(count: number): string {
  if (count === 0) return 'No results'
  return `${count} ${count === 1 ? 'result' : 'results'}`
}
