// ── App configuration ──
//
// Values come from Vite's import.meta.env (VITE_* variables in .env files).
// Anything missing or unparsable falls back to the default.

export type AppConfig = {
  tickerUrl: string | null       // null → simulated in-process feed
  feedPageSize: number
  searchDebounceMs: number
}

export type RawEnv = {
  VITE_TICKER_URL?: string
  VITE_FEED_PAGE_SIZE?: string
  VITE_SEARCH_DEBOUNCE_MS?: string
}

export const STORAGE_PREFIX = 'study-guide-'

export const DEFAULT_CONFIG: AppConfig = {
  tickerUrl: null,
  feedPageSize: 10,
  searchDebounceMs: 300,
}

function parseBoundedInt(raw: string | undefined, fallback: number, min: number, max: number): number {
  if (raw === undefined || raw.trim() === '') return fallback
  const value = Number(raw)
  if (!Number.isInteger(value)) return fallback
  return Math.min(max, Math.max(min, value))
}

export function parseConfig(env: RawEnv): AppConfig {
  const tickerUrl = env.VITE_TICKER_URL?.trim()
  return Object.freeze({
    tickerUrl: tickerUrl ? tickerUrl : null,
    feedPageSize: parseBoundedInt(env.VITE_FEED_PAGE_SIZE, DEFAULT_CONFIG.feedPageSize, 1, 50),
    searchDebounceMs: parseBoundedInt(env.VITE_SEARCH_DEBOUNCE_MS, DEFAULT_CONFIG.searchDebounceMs, 0, 2000),
  })
}

export const config: AppConfig = parseConfig(import.meta.env)

export function storageKey(name: string): string {
  return `${STORAGE_PREFIX}${name}`
}
