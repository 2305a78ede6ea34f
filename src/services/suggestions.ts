import { createAbortError } from '../utils/errors.ts'

export type SearchFn = (query: string, signal: AbortSignal) => Promise<string[]>

export const MAX_SUGGESTIONS = 8

/**
 * Case-insensitive prefix matches, in the order `words` lists them.
 */
export function findSuggestions(words: readonly string[], query: string): string[] {
  const needle = query.trim().toLowerCase()
  if (!needle) return []
  return words.filter((w) => w.toLowerCase().startsWith(needle)).slice(0, MAX_SUGGESTIONS)
}

/**
 * Wrap a word list as an async, abortable search, like a typeahead endpoint.
 */
export function createSuggestionSource(words: readonly string[], latencyMs = 250): SearchFn {
  return (query, signal) =>
    new Promise<string[]>((resolve, reject) => {
      if (signal.aborted) {
        reject(createAbortError())
        return
      }

      const onAbort = () => {
        clearTimeout(timer)
        reject(createAbortError())
      }

      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort)
        resolve(findSuggestions(words, query))
      }, latencyMs)

      signal.addEventListener('abort', onAbort, { once: true })
    })
}
