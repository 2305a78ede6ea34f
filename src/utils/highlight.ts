export type HighlightSegment = {
  text: string
  match: boolean
}

/**
 * Split `text` into segments, marking every case-insensitive occurrence of `query`.
 */
export function highlightMatch(text: string, query: string): HighlightSegment[] {
  const needle = query.trim().toLowerCase()
  if (!needle) return [{ text, match: false }]

  const haystack = text.toLowerCase()
  const segments: HighlightSegment[] = []
  let cursor = 0

  while (cursor < text.length) {
    const found = haystack.indexOf(needle, cursor)
    if (found === -1) break
    if (found > cursor) segments.push({ text: text.slice(cursor, found), match: false })
    segments.push({ text: text.slice(found, found + needle.length), match: true })
    cursor = found + needle.length
  }

  if (cursor < text.length) segments.push({ text: text.slice(cursor), match: false })
  return segments
}
