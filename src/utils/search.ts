/**
 * Case-insensitive substring match on `name`. A blank query keeps everything;
 * order is preserved.
 */
export function filterItems<T extends { name: string }>(items: readonly T[], query: string): T[] {
  const needle = query.trim().toLowerCase()
  if (!needle) return [...items]
  return items.filter(item => item.name.toLowerCase().includes(needle))
}
