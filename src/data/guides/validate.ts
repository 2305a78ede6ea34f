import type { Guide } from './types.ts'

/**
 * Structural checks for guide data. Returns one message per problem;
 * an empty list means the guide renders cleanly.
 */
export function validateGuide(guide: Guide): string[] {
  const problems: string[] = []
  const seen = new Set<string>()

  if (guide.sections.length === 0) {
    problems.push(`${guide.id}: has no sections`)
  }

  for (const section of guide.sections) {
    const where = `${guide.id}/${section.id}`

    if (seen.has(section.id)) problems.push(`${where}: duplicate section id`)
    seen.add(section.id)

    if (section.content.length === 0) problems.push(`${where}: empty section`)

    section.content.forEach((block, i) => {
      if (block.type === 'quiz') {
        if (block.options.length < 2) {
          problems.push(`${where}[${i}]: quiz needs at least two options`)
        }
        if (!Number.isInteger(block.correctIndex) || block.correctIndex < 0 || block.correctIndex >= block.options.length) {
          problems.push(`${where}[${i}]: correctIndex ${block.correctIndex} out of range`)
        }
      }

      if (block.type === 'diagram') {
        const ids = new Set(block.nodes.map(n => n.id))
        for (const c of block.connections) {
          if (!ids.has(c.from) || !ids.has(c.to)) {
            problems.push(`${where}[${i}]: connection ${c.from} → ${c.to} names an unknown node`)
          }
        }
      }
    })
  }

  return problems
}
