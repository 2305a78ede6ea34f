import type { ReactNode } from 'react'

type DemoSectionProps = {
  id: string
  title: string
  description?: string
  children: ReactNode
}

// One named region per demo panel, so the panel is reachable as #id and by its title
export default function DemoSection({ id, title, description, children }: DemoSectionProps) {
  const headingId = `${id}-title`
  return (
    <section id={id} aria-labelledby={headingId} className="scroll-mt-10">
      <div className="mb-4 pb-2 border-b border-slate-800/60">
        <h3 id={headingId} className="text-base font-semibold text-slate-200">{title}</h3>
        {description && <p className="text-xs text-slate-500 mt-1">{description}</p>}
      </div>
      {children}
    </section>
  )
}
