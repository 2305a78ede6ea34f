import type { ReactNode } from 'react'

export type CalloutTone = 'info' | 'warning' | 'tip'

const tones = {
  info:    { box: 'border-sky-500/30 bg-sky-500/5',     label: 'text-sky-400',     icon: 'ℹ️', title: 'Note' },
  warning: { box: 'border-amber-500/30 bg-amber-500/5', label: 'text-amber-400',   icon: '⚠️', title: 'Watch out' },
  tip:     { box: 'border-emerald-500/30 bg-emerald-500/5', label: 'text-emerald-400', icon: '💡', title: 'Tip' },
} as const

export default function Callout({ tone, children }: { tone: CalloutTone; children: ReactNode }) {
  const style = tones[tone]
  return (
    <aside className={`rounded-lg border px-4 py-3 ${style.box}`}>
      <p className={`text-[11px] font-medium uppercase tracking-wider mb-1 ${style.label}`}>
        <span className="mr-1">{style.icon}</span>{style.title}
      </p>
      <div className="text-xs text-slate-300 leading-relaxed">{children}</div>
    </aside>
  )
}
