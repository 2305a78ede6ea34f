import type { SocketStatus } from '../../hooks/useWebSocket.ts'

type StatusBadgeProps = {
  status: SocketStatus | 'simulated'
}

const styles = {
  'idle':         'bg-slate-500/15 text-slate-400 border-slate-500/30',
  'connecting':   'bg-yellow-500/15 text-yellow-400 border-yellow-500/30',
  'open':         'bg-emerald-500/15 text-emerald-400 border-emerald-500/30',
  'reconnecting': 'bg-amber-500/15 text-amber-400 border-amber-500/30',
  'closed':       'bg-red-500/15 text-red-400 border-red-500/30',
  'simulated':    'bg-indigo-500/15 text-indigo-400 border-indigo-500/30',
} as const

const icons = {
  'idle':         '○',
  'connecting':   '◔',
  'open':         '●',
  'reconnecting': '↻',
  'closed':       '✕',
  'simulated':    '◆',
} as const

export default function StatusBadge({ status }: StatusBadgeProps) {
  return (
    <span className={`inline-flex items-center gap-1 px-2 py-0.5 rounded-full text-[11px] font-medium border ${styles[status]}`}>
      <span aria-hidden="true">{icons[status]}</span>
      <span className="capitalize">{status}</span>
    </span>
  )
}
