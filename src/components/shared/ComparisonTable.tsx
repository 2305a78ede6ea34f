export type ComparisonRow = {
  label: string
  left: string
  right: string
}

type ComparisonTableProps = {
  leftLabel: string
  rightLabel: string
  rows: ComparisonRow[]
  color?: string
}

export default function ComparisonTable({ leftLabel, rightLabel, rows, color = 'text-indigo-400' }: ComparisonTableProps) {
  return (
    <table className="w-full rounded-lg border border-slate-800 overflow-hidden text-left">
      <thead className="bg-slate-900/60 border-b border-slate-800">
        <tr>
          <th className="px-3 py-2 w-1/4" />
          <th className={`px-3 py-2 text-[10px] uppercase tracking-wider font-medium ${color}`}>{leftLabel}</th>
          <th className={`px-3 py-2 text-[10px] uppercase tracking-wider font-medium ${color}`}>{rightLabel}</th>
        </tr>
      </thead>
      <tbody>
        {rows.map((row, i) => (
          <tr
            key={row.label}
            className={`border-b border-slate-800/50 hover:bg-slate-800/30 transition-colors ${
              i === rows.length - 1 ? 'border-b-0' : ''
            }`}
          >
            <th scope="row" className="px-3 py-2.5 text-xs text-slate-400 font-medium">{row.label}</th>
            <td className="px-3 py-2.5 text-xs text-slate-300">{row.left}</td>
            <td className="px-3 py-2.5 text-xs text-slate-300">{row.right}</td>
          </tr>
        ))}
      </tbody>
    </table>
  )
}
