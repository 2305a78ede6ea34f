import { useTickerFeed } from '../../hooks/useTickerFeed.ts'
import { priceTrend } from '../../state/tickerReducer.ts'
import { formatClock, formatPrice } from '../../utils/formatters.ts'
import StatusBadge from '../shared/StatusBadge.tsx'
import { config } from '../../config.ts'

type RealtimeDemoProps = {
  url?: string | null
  seed?: number
  intervalMs?: number
}

const trendStyles = {
  up:   { icon: '▲', className: 'text-emerald-400' },
  down: { icon: '▼', className: 'text-red-400' },
  flat: { icon: '·', className: 'text-slate-500' },
} as const

export default function RealtimeDemo({ url = config.tickerUrl, seed, intervalMs }: RealtimeDemoProps) {
  const { quotes, log, received, status, attempts, clear } = useTickerFeed(url, { seed, intervalMs })
  const symbols = Object.keys(quotes).sort()

  return (
    <div className="space-y-5">
      <div className="flex items-center justify-between">
        <div className="flex items-center gap-2">
          <StatusBadge status={status} />
          {status === 'reconnecting' && <span className="text-[11px] text-slate-500">attempt {attempts}</span>}
        </div>
        <div className="flex items-center gap-3">
          <span className="text-[11px] text-slate-500">{received} updates</span>
          <button onClick={clear} className="px-3 py-1 rounded bg-slate-800 hover:bg-slate-700 text-xs text-slate-200">Clear</button>
        </div>
      </div>

      {symbols.length === 0 ? (
        <p className="text-sm text-slate-500">Waiting for the first quote…</p>
      ) : (
        <table aria-label="Quotes" className="w-full text-sm">
          <thead>
            <tr className="text-[11px] text-slate-500 uppercase tracking-wider text-left">
              <th className="py-1 font-medium">Symbol</th>
              <th className="py-1 font-medium text-right">Price</th>
              <th className="py-1 font-medium text-right">Updated</th>
            </tr>
          </thead>
          <tbody>
            {symbols.map(symbol => {
              const quote = quotes[symbol]
              const trend = trendStyles[priceTrend(quote)]
              return (
                <tr key={symbol} className="border-t border-slate-800">
                  <td className="py-1.5 font-mono text-slate-200">{symbol}</td>
                  <td className={`py-1.5 text-right font-mono ${trend.className}`}>
                    <span aria-hidden="true">{trend.icon} </span>{formatPrice(quote.price)}
                  </td>
                  <td className="py-1.5 text-right text-slate-500 text-xs">{formatClock(quote.updatedAt)}</td>
                </tr>
              )
            })}
          </tbody>
        </table>
      )}

      {log.length > 0 && (
        <div>
          <p className="text-[11px] text-slate-500 uppercase tracking-wider mb-1">Recent messages</p>
          <ul aria-label="Message log" className="max-h-40 overflow-y-auto text-xs font-mono text-slate-400 space-y-0.5">
            {log.map(entry => (
              <li key={entry.seq}>
                #{entry.seq} {formatClock(entry.timestamp)} {entry.symbol} {formatPrice(entry.price)}
              </li>
            ))}
          </ul>
        </div>
      )}
    </div>
  )
}
