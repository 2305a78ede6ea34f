import { useStopwatch } from '../../hooks/useStopwatch.ts'
import { lapDurations } from '../../state/stopwatchReducer.ts'
import { formatStopwatch } from '../../utils/formatters.ts'

const buttonClass = 'px-4 py-1.5 rounded-md text-sm font-medium transition-colors'

export default function StopwatchDemo({ now }: { now?: () => number }) {
  const { status, elapsedMs, laps, start, pause, resume, reset, lap } = useStopwatch(now)
  const durations = lapDurations(laps)

  return (
    <div className="flex flex-col items-center gap-6">
      <p role="timer" aria-live="off" className="text-5xl font-mono tabular-nums text-slate-100">
        {formatStopwatch(elapsedMs)}
      </p>

      <div className="flex gap-2">
        {status === 'idle' && (
          <button onClick={start} className={`${buttonClass} bg-emerald-600 hover:bg-emerald-500 text-white`}>Start</button>
        )}
        {status === 'running' && (
          <>
            <button onClick={pause} className={`${buttonClass} bg-amber-600 hover:bg-amber-500 text-white`}>Pause</button>
            <button onClick={lap} className={`${buttonClass} bg-slate-800 hover:bg-slate-700 text-slate-200`}>Lap</button>
          </>
        )}
        {status === 'paused' && (
          <>
            <button onClick={resume} className={`${buttonClass} bg-emerald-600 hover:bg-emerald-500 text-white`}>Resume</button>
            <button onClick={reset} className={`${buttonClass} bg-slate-800 hover:bg-slate-700 text-slate-200`}>Reset</button>
          </>
        )}
      </div>

      {laps.length > 0 && (
        <ol aria-label="Laps" className="w-full max-w-xs divide-y divide-slate-800 text-sm font-mono">
          {laps.map((split, i) => (
            <li key={i} className="flex justify-between py-1.5 text-slate-300">
              <span className="text-slate-500">Lap {i + 1}</span>
              <span>{formatStopwatch(durations[i])}</span>
              <span className="text-slate-500">{formatStopwatch(split)}</span>
            </li>
          ))}
        </ol>
      )}
    </div>
  )
}
