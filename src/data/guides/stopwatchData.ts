import type { Guide } from './types'

export const stopwatchGuide: Guide = {
  id: 'guide-stopwatch',
  title: 'Stopwatch',
  subtitle: 'One interval, timestamps for truth',
  color: 'yellow',
  icon: '⏱️',
  sections: [
    {
      id: 'drift',
      title: 'Timers Drift',
      content: [
        {
          type: 'text',
          body: 'setInterval(fn, 10) does not run every 10 ms. Browsers clamp and delay timers, especially in background tabs. A stopwatch that adds 10 to a counter on each tick runs slow. This one stores when it started and how much time was banked before the last pause; each tick only refreshes the display from Date.now().',
        },
        {
          type: 'code',
          language: 'typescript',
          code: `elapsed = accumulatedMs + (now - startedAt)`,
          caption: 'Pause banks the elapsed time; resume starts a new segment',
        },
        {
          type: 'comparison',
          leftLabel: 'Counting ticks',
          rightLabel: 'Timestamps',
          rows: [
            { label: 'Background tab', left: 'Falls behind', right: 'Correct on return' },
            { label: 'Slow render', left: 'Loses time', right: 'Unaffected' },
            { label: 'Testing', left: 'Needs many ticks', right: 'Pass a fake now()' },
          ],
        },
      ],
    },
    {
      id: 'states',
      title: 'States and Laps',
      content: [
        {
          type: 'diagram',
          nodes: [
            { id: 'idle', label: 'idle', icon: '⏹️' },
            { id: 'running', label: 'running', icon: '▶️' },
            { id: 'paused', label: 'paused', icon: '⏸️' },
          ],
          connections: [
            { from: 'idle', to: 'running', label: 'START' },
            { from: 'running', to: 'paused', label: 'PAUSE' },
          ],
        },
        {
          type: 'text',
          body: 'RESUME returns from paused to running and RESET from paused to idle. The interval only exists while running; useInterval receives null otherwise. A lap records the elapsed time at that moment, and each lap\'s duration is the difference from the previous split.',
        },
        {
          type: 'quiz',
          question: 'Splits are recorded at 1.2 s, 3.0 s and 3.5 s. What is the second lap\'s duration?',
          options: ['3.0 s', '1.8 s', '0.5 s'],
          correctIndex: 1,
          explanation: 'Lap two runs from the first split (1.2 s) to the second (3.0 s).',
        },
      ],
    },
  ],
  connections: [
    { concept: 'Reducer', file: 'src/state/stopwatchReducer.ts', description: 'Status transitions and elapsed time from timestamps' },
    { concept: 'Hook', file: 'src/hooks/useStopwatch.ts', description: 'Single interval while running, injectable clock' },
    { concept: 'Display', file: 'src/utils/formatters.ts', description: 'MM:SS.cc formatting' },
  ],
}
