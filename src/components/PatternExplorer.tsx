import type { ComponentType } from 'react'
import InfiniteScrollDemo from './demos/InfiniteScrollDemo.tsx'
import SearchBarDemo from './demos/SearchBarDemo.tsx'
import TodoListDemo from './demos/TodoListDemo.tsx'
import AutocompleteDemo from './demos/AutocompleteDemo.tsx'
import OtpInputDemo from './demos/OtpInputDemo.tsx'
import StopwatchDemo from './demos/StopwatchDemo.tsx'
import RealtimeDemo from './demos/RealtimeDemo.tsx'
import RoutingDemo from './demos/RoutingDemo.tsx'
import ContextDemo from './demos/ContextDemo.tsx'
import CustomHooksDemo from './demos/CustomHooksDemo.tsx'
import SagaDemo from './demos/SagaDemo.tsx'
import HocDemo from './demos/HocDemo.tsx'
import GuideShell, { COLOR_MAP } from './guides/GuideShell.tsx'
import ErrorBoundary from './shared/ErrorBoundary.tsx'
import {
  autocompleteGuide,
  contextGuide,
  hocGuide,
  hooksGuide,
  infiniteScrollGuide,
  otpInputGuide,
  realtimeGuide,
  routingGuide,
  sagaGuide,
  searchBarGuide,
  stopwatchGuide,
  todoListGuide,
} from '../data/guides/index.ts'
import type { Guide } from '../data/guides/types.ts'

type PatternConfig = {
  id: string
  description: string
  demo: ComponentType
  guide: Guide
}

export const PATTERNS: PatternConfig[] = [
  { id: 'infinite-scroll', description: 'Paged feed loaded by an IntersectionObserver sentinel, with retry', demo: InfiniteScrollDemo, guide: infiniteScrollGuide },
  { id: 'search-bar',      description: 'Controlled input, debounced filter, highlighted matches',          demo: SearchBarDemo,      guide: searchBarGuide },
  { id: 'todo-list',       description: 'useReducer, inline editing, filters, localStorage',                demo: TodoListDemo,       guide: todoListGuide },
  { id: 'autocomplete',    description: 'Abortable suggestions with a cache and an ARIA combobox',          demo: AutocompleteDemo,   guide: autocompleteGuide },
  { id: 'otp-input',       description: 'Digit boxes with paste, backspace and arrow keys',                 demo: OtpInputDemo,       guide: otpInputGuide },
  { id: 'stopwatch',       description: 'One interval, elapsed time from timestamps, laps',                 demo: StopwatchDemo,      guide: stopwatchGuide },
  { id: 'realtime',        description: 'Live quotes over one WebSocket, or a seeded simulator',            demo: RealtimeDemo,       guide: realtimeGuide },
  { id: 'routing',         description: 'Routes, params and a protected dashboard in a MemoryRouter',       demo: RoutingDemo,        guide: routingGuide },
  { id: 'context',         description: 'Theme and auth read deep in the tree without prop drilling',       demo: ContextDemo,        guide: contextGuide },
  { id: 'hooks',           description: 'useDebounce, useThrottle, usePrevious, useLocalStorage, useFetch', demo: CustomHooksDemo,    guide: hooksGuide },
  { id: 'saga',            description: 'redux-saga with takeLatest search and takeEvery increments',        demo: SagaDemo,           guide: sagaGuide },
  { id: 'hoc',             description: 'withLoading, withAuth and withErrorBoundary',                       demo: HocDemo,            guide: hocGuide },
]

export const PATTERN_IDS = new Set(PATTERNS.map(p => p.id))

type PatternExplorerProps = {
  activePattern: string
}

export default function PatternExplorer({ activePattern }: PatternExplorerProps) {
  const pattern = PATTERNS.find(p => p.id === activePattern)

  if (!pattern) {
    return <div className="text-slate-500 py-20 text-center">Pattern not found</div>
  }

  const Demo = pattern.demo
  const colors = COLOR_MAP[pattern.guide.color]

  return (
    <div className="animate-fade-in">
      <div className={`rounded-xl border ${colors.border} ${colors.bg} p-5 mb-8`}>
        <div className="flex items-center gap-3">
          <span className="text-3xl">{pattern.guide.icon}</span>
          <div>
            <h2 className={`text-xl font-bold ${colors.text}`}>{pattern.guide.title}</h2>
            <p className="text-sm text-slate-400 mt-0.5">{pattern.description}</p>
          </div>
        </div>
      </div>

      {/* Live demo */}
      <section aria-label="Live demo" className="demo-surface rounded-xl border border-slate-800 bg-slate-900/40 p-6 mb-12">
        <p className="text-[10px] text-slate-600 uppercase tracking-wider font-medium mb-4">Live demo</p>
        <ErrorBoundary label={pattern.id}>
          <Demo />
        </ErrorBoundary>
      </section>

      {/* Walkthrough */}
      <GuideShell guide={pattern.guide} showHeader={false} />
    </div>
  )
}
