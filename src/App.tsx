import { useEffect, useState } from 'react'
import Sidebar from './components/Sidebar.tsx'
import PatternExplorer, { PATTERN_IDS } from './components/PatternExplorer.tsx'
import GuideShell from './components/guides/GuideShell.tsx'
import InterviewPage from './components/interview/InterviewPage.tsx'
import ErrorBoundary from './components/shared/ErrorBoundary.tsx'
import { acidGuide, networkingGuide, solidGuide } from './data/guides/index.ts'
import { useTheme } from './context/ThemeContext.tsx'
import { DEFAULT_VIEW, NAV_SECTIONS, findNavItem } from './navigation.ts'
import type { ActiveView } from './navigation.ts'

// ── Home ──

function Home({ onNavigate }: { onNavigate: (view: ActiveView) => void }) {
  const patternCount = NAV_SECTIONS.filter(s => s.part <= 2).reduce((n, s) => n + s.items.length, 0)

  return (
    <div className="animate-fade-in">
      <div className="mb-12">
        <h1 className="text-4xl font-bold text-slate-100 mb-3">
          React Patterns Study Guide
        </h1>
        <p className="text-lg text-slate-400 max-w-2xl">
          Live demos of everyday UI patterns, each with a walkthrough, plus the concepts interviews ask about.
        </p>
      </div>

      <div className="grid grid-cols-1 md:grid-cols-2 gap-4 mb-12">
        {NAV_SECTIONS.map((section) => {
          const first = section.items[0]
          return (
            <button
              key={section.part}
              onClick={() => first && onNavigate({ part: section.part, section: first.id })}
              className="group text-left p-5 rounded-xl bg-slate-900/60 border border-slate-800 hover:border-slate-700 hover:bg-slate-800/60 transition-all"
            >
              <div className="flex items-center gap-3 mb-3">
                <span className="text-2xl">{section.icon}</span>
                <div>
                  <p className="text-xs text-slate-500 font-medium">Part {section.part}</p>
                  <h3 className="text-sm font-semibold text-slate-200 group-hover:text-slate-100">
                    {section.label}
                  </h3>
                </div>
              </div>
              <p className="text-xs text-slate-500">
                {section.items.length} {section.items.length === 1 ? 'section' : 'sections'}
              </p>
            </button>
          )
        })}
      </div>

      <div className="flex flex-wrap gap-6 text-sm text-slate-500">
        <span><strong className="text-slate-300">{patternCount}</strong> live demos</span>
        <span><strong className="text-slate-300">3</strong> concept guides</span>
      </div>

      <div className="mt-10 p-4 rounded-lg bg-slate-900/40 border border-slate-800/50">
        <p className="text-xs text-slate-500 mb-2 font-medium uppercase tracking-wider">Suggested path</p>
        <div className="flex items-center gap-2 text-sm text-slate-400 flex-wrap">
          <span className="text-cyan-400">UI Patterns</span>
          <span className="text-slate-600">&rarr;</span>
          <span className="text-teal-400">State &amp; Composition</span>
          <span className="text-slate-600">&rarr;</span>
          <span className="text-blue-400">Concepts</span>
          <span className="text-slate-600">&rarr;</span>
          <span className="text-rose-400">Interview Prep</span>
        </div>
      </div>
    </div>
  )
}

function NotFound() {
  return (
    <div className="animate-fade-in flex flex-col items-center justify-center py-32">
      <span className="text-5xl mb-4">❓</span>
      <h2 className="text-2xl font-bold mb-2 text-slate-400">Not Found</h2>
      <p className="text-slate-500 text-sm">There is no page here.</p>
    </div>
  )
}

const CONCEPT_GUIDES = {
  'guide-solid': solidGuide,
  'guide-acid': acidGuide,
  'guide-networking': networkingGuide,
} as const

function isConceptId(id: string): id is keyof typeof CONCEPT_GUIDES {
  return Object.hasOwn(CONCEPT_GUIDES, id)
}

// ── Content resolver ──

export function resolveContent(view: ActiveView, onNavigate: (view: ActiveView) => void) {
  if (view.part === 0 && view.section === 'home') {
    return <Home onNavigate={onNavigate} />
  }

  // Unknown part/section pairs fall through to Not Found
  if (!findNavItem(view)) {
    return <NotFound />
  }

  if (PATTERN_IDS.has(view.section)) {
    return <PatternExplorer activePattern={view.section} />
  }

  if (isConceptId(view.section)) {
    return <GuideShell guide={CONCEPT_GUIDES[view.section]} />
  }

  if (view.section === 'interview') {
    return <InterviewPage />
  }

  return <NotFound />
}

// ── App ──

export default function App({ initialView = DEFAULT_VIEW }: { initialView?: ActiveView }) {
  const [activeView, setActiveView] = useState<ActiveView>(initialView)
  const { theme } = useTheme()

  useEffect(() => {
    document.documentElement.classList.toggle('theme-light', theme === 'light')
  }, [theme])

  return (
    <div className="flex min-h-screen">
      <Sidebar activeView={activeView} onNavigate={setActiveView} />

      <main className="flex-1 ml-70 min-h-screen">
        <div className="max-w-5xl mx-auto px-8 py-10">
          <ErrorBoundary key={`${activeView.part}/${activeView.section}`} label="page">
            {resolveContent(activeView, setActiveView)}
          </ErrorBoundary>
        </div>
      </main>
    </div>
  )
}
