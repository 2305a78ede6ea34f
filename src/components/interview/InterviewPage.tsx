import { useMemo, useState } from 'react'
import questions from '../../data/interview.json'
import { shuffle } from '../../utils/random.ts'
import DemoSection from '../shared/DemoSection.tsx'
import Glossary from './Glossary.tsx'

export type InterviewQuestion = {
  id: string
  topic: string
  question: string
  answer: string
}

export type Grade = 'known' | 'review'

export const INTERVIEW_QUESTIONS: readonly InterviewQuestion[] = questions

// Topics in order of first appearance
export function topicsOf(list: readonly InterviewQuestion[]): string[] {
  return [...new Set(list.map(q => q.topic))]
}

type InterviewPageProps = {
  entries?: readonly InterviewQuestion[]
  random?: () => number
}

export default function InterviewPage({ entries = INTERVIEW_QUESTIONS, random = Math.random }: InterviewPageProps) {
  const [topic, setTopic] = useState<string | null>(null)
  const [order, setOrder] = useState(() => entries.map(q => q.id))
  const [revealed, setRevealed] = useState<Set<string>>(new Set())
  const [grades, setGrades] = useState<Record<string, Grade>>({})

  const byId = useMemo(() => new Map(entries.map(q => [q.id, q])), [entries])
  const topics = useMemo(() => topicsOf(entries), [entries])

  const visible = order
    .map(id => byId.get(id))
    .filter((q): q is InterviewQuestion => q !== undefined && (topic === null || q.topic === topic))

  const gradeValues = Object.values(grades)
  const known = gradeValues.filter(g => g === 'known').length

  function reveal(id: string) {
    setRevealed(prev => new Set(prev).add(id))
  }

  function grade(id: string, value: Grade) {
    setGrades(prev => ({ ...prev, [id]: value }))
  }

  function resetScore() {
    setGrades({})
    setRevealed(new Set())
  }

  return (
    <div className="animate-fade-in">
      <div className="rounded-xl border border-rose-500/40 bg-rose-500/5 p-5 mb-8">
        <div className="flex items-center gap-3">
          <span className="text-3xl">🃏</span>
          <div>
            <h2 className="text-xl font-bold text-rose-400">Interview Prep</h2>
            <p className="text-sm text-slate-400 mt-0.5">Answer in your head, reveal, then be honest with yourself.</p>
          </div>
        </div>
      </div>

      <div className="flex flex-wrap items-center gap-2 mb-4">
        <div role="group" aria-label="Topics" className="flex flex-wrap gap-2">
          {[null, ...topics].map(t => (
            <button
              key={t ?? 'all'}
              onClick={() => setTopic(t)}
              aria-pressed={topic === t}
              className={`px-3 py-1 rounded-full text-xs capitalize border transition-colors ${
                topic === t
                  ? 'border-rose-400/60 bg-rose-500/10 text-rose-300'
                  : 'border-slate-700 text-slate-400 hover:text-slate-200'
              }`}
            >
              {t ?? 'all'}
            </button>
          ))}
        </div>
        <div className="flex-1" />
        <button
          onClick={() => setOrder(prev => shuffle(prev, random))}
          className="px-3 py-1 rounded bg-slate-800 hover:bg-slate-700 text-xs text-slate-200"
        >
          Shuffle
        </button>
      </div>

      <div className="flex items-center gap-3 mb-6 text-xs text-slate-400">
        <p role="status">
          Knew <strong className="text-slate-200">{known}</strong> of <strong className="text-slate-200">{gradeValues.length}</strong> graded
          {' '}({entries.length} questions)
        </p>
        {gradeValues.length > 0 && (
          <button onClick={resetScore} className="text-slate-500 hover:text-slate-300 underline">Reset score</button>
        )}
      </div>

      <ol aria-label="Questions" className="space-y-3 mb-12">
        {visible.map(q => {
          const isRevealed = revealed.has(q.id)
          const g = grades[q.id]
          return (
            <li key={q.id} className="rounded-lg border border-slate-800 bg-slate-900/50 p-4">
              <p className="text-[10px] text-slate-600 uppercase tracking-wider mb-1">{q.topic}</p>
              <p className="text-sm font-medium text-slate-200 mb-3">{q.question}</p>
              {isRevealed ? (
                <>
                  <p className="text-sm text-slate-400 leading-relaxed mb-3">{q.answer}</p>
                  <div className="flex items-center gap-2">
                    <button
                      onClick={() => grade(q.id, 'known')}
                      aria-pressed={g === 'known'}
                      className={`px-3 py-1 rounded text-xs ${g === 'known' ? 'bg-emerald-600 text-white' : 'bg-slate-800 text-slate-300'}`}
                    >
                      I knew it
                    </button>
                    <button
                      onClick={() => grade(q.id, 'review')}
                      aria-pressed={g === 'review'}
                      className={`px-3 py-1 rounded text-xs ${g === 'review' ? 'bg-amber-600 text-white' : 'bg-slate-800 text-slate-300'}`}
                    >
                      Review again
                    </button>
                  </div>
                </>
              ) : (
                <button
                  onClick={() => reveal(q.id)}
                  className="px-3 py-1 rounded bg-slate-800 hover:bg-slate-700 text-xs text-slate-200"
                >
                  Reveal answer
                </button>
              )}
            </li>
          )
        })}
      </ol>

      <DemoSection id="glossary" title="Glossary" description="Terms used across the guides.">
        <Glossary />
      </DemoSection>
    </div>
  )
}
