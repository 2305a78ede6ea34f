import { createContext, useCallback, useContext, useMemo } from 'react'
import type { ReactNode } from 'react'
import { useLocalStorage } from '../hooks/useLocalStorage.ts'
import { storageKey } from '../config.ts'

// Quiz results keyed by "<guide id>/<section id>/<block index>"
type ProgressRecord = Record<string, boolean>

function isProgressRecord(value: unknown): value is ProgressRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    && Object.values(value).every(v => typeof v === 'boolean')
}

type ProgressContextValue = {
  results: ProgressRecord
  answered: number
  correct: number
  recordAnswer: (key: string, correct: boolean) => void
  reset: () => void
}

const ProgressContext = createContext<ProgressContextValue | null>(null)

export function ProgressProvider({ children }: { children: ReactNode }) {
  const [results, setResults, clear] = useLocalStorage<ProgressRecord>(storageKey('progress'), {}, isProgressRecord)

  const recordAnswer = useCallback((key: string, correct: boolean) => {
    setResults(prev => ({ ...prev, [key]: correct }))
  }, [setResults])

  const value = useMemo(() => {
    const outcomes = Object.values(results)
    return {
      results,
      answered: outcomes.length,
      correct: outcomes.filter(Boolean).length,
      recordAnswer,
      reset: clear,
    }
  }, [results, recordAnswer, clear])

  return <ProgressContext.Provider value={value}>{children}</ProgressContext.Provider>
}

/**
 * Progress is optional: components rendered outside a provider (tests,
 * isolated demos) get null and simply don't record.
 */
export function useProgress(): ProgressContextValue | null {
  return useContext(ProgressContext)
}
