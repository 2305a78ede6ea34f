import { describe, it, expect, vi } from 'vitest'
import { act, render, renderHook, screen } from '@testing-library/react'
import userEvent from '@testing-library/user-event'
import type { ReactNode } from 'react'
import { ThemeProvider, useTheme } from '../context/ThemeContext.tsx'
import { AuthProvider, useAuth } from '../context/AuthContext.tsx'
import { ProgressProvider, useProgress } from '../context/ProgressContext.tsx'
import QuizBlock from '../components/shared/QuizBlock.tsx'
import ErrorBoundary from '../components/shared/ErrorBoundary.tsx'
import { toErrorMessage } from '../utils/errors.ts'

// Renders the hook outside any provider and shows what it threw
function renderOrphan(useHook: () => unknown) {
  function Probe() {
    useHook()
    return null
  }
  vi.spyOn(console, 'error').mockImplementation(() => {})
  render(
    <ErrorBoundary fallback={({ error }) => <p role="alert">{toErrorMessage(error)}</p>}>
      <Probe />
    </ErrorBoundary>,
  )
  return screen.getByRole('alert')
}

describe('ThemeProvider', () => {
  it('toggles and persists the theme', () => {
    const wrapper = ({ children }: { children: ReactNode }) => <ThemeProvider>{children}</ThemeProvider>
    const { result } = renderHook(() => useTheme(), { wrapper })
    expect(result.current.theme).toBe('dark')

    act(() => { result.current.toggleTheme() })
    expect(result.current.theme).toBe('light')
    expect(localStorage.getItem('study-guide-theme')).toBe('"light"')
  })

  it('starts from the stored theme', () => {
    localStorage.setItem('study-guide-theme', '"light"')
    const wrapper = ({ children }: { children: ReactNode }) => <ThemeProvider>{children}</ThemeProvider>
    const { result } = renderHook(() => useTheme(), { wrapper })
    expect(result.current.theme).toBe('light')
  })

  it('ignores a stored theme it does not know', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    localStorage.setItem('study-guide-theme', '"sepia"')
    const wrapper = ({ children }: { children: ReactNode }) => <ThemeProvider>{children}</ThemeProvider>
    const { result } = renderHook(() => useTheme(), { wrapper })
    expect(result.current.theme).toBe('dark')
  })

  it('throws outside a provider', () => {
    expect(renderOrphan(useTheme)).toHaveTextContent('useTheme must be used within a ThemeProvider')
  })
})

describe('AuthProvider', () => {
  const wrapper = ({ children }: { children: ReactNode }) => <AuthProvider>{children}</AuthProvider>

  it('rejects a blank name and trims a real one', () => {
    const { result } = renderHook(() => useAuth(), { wrapper })

    let accepted = true
    act(() => { accepted = result.current.login('   ') })
    expect(accepted).toBe(false)
    expect(result.current.user).toBeNull()

    act(() => { accepted = result.current.login('  Ada ') })
    expect(accepted).toBe(true)
    expect(result.current.user).toEqual({ name: 'Ada' })

    act(() => { result.current.logout() })
    expect(result.current.user).toBeNull()
  })

  it('throws outside a provider', () => {
    expect(renderOrphan(useAuth)).toHaveTextContent('useAuth must be used within an AuthProvider')
  })
})

describe('ProgressProvider', () => {
  const wrapper = ({ children }: { children: ReactNode }) => <ProgressProvider>{children}</ProgressProvider>

  it('keeps the latest answer per quiz', () => {
    const { result } = renderHook(() => useProgress(), { wrapper })

    act(() => {
      result.current?.recordAnswer('guide/a/0', true)
      result.current?.recordAnswer('guide/a/1', false)
    })
    expect(result.current?.answered).toBe(2)
    expect(result.current?.correct).toBe(1)

    act(() => { result.current?.recordAnswer('guide/a/1', true) })
    expect(result.current?.correct).toBe(2)
    expect(JSON.parse(localStorage.getItem('study-guide-progress') ?? '{}')).toEqual({
      'guide/a/0': true,
      'guide/a/1': true,
    })

    act(() => { result.current?.reset() })
    expect(result.current?.answered).toBe(0)
    expect(localStorage.getItem('study-guide-progress')).toBeNull()
  })

  it('starts empty when the stored record is malformed', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    for (const stored of ['null', '{"guide/a/0":"yes"}']) {
      localStorage.setItem('study-guide-progress', stored)
      const { result, unmount } = renderHook(() => useProgress(), { wrapper })
      expect(result.current?.answered).toBe(0)
      unmount()
    }
    expect(warn).toHaveBeenCalledTimes(2)
  })

  it('is null outside a provider', () => {
    const { result } = renderHook(() => useProgress())
    expect(result.current).toBeNull()
  })
})

describe('QuizBlock', () => {
  function Score() {
    const progress = useProgress()
    return <p data-testid="score">{progress?.correct}/{progress?.answered}</p>
  }

  it('locks after one answer and records it', async () => {
    const user = userEvent.setup()
    render(
      <ProgressProvider>
        <QuizBlock quizKey="g/s/0" question="Pick B" options={['A', 'B']} correctIndex={1} explanation="B is right." />
        <Score />
      </ProgressProvider>,
    )

    await user.click(screen.getByRole('button', { name: /A\.\s*A/ }))
    expect(screen.getByText('Not quite')).toBeInTheDocument()
    expect(screen.getByText('B is right.')).toBeInTheDocument()
    expect(screen.getByRole('button', { name: /B\.\s*B/ })).toBeDisabled()
    expect(screen.getByTestId('score')).toHaveTextContent('0/1')
  })
})
