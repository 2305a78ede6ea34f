import { afterEach, describe, it, expect } from 'vitest'
import { render, screen, within } from '@testing-library/react'
import userEvent from '@testing-library/user-event'
import App from '../App.tsx'
import PatternExplorer from '../components/PatternExplorer.tsx'
import { ThemeProvider } from '../context/ThemeContext.tsx'
import { AuthProvider } from '../context/AuthContext.tsx'
import { ProgressProvider } from '../context/ProgressContext.tsx'
import { solidGuide } from '../data/guides/index.ts'
import type { ActiveView } from '../navigation.ts'

function renderApp(initialView?: ActiveView) {
  const user = userEvent.setup()
  render(
    <ThemeProvider>
      <AuthProvider>
        <ProgressProvider>
          <App initialView={initialView} />
        </ProgressProvider>
      </AuthProvider>
    </ThemeProvider>,
  )
  const nav = () => within(screen.getByRole('navigation', { name: 'Main' }))
  return { user, nav }
}

afterEach(() => {
  document.documentElement.classList.remove('theme-light')
})

describe('App', () => {
  it('starts on the home page', () => {
    renderApp()
    expect(screen.getByRole('heading', { level: 1, name: 'React Patterns Study Guide' })).toBeInTheDocument()
    expect(screen.getByText('live demos')).toHaveTextContent('12 live demos')
  })

  it('opens a pattern with its live demo from the sidebar', async () => {
    const { user, nav } = renderApp()

    await user.click(nav().getByRole('button', { name: /Stopwatch$/ }))

    expect(screen.getByRole('heading', { level: 2, name: 'Stopwatch' })).toBeInTheDocument()
    const demo = screen.getByRole('region', { name: 'Live demo' })
    expect(within(demo).getByRole('timer')).toHaveTextContent('00:00.00')
    expect(nav().getByRole('button', { name: /Stopwatch$/ })).toHaveAttribute('aria-current', 'page')

    await user.click(nav().getByRole('button', { name: /Home$/ }))
    expect(screen.getByRole('heading', { level: 1 })).toHaveTextContent('React Patterns Study Guide')
  })

  it('records quiz answers from a concept guide', async () => {
    const { user, nav } = renderApp()
    expect(screen.getByTestId('quiz-progress')).toHaveTextContent('No quizzes answered yet')

    const concepts = nav().getByRole('button', { name: /Concepts/ })
    expect(concepts).toHaveAttribute('aria-expanded', 'false')
    await user.click(concepts)
    await user.click(nav().getByRole('button', { name: /SOLID$/ }))
    expect(screen.getByRole('heading', { level: 2, name: solidGuide.title })).toBeInTheDocument()

    const answer = screen.getAllByRole('button').find(b => b.textContent === 'B.Liskov Substitution')
    expect(answer).toBeDefined()
    if (answer) await user.click(answer)

    expect(screen.getByText('Correct!')).toBeInTheDocument()
    expect(screen.getByTestId('quiz-progress')).toHaveTextContent('Quizzes: 1/1 correct')
  })

  it('jumps straight to a single-item part', async () => {
    const { user, nav } = renderApp()

    await user.click(nav().getByRole('button', { name: /Interview Prep/ }))
    expect(screen.getByRole('heading', { level: 2, name: 'Interview Prep' })).toBeInTheDocument()
    expect(screen.getByRole('list', { name: 'Questions' })).toBeInTheDocument()
  })

  it('toggles the light theme on the document', async () => {
    const { user } = renderApp()

    await user.click(screen.getByRole('button', { name: '☀️ Light' }))
    expect(document.documentElement).toHaveClass('theme-light')

    await user.click(screen.getByRole('button', { name: '🌙 Dark' }))
    expect(document.documentElement).not.toHaveClass('theme-light')
  })

  it('collapses the sidebar and remembers it', async () => {
    const { user } = renderApp()

    await user.click(screen.getByRole('button', { name: 'Collapse sidebar' }))
    expect(screen.getByRole('button', { name: 'Expand sidebar' })).toBeInTheDocument()
    expect(screen.queryByTestId('quiz-progress')).not.toBeInTheDocument()
    expect(localStorage.getItem('study-guide-sidebar-collapsed')).toBe('true')
  })

  it('shows Not Found for an unknown view', () => {
    renderApp({ part: 3, section: 'nope' })
    expect(screen.getByRole('heading', { name: 'Not Found' })).toBeInTheDocument()
  })
})

describe('PatternExplorer', () => {
  it('handles an unknown pattern id', () => {
    render(<PatternExplorer activePattern="nope" />)
    expect(screen.getByText('Pattern not found')).toBeInTheDocument()
  })
})
