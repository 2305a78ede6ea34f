import { describe, it, expect, vi } from 'vitest'
import { render, screen } from '@testing-library/react'
import userEvent from '@testing-library/user-event'
import { withLoading } from '../hoc/withLoading.tsx'
import { withAuth } from '../hoc/withAuth.tsx'
import type { WithAuthProps } from '../hoc/withAuth.tsx'
import { withErrorBoundary } from '../hoc/withErrorBoundary.tsx'
import { AuthProvider } from '../context/AuthContext.tsx'

function Greeting({ name }: { name: string }) {
  return <p>Hello {name}</p>
}

function Badge({ label, user }: { label: string } & WithAuthProps) {
  return <p>{label}: {user.name}</p>
}

function Bomb({ armed }: { armed: boolean }) {
  if (armed) throw new Error('kaboom')
  return <p>Defused</p>
}

describe('withLoading', () => {
  const LoadingGreeting = withLoading(Greeting)

  it('names the wrapper after the wrapped component', () => {
    expect(LoadingGreeting.displayName).toBe('withLoading(Greeting)')
  })

  it('shows the spinner while loading', () => {
    const { rerender } = render(<LoadingGreeting name="Ada" loading />)
    expect(screen.getByRole('status')).toHaveTextContent('Loading…')
    expect(screen.queryByText('Hello Ada')).not.toBeInTheDocument()

    rerender(<LoadingGreeting name="Ada" loading={false} />)
    expect(screen.getByText('Hello Ada')).toBeInTheDocument()
  })
})

describe('withAuth', () => {
  const SecureBadge = withAuth<{ label: string }>(Badge)

  it('asks anonymous visitors to sign in', () => {
    render(<AuthProvider><SecureBadge label="Member" /></AuthProvider>)
    expect(screen.getByText('Sign in to see this content.')).toBeInTheDocument()
  })

  it('injects the signed-in user', () => {
    render(<AuthProvider initialUser={{ name: 'Grace' }}><SecureBadge label="Member" /></AuthProvider>)
    expect(screen.getByText('Member: Grace')).toBeInTheDocument()
    expect(SecureBadge.displayName).toBe('withAuth(Badge)')
  })
})

describe('withErrorBoundary', () => {
  const SafeBomb = withErrorBoundary(Bomb)

  it('renders the fallback and logs the failure', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    render(<SafeBomb armed />)

    expect(screen.getByRole('alert')).toHaveTextContent('kaboom')
    expect(error).toHaveBeenCalledWith('Render failed in Bomb:', expect.any(Error), expect.anything())
    expect(SafeBomb.displayName).toBe('withErrorBoundary(Bomb)')
  })

  it('uses a custom fallback and can recover', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const user = userEvent.setup()
    const Custom = withErrorBoundary(Bomb, ({ reset }) => <button onClick={reset}>Retry</button>)

    const { rerender } = render(<Custom armed />)
    rerender(<Custom armed={false} />)
    await user.click(screen.getByRole('button', { name: 'Retry' }))
    expect(screen.getByText('Defused')).toBeInTheDocument()
  })
})
