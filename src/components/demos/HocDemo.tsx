import { useEffect, useState } from 'react'
import { withLoading } from '../../hoc/withLoading.tsx'
import { withAuth } from '../../hoc/withAuth.tsx'
import type { WithAuthProps } from '../../hoc/withAuth.tsx'
import { withErrorBoundary } from '../../hoc/withErrorBoundary.tsx'
import { useAuth } from '../../context/AuthContext.tsx'
import { SAMPLE_USERS } from '../../services/usersApi.ts'
import type { User } from '../../services/usersApi.ts'
import DemoSection from '../shared/DemoSection.tsx'

const RELOAD_MS = 800

function UserCard({ user }: { user: User }) {
  return (
    <div className="px-4 py-3 rounded-lg bg-slate-900/60 border border-slate-800">
      <p className="text-sm font-medium text-slate-200">{user.name}</p>
      <p className="text-xs text-slate-500">{user.email}</p>
    </div>
  )
}

export const UserCardWithLoading = withLoading(UserCard)

function NoteCard({ note, user }: { note: string } & WithAuthProps) {
  return (
    <div className="px-4 py-3 rounded-lg bg-emerald-500/5 border border-emerald-500/20">
      <p className="text-xs text-emerald-300 mb-1">For {user.name} only</p>
      <p className="text-sm text-slate-300">{note}</p>
    </div>
  )
}

export const SecretNote = withAuth<{ note: string }>(NoteCard)

function FragileWidget({ explode }: { explode: boolean }) {
  if (explode) {
    throw new Error('The widget exploded')
  }
  return <p className="text-sm text-slate-300">The widget is working.</p>
}

export const SafeWidget = withErrorBoundary(FragileWidget)

function LoadingSection() {
  const [loading, setLoading] = useState(false)
  const [index, setIndex] = useState(0)

  useEffect(() => {
    if (!loading) return
    const timer = setTimeout(() => {
      setIndex(i => (i + 1) % SAMPLE_USERS.length)
      setLoading(false)
    }, RELOAD_MS)
    return () => clearTimeout(timer)
  }, [loading])

  const user = SAMPLE_USERS[index]

  return (
    <DemoSection id="withloading" title="withLoading" description="Adds a loading prop that swaps the card for a spinner.">
      <div className="flex items-center gap-3">
        <div className="flex-1">{user && <UserCardWithLoading user={user} loading={loading} />}</div>
        <button
          onClick={() => setLoading(true)}
          disabled={loading}
          className="px-3 py-1 rounded bg-slate-800 hover:bg-slate-700 text-xs text-slate-200 disabled:opacity-50"
        >
          Next user
        </button>
      </div>
    </DemoSection>
  )
}

function AuthSection() {
  const { user, login, logout } = useAuth()

  return (
    <DemoSection id="withauth" title="withAuth" description="Injects the signed-in user, or shows a prompt.">
      <div className="flex items-center gap-3">
        <div className="flex-1"><SecretNote note="The quiz answers are not in the source." /></div>
        {user ? (
          <button onClick={logout} className="px-3 py-1 rounded bg-slate-800 text-xs text-slate-200">Sign out</button>
        ) : (
          <button onClick={() => login('Guest')} className="px-3 py-1 rounded bg-indigo-600 text-xs text-white">Sign in as Guest</button>
        )}
      </div>
    </DemoSection>
  )
}

function ErrorBoundarySection() {
  const [explode, setExplode] = useState(false)
  const [resetKey, setResetKey] = useState(0)

  const repair = () => {
    setExplode(false)
    setResetKey(k => k + 1)
  }

  return (
    <DemoSection id="witherrorboundary" title="withErrorBoundary" description="A render error stays inside the wrapped component.">
      <div className="space-y-3">
        <SafeWidget key={resetKey} explode={explode} />
        <div className="flex gap-2">
          <button onClick={() => setExplode(true)} className="px-3 py-1 rounded bg-red-600/80 text-xs text-white">Break it</button>
          <button onClick={repair} className="px-3 py-1 rounded bg-slate-800 text-xs text-slate-200">Repair &amp; retry</button>
        </div>
      </div>
    </DemoSection>
  )
}

export default function HocDemo() {
  return (
    <div className="space-y-8">
      <LoadingSection />
      <AuthSection />
      <ErrorBoundarySection />
    </div>
  )
}
