import { useState } from 'react'
import type { FormEvent, ReactNode } from 'react'
import { Link, MemoryRouter, Navigate, NavLink, Outlet, Route, Routes, useLocation, useNavigate, useParams } from 'react-router-dom'
import { useAuth } from '../../context/AuthContext.tsx'

export const POSTS = [
  { id: '1', title: 'Thinking in components', body: 'Break the UI into a tree of small pieces, each owning its own markup.' },
  { id: '2', title: 'Lifting state up', body: 'When two siblings need the same data, move it to their closest common parent.' },
  { id: '3', title: 'Effects are for syncing', body: 'useEffect connects a component to something outside React: timers, sockets, the DOM.' },
]

/**
 * Where the login page should send the user afterwards.
 */
export function redirectTarget(state: unknown, fallback = '/dashboard'): string {
  if (typeof state === 'object' && state !== null && 'from' in state && typeof state.from === 'string') {
    return state.from
  }
  return fallback
}

// ── Route guard ──

export function RequireAuth({ children }: { children: ReactNode }) {
  const { user } = useAuth()
  const location = useLocation()

  if (!user) {
    return <Navigate to="/login" replace state={{ from: location.pathname }} />
  }
  return children
}

// ── Pages ──

function HomePage() {
  return <p className="text-sm text-slate-300">Welcome. Pick a route above; the address bar shows where you are.</p>
}

function PostsPage() {
  return (
    <ul className="space-y-1">
      {POSTS.map((post) => (
        <li key={post.id}>
          <Link to={`/posts/${post.id}`} className="text-sm text-indigo-400 hover:underline">{post.title}</Link>
        </li>
      ))}
    </ul>
  )
}

function PostPage() {
  const { postId } = useParams()
  const post = POSTS.find(p => p.id === postId)

  if (!post) {
    return (
      <div>
        <p className="text-sm text-slate-300">Post not found</p>
        <Link to="/posts" className="text-xs text-indigo-400">Back to posts</Link>
      </div>
    )
  }

  return (
    <article>
      <h4 className="text-sm font-semibold text-slate-100 mb-1">{post.title}</h4>
      <p className="text-xs text-slate-400 mb-2">{post.body}</p>
      <Link to="/posts" className="text-xs text-indigo-400">Back to posts</Link>
    </article>
  )
}

function AboutPage() {
  return <p className="text-sm text-slate-300">This router lives in memory, so it never touches the real address bar.</p>
}

function DashboardPage() {
  const { user } = useAuth()
  return <p className="text-sm text-slate-300">Dashboard for {user?.name}</p>
}

function LoginPage() {
  const { login } = useAuth()
  const location = useLocation()
  const navigate = useNavigate()
  const [name, setName] = useState('')

  function handleSubmit(e: FormEvent<HTMLFormElement>) {
    e.preventDefault()
    if (login(name)) {
      navigate(redirectTarget(location.state), { replace: true })
    }
  }

  return (
    <form onSubmit={handleSubmit} className="flex items-center gap-2">
      <input
        value={name}
        onChange={(e) => setName(e.target.value)}
        aria-label="Your name"
        placeholder="Your name"
        className="px-2 py-1 rounded bg-slate-950 border border-slate-700 text-sm text-slate-200 outline-none"
      />
      <button type="submit" className="px-3 py-1 rounded bg-indigo-600 text-white text-xs">Sign in</button>
    </form>
  )
}

function NotFoundPage() {
  return <p className="text-sm text-slate-300">404: nothing lives here.</p>
}

// ── Layout ──

const NAV_LINKS = [
  { to: '/', label: 'Home', end: true },
  { to: '/posts', label: 'Posts', end: false },
  { to: '/about', label: 'About', end: false },
  { to: '/dashboard', label: 'Dashboard', end: false },
]

function Layout() {
  const location = useLocation()
  const { user, logout } = useAuth()

  return (
    <div className="rounded-lg border border-slate-800 overflow-hidden">
      <div className="px-3 py-1.5 bg-slate-900/80 border-b border-slate-800 font-mono text-[11px] text-slate-400">
        <span className="text-slate-600">app://</span>
        <span data-testid="location">{location.pathname}</span>
      </div>
      <nav aria-label="Demo routes" className="flex items-center gap-1 px-3 py-2 border-b border-slate-800">
        {NAV_LINKS.map((link) => (
          <NavLink
            key={link.to}
            to={link.to}
            end={link.end}
            className={({ isActive }) =>
              `px-2 py-1 rounded text-xs ${isActive ? 'bg-indigo-500/20 text-indigo-300' : 'text-slate-400 hover:text-slate-200'}`
            }
          >
            {link.label}
          </NavLink>
        ))}
        <span className="flex-1" />
        {user ? (
          <button onClick={logout} className="text-xs text-slate-400 hover:text-slate-200">Sign out {user.name}</button>
        ) : (
          <NavLink to="/login" className="text-xs text-slate-400 hover:text-slate-200">Sign in</NavLink>
        )}
      </nav>
      <div className="p-4 min-h-24">
        <Outlet />
      </div>
    </div>
  )
}

// ── RoutingDemo ──

export default function RoutingDemo({ initialPath = '/' }: { initialPath?: string }) {
  return (
    <MemoryRouter initialEntries={[initialPath]}>
      <Routes>
        <Route element={<Layout />}>
          <Route index element={<HomePage />} />
          <Route path="posts" element={<PostsPage />} />
          <Route path="posts/:postId" element={<PostPage />} />
          <Route path="about" element={<AboutPage />} />
          <Route path="login" element={<LoginPage />} />
          <Route
            path="dashboard"
            element={
              <RequireAuth>
                <DashboardPage />
              </RequireAuth>
            }
          />
          <Route path="*" element={<NotFoundPage />} />
        </Route>
      </Routes>
    </MemoryRouter>
  )
}
