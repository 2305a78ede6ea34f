import { useState } from 'react'
import type { FormEvent } from 'react'
import { useTheme } from '../../context/ThemeContext.tsx'
import { useAuth } from '../../context/AuthContext.tsx'

// Neither the toolbar nor the panel takes props: the leaves read context directly.

function ThemeToggle() {
  const { theme, toggleTheme } = useTheme()
  return (
    <button
      onClick={toggleTheme}
      className="px-3 py-1 rounded-md bg-slate-800 hover:bg-slate-700 text-xs text-slate-200"
    >
      Switch to {theme === 'dark' ? 'light' : 'dark'} theme
    </button>
  )
}

function ThemeLabel() {
  const { theme } = useTheme()
  return <span className="text-xs text-slate-400">Current theme: <strong>{theme}</strong></span>
}

function Toolbar() {
  return (
    <div className="flex items-center justify-between gap-3 px-3 py-2 border-b border-slate-800">
      <ThemeLabel />
      <ThemeToggle />
    </div>
  )
}

function Greeting() {
  const { user, logout } = useAuth()
  if (!user) return <LoginForm />
  return (
    <div className="flex items-center gap-3">
      <p className="text-sm text-slate-200">Hello, {user.name}!</p>
      <button onClick={logout} className="text-xs text-slate-400 hover:text-slate-200">Log out</button>
    </div>
  )
}

function LoginForm() {
  const { login } = useAuth()
  const [name, setName] = useState('')
  const [error, setError] = useState<string | null>(null)

  function handleSubmit(e: FormEvent<HTMLFormElement>) {
    e.preventDefault()
    if (login(name)) {
      setError(null)
    } else {
      setError('Please enter a name')
    }
  }

  return (
    <form onSubmit={handleSubmit} className="flex items-center gap-2">
      <input
        value={name}
        onChange={(e) => setName(e.target.value)}
        aria-label="Name"
        placeholder="Name"
        className="px-2 py-1 rounded bg-slate-950 border border-slate-700 text-sm text-slate-200 outline-none"
      />
      <button type="submit" className="px-3 py-1 rounded bg-indigo-600 text-white text-xs">Log in</button>
      {error && <span role="alert" className="text-xs text-red-400">{error}</span>}
    </form>
  )
}

function Panel() {
  return (
    <div className="p-3">
      <Greeting />
    </div>
  )
}

export default function ContextDemo() {
  return (
    <div className="rounded-lg border border-slate-800 bg-slate-950/60">
      <Toolbar />
      <Panel />
    </div>
  )
}
