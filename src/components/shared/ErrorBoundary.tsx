import { Component } from 'react'
import type { ErrorInfo, ReactNode } from 'react'
import { toErrorMessage } from '../../utils/errors.ts'

export type ErrorFallbackProps = {
  error: unknown
  reset: () => void
}

type ErrorBoundaryProps = {
  children: ReactNode
  fallback?: (props: ErrorFallbackProps) => ReactNode
  label?: string               // shows up in the console message
}

type ErrorBoundaryState = {
  error: unknown
  hasError: boolean
}

export function DefaultErrorFallback({ error, reset }: ErrorFallbackProps) {
  return (
    <div role="alert" className="rounded-lg border border-red-500/30 bg-red-500/5 p-4">
      <p className="text-sm font-medium text-red-400 mb-1">Something went wrong</p>
      <p className="text-xs text-slate-400 mb-3">{toErrorMessage(error)}</p>
      <button
        onClick={reset}
        className="px-3 py-1 rounded-md bg-slate-800 hover:bg-slate-700 text-xs text-slate-200 transition-colors"
      >
        Try again
      </button>
    </div>
  )
}

export default class ErrorBoundary extends Component<ErrorBoundaryProps, ErrorBoundaryState> {
  state: ErrorBoundaryState = { error: null, hasError: false }

  static getDerivedStateFromError(error: unknown): ErrorBoundaryState {
    return { error, hasError: true }
  }

  componentDidCatch(error: Error, info: ErrorInfo) {
    console.error(`Render failed in ${this.props.label ?? 'component'}:`, error, info.componentStack)
  }

  reset = () => {
    this.setState({ error: null, hasError: false })
  }

  render() {
    if (this.state.hasError) {
      const fallback = this.props.fallback ?? DefaultErrorFallback
      return fallback({ error: this.state.error, reset: this.reset })
    }
    return this.props.children
  }
}
