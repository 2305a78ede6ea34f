import type { ComponentType, ReactNode } from 'react'
import ErrorBoundary from '../components/shared/ErrorBoundary.tsx'
import type { ErrorFallbackProps } from '../components/shared/ErrorBoundary.tsx'
import { displayNameOf } from './withLoading.tsx'

export function withErrorBoundary<P extends object>(
  Wrapped: ComponentType<P>,
  fallback?: (props: ErrorFallbackProps) => ReactNode,
) {
  const name = displayNameOf(Wrapped)

  function WithErrorBoundary(props: P) {
    return (
      <ErrorBoundary fallback={fallback} label={name}>
        <Wrapped {...props} />
      </ErrorBoundary>
    )
  }
  WithErrorBoundary.displayName = `withErrorBoundary(${name})`
  return WithErrorBoundary
}
