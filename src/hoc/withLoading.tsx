import type { ComponentType } from 'react'

export type WithLoadingProps = {
  loading: boolean
}

export function Spinner({ label = 'Loading…' }: { label?: string }) {
  return (
    <div role="status" className="flex items-center gap-2 text-xs text-slate-400 py-2">
      <span className="w-3 h-3 rounded-full border-2 border-slate-600 border-t-indigo-400 animate-spin" />
      <span>{label}</span>
    </div>
  )
}

/**
 * Adds a `loading` prop; while it is true the spinner renders instead of
 * the wrapped component. The prop is passed through unchanged otherwise.
 */
export function withLoading<P extends object>(Wrapped: ComponentType<P>) {
  function WithLoading(props: P & WithLoadingProps) {
    if (props.loading) return <Spinner />
    return <Wrapped {...props} />
  }
  WithLoading.displayName = `withLoading(${displayNameOf(Wrapped)})`
  return WithLoading
}

export function displayNameOf(component: { displayName?: string; name?: string }): string {
  return component.displayName ?? (component.name || 'Component')
}
