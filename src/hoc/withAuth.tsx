import type { ComponentType } from 'react'
import { useAuth } from '../context/AuthContext.tsx'
import type { AuthUser } from '../context/AuthContext.tsx'
import { displayNameOf } from './withLoading.tsx'

export type WithAuthProps = {
  user: AuthUser
}

/**
 * Renders the wrapped component only for a signed-in user, injecting `user`.
 *
 * `P` is the wrapped component's own props, without `user`:
 *   const SecretPanel = withAuth<{ title: string }>(Panel)
 */
export function withAuth<P extends object>(Wrapped: ComponentType<P & WithAuthProps>) {
  function WithAuth(props: P) {
    const { user } = useAuth()
    if (!user) {
      return (
        <p className="text-xs text-amber-300/80 px-3 py-2 rounded-md bg-amber-500/5 border border-amber-500/20">
          Sign in to see this content.
        </p>
      )
    }
    return <Wrapped {...props} user={user} />
  }
  WithAuth.displayName = `withAuth(${displayNameOf(Wrapped)})`
  return WithAuth
}
