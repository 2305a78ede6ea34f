import type { Guide } from './types'

export const hocGuide: Guide = {
  id: 'guide-hoc',
  title: 'Higher-Order Components',
  subtitle: 'Functions that take a component and return a new one',
  color: 'indigo',
  icon: '🎁',
  sections: [
    {
      id: 'shape',
      title: 'The Shape',
      content: [
        {
          type: 'text',
          body: 'withLoading(UserCard) returns a component that accepts everything UserCard does plus loading. While loading is true it renders a spinner; otherwise it renders UserCard with the same props. The generic parameter keeps the wrapped component\'s props type checked at every call site.',
        },
        {
          type: 'code',
          language: 'tsx',
          code: `export function withLoading<P extends object>(Wrapped: ComponentType<P>) {
  function WithLoading(props: P & WithLoadingProps) {
    if (props.loading) return <Spinner />
    return <Wrapped {...props} />
  }
  WithLoading.displayName = \`withLoading(\${displayNameOf(Wrapped)})\`
  return WithLoading
}`,
        },
        {
          type: 'concept-card',
          term: 'displayName',
          explanation: 'Shows withLoading(UserCard) in React DevTools and error messages instead of an anonymous wrapper.',
        },
        {
          type: 'concept-card',
          term: 'Injected props',
          explanation: 'withAuth supplies user itself, so callers of the wrapped component never pass it.',
        },
      ],
    },
    {
      id: 'today',
      title: 'HOCs Today',
      content: [
        {
          type: 'comparison',
          leftLabel: 'HOC',
          rightLabel: 'Hook',
          rows: [
            { label: 'Adds', left: 'A wrapper component', right: 'Nothing to the tree' },
            { label: 'Prop collisions', left: 'Possible', right: 'None: values are returned' },
            { label: 'Still the right tool for', left: 'Error boundaries, auth gates', right: 'Sharing stateful logic' },
          ],
        },
        {
          type: 'callout',
          tone: 'warning',
          body: 'Create wrapped components once at module level. Calling withLoading(UserCard) inside render makes a new component type every time, and React remounts it on each render.',
        },
        {
          type: 'quiz',
          question: 'Why must error boundaries still be written as classes or wrapped by a HOC?',
          options: [
            'There is no hook for catching render errors in children',
            'Classes render faster',
            'Hooks cannot return JSX',
          ],
          correctIndex: 0,
          explanation: 'Only class components can implement getDerivedStateFromError and componentDidCatch. A HOC lets function components opt in without writing a class each time.',
        },
      ],
    },
  ],
  connections: [
    { concept: 'withLoading', file: 'src/hoc/withLoading.tsx', description: 'Spinner while loading' },
    { concept: 'withAuth', file: 'src/hoc/withAuth.tsx', description: 'Sign-in prompt or injected user' },
    { concept: 'withErrorBoundary', file: 'src/hoc/withErrorBoundary.tsx', description: 'Keeps a render error inside the wrapped component' },
  ],
}
