import type { Guide } from './types'

export const contextGuide: Guide = {
  id: 'guide-context',
  title: 'Context',
  subtitle: 'Share values with a whole subtree without passing props through every level',
  color: 'teal',
  icon: '🧩',
  sections: [
    {
      id: 'drilling',
      title: 'Prop Drilling',
      content: [
        {
          type: 'text',
          body: 'When a value is needed five components down, every component in between has to accept and forward it. Context lets the provider at the top make the value available and the consumer at the bottom read it directly.',
        },
        {
          type: 'diagram',
          nodes: [
            { id: 'provider', label: 'ThemeProvider', icon: '🎨' },
            { id: 'page', label: 'Page', icon: '📄' },
            { id: 'toolbar', label: 'Toolbar', icon: '🧰' },
            { id: 'toggle', label: 'ThemeToggle', icon: '🌗' },
          ],
          connections: [
            { from: 'provider', to: 'page' },
            { from: 'page', to: 'toolbar' },
            { from: 'toolbar', to: 'toggle', label: 'useTheme()' },
          ],
        },
        {
          type: 'code',
          language: 'typescript',
          code: `const ThemeContext = createContext<ThemeContextValue | null>(null)

export function useTheme(): ThemeContextValue {
  const ctx = useContext(ThemeContext)
  if (!ctx) throw new Error('useTheme must be used within a ThemeProvider')
  return ctx
}`,
          caption: 'A null default plus a throwing hook catches a missing provider at the first render',
        },
      ],
    },
    {
      id: 'renders',
      title: 'Re-renders',
      content: [
        {
          type: 'concept-card',
          term: 'Memoised value',
          explanation: 'Wrap the provider value in useMemo so a parent re-render does not hand every consumer a new object.',
        },
        {
          type: 'concept-card',
          term: 'Split contexts',
          explanation: 'Theme, auth and quiz progress live in separate providers so a theme switch does not re-render auth consumers.',
        },
        {
          type: 'comparison',
          leftLabel: 'Context',
          rightLabel: 'Redux store',
          rows: [
            { label: 'Good for', left: 'Rarely changing, app-wide values', right: 'Frequently changing shared state' },
            { label: 'Subscriptions', left: 'All consumers re-render', right: 'Selectors re-render only on change' },
            { label: 'Side effects', left: 'In components', right: 'Middleware such as sagas' },
          ],
        },
        {
          type: 'quiz',
          question: 'A provider passes value={{ theme, toggleTheme }} without useMemo. What happens when its parent re-renders?',
          options: ['Nothing', 'Every consumer re-renders because the value is a new object', 'React throws'],
          correctIndex: 1,
          explanation: 'Context compares values by identity. A fresh object literal is a new value on each render.',
        },
      ],
    },
  ],
  connections: [
    { concept: 'Theme', file: 'src/context/ThemeContext.tsx', description: 'Persisted light/dark theme' },
    { concept: 'Auth', file: 'src/context/AuthContext.tsx', description: 'In-memory demo user' },
    { concept: 'Quiz progress', file: 'src/context/ProgressContext.tsx', description: 'Answers recorded by every quiz in the guides' },
  ],
}
