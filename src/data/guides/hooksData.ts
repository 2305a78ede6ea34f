import type { Guide } from './types'

export const hooksGuide: Guide = {
  id: 'guide-hooks',
  title: 'Custom Hooks',
  subtitle: 'Package stateful logic as a function whose name starts with "use"',
  color: 'orange',
  icon: '🪝',
  sections: [
    {
      id: 'what',
      title: 'What a Custom Hook Is',
      content: [
        {
          type: 'text',
          body: 'A custom hook is an ordinary function that calls other hooks. Each component that calls it gets its own copy of the state inside. Nothing is shared unless the hook reads from context or a module-level store.',
        },
        {
          type: 'concept-card',
          term: 'useDebounce',
          explanation: 'Returns the value once it has stopped changing for a delay.',
          example: 'const q = useDebounce(input, 300)',
        },
        {
          type: 'concept-card',
          term: 'useThrottle',
          explanation: 'Lets the value through at most once per interval, including the last one.',
        },
        {
          type: 'concept-card',
          term: 'usePrevious',
          explanation: 'Remembers the value from the last render in a ref.',
        },
        {
          type: 'concept-card',
          term: 'useLocalStorage',
          explanation: 'useState that reads its initial value from localStorage and writes back on change.',
        },
        {
          type: 'concept-card',
          term: 'useFetch',
          explanation: 'Runs an async function when its dependencies change and aborts the previous run.',
        },
        {
          type: 'concept-card',
          term: 'useInterval',
          explanation: 'setInterval that always calls the latest callback; a null delay pauses it.',
        },
      ],
    },
    {
      id: 'stale',
      title: 'Stale Closures',
      content: [
        {
          type: 'text',
          body: 'An interval callback created on the first render keeps seeing the state of the first render. useInterval stores the latest callback in a ref on every render and the interval calls through the ref, so the timer is never restarted just because the callback changed.',
        },
        {
          type: 'code',
          language: 'typescript',
          code: `const saved = useRef(callback)
useEffect(() => { saved.current = callback }, [callback])

useEffect(() => {
  if (delay === null) return
  const id = setInterval(() => saved.current(), delay)
  return () => clearInterval(id)
}, [delay])`,
        },
        {
          type: 'callout',
          tone: 'info',
          body: 'Hooks must be called in the same order on every render: never inside a condition or a loop.',
        },
        {
          type: 'quiz',
          question: 'Two components call useLocalStorage with the same key. Do they share React state?',
          options: ['Yes, hooks share state by key', 'No, each call has its own state; only storage is shared', 'Only in Strict Mode'],
          correctIndex: 1,
          explanation: 'Each hook call owns its state. They read the same storage entry on mount but do not update each other afterwards.',
        },
      ],
    },
  ],
  connections: [
    { concept: 'Hook library', file: 'src/hooks/index.ts', description: 'Every hook used by the demos' },
    { concept: 'Side by side', file: 'src/components/demos/CustomHooksDemo.tsx', description: 'Debounce, throttle, previous, storage and fetch' },
  ],
}
