import type { Guide } from './types'

export const solidGuide: Guide = {
  id: 'guide-solid',
  title: 'SOLID Principles',
  subtitle: 'Five design principles, seen through React components',
  color: 'blue',
  icon: '🏛️',
  sections: [
    {
      id: 'principles',
      title: 'The Five Principles',
      content: [
        {
          type: 'concept-card',
          term: 'Single Responsibility',
          explanation: 'One reason to change. Fetching, state transitions and rendering live in separate units.',
          example: 'useInfiniteScroll fetches; FeedList renders',
        },
        {
          type: 'concept-card',
          term: 'Open/Closed',
          explanation: 'Extend behaviour by adding code, not editing working code.',
          example: 'A new guide block type is a new union member and case',
        },
        {
          type: 'concept-card',
          term: 'Liskov Substitution',
          explanation: 'A subtype must work wherever its base type is expected.',
          example: 'Any UsersApi implementation works in the saga',
        },
        {
          type: 'concept-card',
          term: 'Interface Segregation',
          explanation: 'Depend on small interfaces that contain only what you use.',
          example: 'SearchFn is one function, not a whole client',
        },
        {
          type: 'concept-card',
          term: 'Dependency Inversion',
          explanation: 'Depend on abstractions and inject the concrete implementation.',
          example: 'createAppStore(api) receives its API',
        },
      ],
    },
    {
      id: 'in-practice',
      title: 'In Practice',
      content: [
        {
          type: 'text',
          body: 'Every demo here takes its data source as a prop or argument with a default. Tests pass an in-memory fake with zero latency; the page passes a fake with simulated latency. Neither the hook nor the component knows which one it has.',
        },
        {
          type: 'code',
          language: 'typescript',
          code: `export interface UsersApi {
  fetchUsers(query: string): Promise<User[]>
}

// production: createUsersApi({ latencyMs: 600 })
// tests:      { fetchUsers: vi.fn().mockResolvedValue([]) }`,
        },
        {
          type: 'quiz',
          question: 'A Square extends Rectangle and setWidth also sets the height. Which principle does this break?',
          options: ['Single Responsibility', 'Liskov Substitution', 'Interface Segregation'],
          correctIndex: 1,
          explanation: 'Code that sets width and height independently on a Rectangle gets wrong results when given a Square, so Square cannot stand in for Rectangle.',
        },
      ],
    },
  ],
  connections: [
    { concept: 'Injected API', file: 'src/saga/store.ts', description: 'The store receives its UsersApi' },
    { concept: 'Narrow interface', file: 'src/services/suggestions.ts', description: 'SearchFn used by the autocomplete hook' },
  ],
}
