import type { Guide } from './types'

export const todoListGuide: Guide = {
  id: 'guide-todo-list',
  title: 'Todo List',
  subtitle: 'useReducer for state with many related transitions',
  color: 'emerald',
  icon: '✅',
  sections: [
    {
      id: 'reducer',
      title: 'One Reducer, Many Actions',
      content: [
        {
          type: 'text',
          body: 'A todo list has add, toggle, edit, delete, clear completed, toggle all and filter. With useState each handler would copy and patch arrays inline. A reducer puts every transition in one pure function that can be tested without rendering anything.',
        },
        {
          type: 'code',
          language: 'typescript',
          code: `type TodoAction =
  | { type: 'ADD'; id: string; text: string; createdAt: number }
  | { type: 'TOGGLE'; id: string }
  | { type: 'EDIT'; id: string; text: string }
  | { type: 'DELETE'; id: string }
  | { type: 'CLEAR_COMPLETED' }
  | { type: 'TOGGLE_ALL' }
  | { type: 'SET_FILTER'; filter: TodoFilter }`,
          caption: 'A discriminated union: TypeScript narrows action in each case',
        },
        {
          type: 'concept-card',
          term: 'Pure reducer',
          explanation: 'Same state and action in, same state out. Ids and timestamps are created by the caller and carried on the action.',
        },
        {
          type: 'concept-card',
          term: 'Selector',
          explanation: 'selectVisibleTodos derives the filtered list; the filter itself is the only thing stored.',
        },
      ],
    },
    {
      id: 'editing',
      title: 'Inline Editing',
      content: [
        {
          type: 'text',
          body: 'Double-clicking a row swaps the label for an input holding a draft. Enter or blur commits, Escape throws the draft away. Committing an empty text deletes the todo.',
        },
        {
          type: 'comparison',
          leftLabel: 'useState',
          rightLabel: 'useReducer',
          rows: [
            { label: 'Best for', left: 'Independent values', right: 'Related values with named transitions' },
            { label: 'Logic lives', left: 'In event handlers', right: 'In one pure function' },
            { label: 'Testing', left: 'Render the component', right: 'Call the function' },
          ],
        },
        {
          type: 'quiz',
          question: 'Why does the ADD action carry the id instead of the reducer generating it?',
          options: [
            'Reducers cannot return objects',
            'Generating ids is a side effect and would make the reducer impure',
            'React requires ids on actions',
          ],
          correctIndex: 1,
          explanation: 'React may call a reducer twice in Strict Mode. An id generated inside would differ between calls; passing it in keeps the reducer deterministic.',
        },
      ],
    },
  ],
  connections: [
    { concept: 'Reducer', file: 'src/state/todoReducer.ts', description: 'All todo transitions and selectors' },
    { concept: 'Persistence', file: 'src/hooks/useLocalStorage.ts', description: 'Todos survive a reload' },
    { concept: 'UI', file: 'src/components/demos/TodoListDemo.tsx', description: 'Editing, filters and toggle all' },
  ],
}
