import type { Guide } from './types'

export const sagaGuide: Guide = {
  id: 'guide-saga',
  title: 'Sagas',
  subtitle: 'Async side effects as generator functions that yield plain descriptions',
  color: 'rose',
  icon: '🌀',
  sections: [
    {
      id: 'effects',
      title: 'Effects as Data',
      content: [
        {
          type: 'text',
          body: 'A saga is a generator. Instead of calling an API it yields call(api.fetchUsers, query), a plain object describing the call. The middleware performs it and resumes the generator with the result. Because the saga only yields descriptions, a test can step through it and compare each yielded value without mocking anything.',
        },
        {
          type: 'code',
          language: 'typescript',
          code: `export function* fetchUsersSaga(api: UsersApi, action: PayloadAction<string>) {
  try {
    const users: User[] = yield call(api.fetchUsers, action.payload)
    yield put(fetchUsersSucceeded(users))
  } catch (err) {
    yield put(fetchUsersFailed(toErrorMessage(err)))
  }
}`,
        },
        {
          type: 'concept-card',
          term: 'call',
          explanation: 'Invoke a function and wait for its promise.',
        },
        {
          type: 'concept-card',
          term: 'put',
          explanation: 'Dispatch an action to the store.',
        },
        {
          type: 'concept-card',
          term: 'delay',
          explanation: 'Wait a number of milliseconds.',
        },
        {
          type: 'concept-card',
          term: 'all',
          explanation: 'Run several effects in parallel; the root saga starts every watcher this way.',
        },
      ],
    },
    {
      id: 'watchers',
      title: 'takeEvery and takeLatest',
      content: [
        {
          type: 'comparison',
          leftLabel: 'takeEvery',
          rightLabel: 'takeLatest',
          rows: [
            { label: 'New action while busy', left: 'Starts another task', right: 'Cancels the running task' },
            { label: 'Results used', left: 'All of them', right: 'Only the newest' },
            { label: 'Used here for', left: 'Delayed counter increments', right: 'User search' },
          ],
        },
        {
          type: 'diagram',
          nodes: [
            { id: 'ui', label: 'dispatch(request)', icon: '👆' },
            { id: 'watch', label: 'takeLatest', icon: '👀' },
            { id: 'worker', label: 'fetchUsersSaga', icon: '⚙️' },
            { id: 'store', label: 'Reducer', icon: '🗄️' },
          ],
          connections: [
            { from: 'ui', to: 'watch' },
            { from: 'watch', to: 'worker', label: 'fork' },
            { from: 'worker', to: 'store', label: 'put' },
          ],
        },
        {
          type: 'callout',
          tone: 'tip',
          body: 'Type fast in the saga demo: the request counter climbs with every keystroke but only the last query\'s results are shown.',
        },
        {
          type: 'quiz',
          question: 'Three "+1 after 1s" clicks arrive within 200 ms. With takeEvery, what is the counter after two seconds?',
          options: ['1', '3', '0'],
          correctIndex: 1,
          explanation: 'takeEvery forks a task per action, so all three delays complete and each one dispatches an increment.',
        },
      ],
    },
  ],
  connections: [
    { concept: 'Sagas', file: 'src/saga/sagas.ts', description: 'Workers, watchers and the root saga' },
    { concept: 'Store', file: 'src/saga/store.ts', description: 'configureStore with the saga middleware' },
    { concept: 'Slices', file: 'src/saga/usersSlice.ts', description: 'Request, success and failure actions' },
  ],
}
