import { afterEach, describe, it, expect, vi } from 'vitest'
import { call, delay, put } from 'redux-saga/effects'
import { fetchUsersSaga, incrementAsyncSaga } from '../saga/sagas.ts'
import { createAppStore } from '../saga/store.ts'
import { fetchUsersFailed, fetchUsersRequested, fetchUsersSucceeded, usersReducer, initialUsersState } from '../saga/usersSlice.ts'
import { increment, incrementAsync, incrementAsyncCompleted } from '../saga/counterSlice.ts'
import { createUsersApi } from '../services/usersApi.ts'
import type { User, UsersApi } from '../services/usersApi.ts'

const ada: User = { id: 1, name: 'Ada Lovelace', email: 'ada@example.com' }
const alan: User = { id: 2, name: 'Alan Turing', email: 'alan@example.com' }

const settle = () => new Promise<void>(resolve => setTimeout(resolve, 0))

afterEach(() => {
  vi.useRealTimers()
})

describe('usersSlice', () => {
  it('counts requests and remembers the last query', () => {
    const requested = usersReducer(initialUsersState, fetchUsersRequested('ad'))
    expect(requested).toEqual({ users: [], loading: true, error: null, requestCount: 1, lastQuery: 'ad' })

    const failed = usersReducer({ ...requested, users: [ada] }, fetchUsersFailed('down'))
    expect(failed.users).toEqual([])
    expect(failed.loading).toBe(false)
    expect(failed.error).toBe('down')
  })
})

describe('fetchUsersSaga', () => {
  const api = createUsersApi({ latencyMs: 0 })

  it('calls the api then puts the result', () => {
    const gen = fetchUsersSaga(api, fetchUsersRequested('ada'))

    expect(gen.next().value).toEqual(call(api.fetchUsers, 'ada'))
    expect(gen.next([ada]).value).toEqual(put(fetchUsersSucceeded([ada])))
    expect(gen.next().done).toBe(true)
  })

  it('puts the failure message when the call throws', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const gen = fetchUsersSaga(api, fetchUsersRequested('ada'))

    gen.next()
    // SagaIterator types throw() as optional; generators always have it
    const failed = gen.throw?.(new Error('boom'))
    expect(failed?.value).toEqual(put(fetchUsersFailed('boom')))
    expect(gen.next().done).toBe(true)
  })
})

describe('incrementAsyncSaga', () => {
  it('waits, then completes one increment', () => {
    const gen = incrementAsyncSaga(250)
    expect(gen.next().value).toEqual(delay(250))
    expect(gen.next().value).toEqual(put(incrementAsyncCompleted()))
  })
})

describe('createAppStore', () => {
  it('keeps only the newest search with takeLatest', async () => {
    const queries: string[] = []
    const resolvers: Array<(users: User[]) => void> = []
    const api: UsersApi = {
      fetchUsers(query) {
        queries.push(query)
        return new Promise<User[]>(resolve => { resolvers.push(resolve) })
      },
    }
    const { store, task } = createAppStore(api)

    store.dispatch(fetchUsersRequested('a'))
    store.dispatch(fetchUsersRequested('al'))
    expect(queries).toEqual(['a', 'al'])

    resolvers[0]([ada, alan])
    await settle()
    expect(store.getState().users.loading).toBe(true)
    expect(store.getState().users.users).toEqual([])

    resolvers[1]([alan])
    await settle()
    expect(store.getState().users).toEqual({
      users: [alan],
      loading: false,
      error: null,
      requestCount: 2,
      lastQuery: 'al',
    })

    task.cancel()
  })

  it('surfaces api failures in state', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const { store, task } = createAppStore(createUsersApi({ latencyMs: 0, shouldFail: () => true }))

    store.dispatch(fetchUsersRequested(''))
    await settle()
    await settle()
    expect(store.getState().users.error).toBe('User service unavailable')
    expect(store.getState().users.loading).toBe(false)

    task.cancel()
  })

  it('runs every async increment with takeEvery', async () => {
    vi.useFakeTimers()
    const { store, task } = createAppStore(createUsersApi(), { incrementDelayMs: 1000 })

    store.dispatch(increment())
    store.dispatch(incrementAsync())
    store.dispatch(incrementAsync())
    store.dispatch(incrementAsync())
    expect(store.getState().counter).toEqual({ value: 1, pending: 3 })

    await vi.advanceTimersByTimeAsync(999)
    expect(store.getState().counter.value).toBe(1)

    await vi.advanceTimersByTimeAsync(1)
    expect(store.getState().counter).toEqual({ value: 4, pending: 0 })

    task.cancel()
  })
})
