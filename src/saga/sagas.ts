import { all, call, delay, put, takeEvery, takeLatest } from 'redux-saga/effects';
import type { SagaIterator } from 'redux-saga';
import type { PayloadAction } from '@reduxjs/toolkit';
import type { User, UsersApi } from '../services/usersApi';
import { toErrorMessage } from '../utils/errors';
import { fetchUsersFailed, fetchUsersRequested, fetchUsersSucceeded } from './usersSlice';
import { incrementAsync, incrementAsyncCompleted } from './counterSlice';

export const DEFAULT_INCREMENT_DELAY_MS = 1000;

/**
 * Worker: one user search.
 * Effects are plain descriptions, so the generator can be stepped in tests
 * without touching the API.
 */
export function* fetchUsersSaga(api: UsersApi, action: PayloadAction<string>): SagaIterator {
  try {
    const users: User[] = yield call(api.fetchUsers, action.payload);
    yield put(fetchUsersSucceeded(users));
  } catch (err) {
    console.error('Failed to fetch users:', err);
    yield put(fetchUsersFailed(toErrorMessage(err)));
  }
}

/**
 * takeLatest: a new search cancels the one still in flight, so only the
 * newest query's result ever reaches the store.
 */
export function* watchFetchUsers(api: UsersApi): SagaIterator {
  yield takeLatest(fetchUsersRequested.type, fetchUsersSaga, api);
}

export function* incrementAsyncSaga(delayMs: number): SagaIterator {
  yield delay(delayMs);
  yield put(incrementAsyncCompleted());
}

/**
 * takeEvery: every click gets its own task; none are dropped.
 */
export function* watchIncrementAsync(delayMs: number): SagaIterator {
  yield takeEvery(incrementAsync.type, incrementAsyncSaga, delayMs);
}

export function* rootSaga(api: UsersApi, incrementDelayMs: number = DEFAULT_INCREMENT_DELAY_MS): SagaIterator {
  yield all([call(watchFetchUsers, api), call(watchIncrementAsync, incrementDelayMs)]);
}
