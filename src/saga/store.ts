import { configureStore } from '@reduxjs/toolkit';
import createSagaMiddleware from 'redux-saga';
import type { Task } from 'redux-saga';
import { useDispatch, useSelector } from 'react-redux';
import type { UsersApi } from '../services/usersApi';
import { usersReducer } from './usersSlice';
import { counterReducer } from './counterSlice';
import { DEFAULT_INCREMENT_DELAY_MS, rootSaga } from './sagas';

export interface AppStoreOptions {
  incrementDelayMs?: number;
}

/**
 * Build a store with the saga middleware attached and the root saga running.
 * The API is injected so tests and the demo can supply their own.
 */
export function createAppStore(api: UsersApi, { incrementDelayMs = DEFAULT_INCREMENT_DELAY_MS }: AppStoreOptions = {}) {
  const sagaMiddleware = createSagaMiddleware({
    onError(err) {
      console.error('Uncaught saga error:', err);
    },
  });

  const store = configureStore({
    reducer: {
      users: usersReducer,
      counter: counterReducer,
    },
    middleware: (getDefaultMiddleware) => getDefaultMiddleware({ thunk: false }).concat(sagaMiddleware),
  });

  const task: Task = sagaMiddleware.run(rootSaga, api, incrementDelayMs);

  return { store, task };
}

export type AppStoreHandle = ReturnType<typeof createAppStore>;
export type AppStore = AppStoreHandle['store'];
export type RootState = ReturnType<AppStore['getState']>;
export type AppDispatch = AppStore['dispatch'];

export const useAppDispatch = useDispatch.withTypes<AppDispatch>();
export const useAppSelector = useSelector.withTypes<RootState>();
