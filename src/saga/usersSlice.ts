import { createSlice } from '@reduxjs/toolkit';
import type { PayloadAction } from '@reduxjs/toolkit';
import type { User } from '../services/usersApi';

export interface UsersState {
  users: User[];
  loading: boolean;
  error: string | null;
  /** How many searches were requested, including superseded ones */
  requestCount: number;
  lastQuery: string;
}

export const initialUsersState: UsersState = {
  users: [],
  loading: false,
  error: null,
  requestCount: 0,
  lastQuery: '',
};

const usersSlice = createSlice({
  name: 'users',
  initialState: initialUsersState,
  reducers: {
    fetchUsersRequested(state, action: PayloadAction<string>) {
      state.loading = true;
      state.error = null;
      state.requestCount += 1;
      state.lastQuery = action.payload;
    },
    fetchUsersSucceeded(state, action: PayloadAction<User[]>) {
      state.loading = false;
      state.users = action.payload;
    },
    fetchUsersFailed(state, action: PayloadAction<string>) {
      state.loading = false;
      state.users = [];
      state.error = action.payload;
    },
  },
});

export const { fetchUsersRequested, fetchUsersSucceeded, fetchUsersFailed } = usersSlice.actions;
export const usersReducer = usersSlice.reducer;
