import { createSlice } from '@reduxjs/toolkit';

export interface CounterState {
  value: number;
  /** Async increments waiting on their delay */
  pending: number;
}

export const initialCounterState: CounterState = {
  value: 0,
  pending: 0,
};

const counterSlice = createSlice({
  name: 'counter',
  initialState: initialCounterState,
  reducers: {
    increment(state) {
      state.value += 1;
    },
    incrementAsync(state) {
      state.pending += 1;
    },
    incrementAsyncCompleted(state) {
      state.value += 1;
      state.pending = Math.max(0, state.pending - 1);
    },
  },
});

export const { increment, incrementAsync, incrementAsyncCompleted } = counterSlice.actions;
export const counterReducer = counterSlice.reducer;
