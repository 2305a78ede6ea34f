import type { TickerAction, TickerQuote, TickerState } from './types';

export const TICKER_LOG_SIZE = 20;

export const initialTickerState: TickerState = {
  quotes: {},
  log: [],
  received: 0,
};

export function tickerReducer(state: TickerState, action: TickerAction): TickerState {
  switch (action.type) {
    case "MESSAGE": {
      // Own keys only: a symbol such as "constructor" is not a prior quote
      const prior: TickerQuote | undefined = Object.hasOwn(state.quotes, action.symbol)
        ? state.quotes[action.symbol]
        : undefined;
      const seq = state.received + 1;
      return {
        quotes: {
          ...state.quotes,
          [action.symbol]: {
            price: action.price,
            previous: prior ? prior.price : null,
            updatedAt: action.timestamp,
          },
        },
        log: [
          { seq, symbol: action.symbol, price: action.price, timestamp: action.timestamp },
          ...state.log,
        ].slice(0, TICKER_LOG_SIZE),
        received: seq,
      };
    }

    case "CLEAR":
      return initialTickerState;

    default:
      return state;
  }
}

/**
 * Direction of the last move for a quote
 */
export function priceTrend(quote: { price: number; previous: number | null }): 'up' | 'down' | 'flat' {
  if (quote.previous === null || quote.previous === quote.price) return 'flat';
  return quote.price > quote.previous ? 'up' : 'down';
}
