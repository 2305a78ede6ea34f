import { useCallback, useEffect, useReducer } from 'react';
import { initialTickerState, tickerReducer } from '../state/tickerReducer';
import { createSimulatedTicker, parseTickerMessage } from '../services/ticker';
import type { TickerMessage } from '../services/ticker';
import { useWebSocket } from './useWebSocket';
import type { SocketStatus } from './useWebSocket';

export interface TickerFeedOptions {
  /** Simulated feed only */
  seed?: number;
  intervalMs?: number;
}

export type FeedSource = 'websocket' | 'simulated';

/**
 * Live quotes from a WebSocket, or from the in-process simulator when no
 * URL is configured.
 */
export function useTickerFeed(url: string | null, { seed, intervalMs }: TickerFeedOptions = {}) {
  const [state, dispatch] = useReducer(tickerReducer, initialTickerState);

  const handleMessage = useCallback((message: TickerMessage) => {
    dispatch({ type: "MESSAGE", ...message });
  }, []);

  const handleFrame = useCallback(
    (raw: string) => {
      const message = parseTickerMessage(raw);
      if (message) handleMessage(message);
    },
    [handleMessage]
  );

  const socket = useWebSocket(url, { onMessage: handleFrame });

  useEffect(() => {
    if (url) return;
    return createSimulatedTicker({ onMessage: handleMessage, seed, intervalMs });
  }, [url, seed, intervalMs, handleMessage]);

  const clear = useCallback(() => dispatch({ type: "CLEAR" }), []);

  const source: FeedSource = url ? 'websocket' : 'simulated';
  const status: SocketStatus | 'simulated' = url ? socket.status : 'simulated';

  return { ...state, source, status, attempts: socket.attempts, clear };
}
