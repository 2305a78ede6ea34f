import { useCallback, useEffect, useRef, useState } from 'react';

/**
 * Connection status
 * - idle: no URL configured
 * - connecting: socket created, waiting for open
 * - open: ready to send and receive
 * - reconnecting: dropped, waiting out the backoff before the next attempt
 * - closed: dropped and not reconnecting
 */
export type SocketStatus = 'idle' | 'connecting' | 'open' | 'reconnecting' | 'closed';

export interface WebSocketOptions {
  onMessage: (data: string) => void;
  reconnect?: boolean;
}

export const RECONNECT_BASE_MS = 500;
export const RECONNECT_MAX_MS = 8000;

/**
 * Delay before reconnect attempt `attempt` (0-based): 500 ms doubling, capped at 8 s.
 */
export function backoffDelay(attempt: number): number {
  return Math.min(RECONNECT_MAX_MS, RECONNECT_BASE_MS * 2 ** attempt);
}

/**
 * Owns one WebSocket for the lifetime of the component.
 *
 * Text frames go to `onMessage` (the latest handler is always used).
 * Unexpected closes reconnect with exponential backoff; unmounting or
 * changing the URL closes the socket for good.
 */
export function useWebSocket(url: string | null, { onMessage, reconnect = true }: WebSocketOptions) {
  const [status, setStatus] = useState<SocketStatus>(url ? 'connecting' : 'idle');
  const [attempts, setAttempts] = useState(0);
  const socketRef = useRef<WebSocket | null>(null);
  const handler = useRef(onMessage);

  useEffect(() => {
    handler.current = onMessage;
  }, [onMessage]);

  useEffect(() => {
    if (!url) {
      setStatus('idle');
      return;
    }

    let disposed = false;
    let attempt = 0;
    let retryTimer: ReturnType<typeof setTimeout> | undefined;

    const connect = () => {
      setStatus('connecting');
      const socket = new WebSocket(url);
      socketRef.current = socket;

      socket.onopen = () => {
        attempt = 0;
        setAttempts(0);
        setStatus('open');
      };

      socket.onmessage = (event: MessageEvent) => {
        if (typeof event.data === 'string') {
          handler.current(event.data);
        }
      };

      socket.onerror = (event) => {
        console.error(`WebSocket error on ${url}:`, event);
      };

      socket.onclose = () => {
        // A superseded socket can close after its replacement has opened
        if (disposed) return;
        if (socketRef.current === socket) socketRef.current = null;

        if (!reconnect) {
          setStatus('closed');
          return;
        }

        const wait = backoffDelay(attempt);
        attempt += 1;
        setAttempts(attempt);
        setStatus('reconnecting');
        retryTimer = setTimeout(connect, wait);
      };
    };

    connect();

    return () => {
      disposed = true;
      clearTimeout(retryTimer);
      socketRef.current?.close();
      socketRef.current = null;
    };
  }, [url, reconnect]);

  const send = useCallback((data: string): boolean => {
    const socket = socketRef.current;
    if (socket && socket.readyState === WebSocket.OPEN) {
      socket.send(data);
      return true;
    }
    return false;
  }, []);

  return { status, attempts, send };
}
