import { useEffect, useRef, useState } from 'react';

/**
 * Returns `value` at most once per `interval` milliseconds.
 *
 * The first change after a quiet period passes through immediately; changes
 * inside the window are collapsed and the latest one is delivered when the
 * window ends.
 */
export function useThrottle<T>(value: T, interval: number): T {
  const [throttled, setThrottled] = useState(value);
  const lastEmit = useRef<number | null>(null);

  useEffect(() => {
    const now = Date.now();
    const elapsed = lastEmit.current === null ? Infinity : now - lastEmit.current;

    if (elapsed >= interval) {
      lastEmit.current = now;
      setThrottled(value);
      return;
    }

    const timer = setTimeout(() => {
      lastEmit.current = Date.now();
      setThrottled(value);
    }, interval - elapsed);

    return () => {
      clearTimeout(timer);
    };
  }, [value, interval]);

  return throttled;
}
