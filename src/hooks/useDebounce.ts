import { useEffect, useState } from 'react';

/**
 * Returns `value` once it has stopped changing for `delay` milliseconds.
 *
 * Every change restarts the timer, so a burst of keystrokes produces a
 * single update after the user pauses.
 */
export function useDebounce<T>(value: T, delay: number): T {
  const [debounced, setDebounced] = useState(value);

  useEffect(() => {
    const timer = setTimeout(() => {
      setDebounced(value);
    }, delay);

    return () => {
      clearTimeout(timer);
    };
  }, [value, delay]);

  return debounced;
}
