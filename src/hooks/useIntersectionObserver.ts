import { useEffect, useRef } from 'react';
import type { RefObject } from 'react';

export interface IntersectionOptions {
  rootMargin?: string;
  threshold?: number;
  /** When false the observer is torn down. Re-enabling re-observes, which
   *  fires again if the target is still visible. */
  enabled?: boolean;
}

/**
 * Calls `onIntersect` whenever the referenced element enters the viewport.
 */
export function useIntersectionObserver(
  ref: RefObject<Element | null>,
  onIntersect: () => void,
  { rootMargin = '0px', threshold = 0, enabled = true }: IntersectionOptions = {}
): void {
  const callback = useRef(onIntersect);

  useEffect(() => {
    callback.current = onIntersect;
  }, [onIntersect]);

  useEffect(() => {
    const target = ref.current;
    if (!target || !enabled) return;

    const observer = new IntersectionObserver(
      (entries) => {
        if (entries.some((entry) => entry.isIntersecting)) {
          callback.current();
        }
      },
      { rootMargin, threshold }
    );
    observer.observe(target);

    return () => {
      observer.disconnect();
    };
  }, [ref, enabled, rootMargin, threshold]);
}
