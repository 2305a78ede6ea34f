import { useCallback, useEffect, useRef, useState } from 'react';
import { toErrorMessage } from '../utils/errors';

export interface PageResult<T> {
  items: T[];
  /** null once the last page has been served */
  nextPage: number | null;
}

export type PageFetcher<T> = (page: number, pageSize: number) => Promise<PageResult<T>>;

interface InfiniteScrollState<T> {
  items: T[];
  nextPage: number | null;
  loading: boolean;
  error: string | null;
}

export interface UseInfiniteScrollResult<T> extends InfiniteScrollState<T> {
  hasMore: boolean;
  /** Load the next page. Ignored while loading, after an error, or at the end. */
  loadMore: () => void;
  /** Clear the error and request the page that failed. */
  retry: () => void;
}

/**
 * Paged loading state for an infinite list.
 *
 * Pages are zero-based. Only one request is ever in flight; results that
 * arrive after unmount are dropped.
 */
export function useInfiniteScroll<T>(fetchPage: PageFetcher<T>, pageSize: number): UseInfiniteScrollResult<T> {
  const [state, setState] = useState<InfiniteScrollState<T>>({
    items: [],
    nextPage: 0,
    loading: false,
    error: null,
  });
  const inFlight = useRef(false);
  const mounted = useRef(true);

  useEffect(() => {
    mounted.current = true;
    return () => {
      mounted.current = false;
    };
  }, []);

  const load = useCallback(
    (page: number) => {
      if (inFlight.current) return;
      inFlight.current = true;
      setState((prev) => ({ ...prev, loading: true, error: null }));

      void fetchPage(page, pageSize).then(
        (result) => {
          inFlight.current = false;
          if (!mounted.current) return;
          setState((prev) => ({
            items: [...prev.items, ...result.items],
            nextPage: result.nextPage,
            loading: false,
            error: null,
          }));
        },
        (err: unknown) => {
          inFlight.current = false;
          if (!mounted.current) return;
          console.error(`Failed to load page ${page}:`, err);
          setState((prev) => ({ ...prev, loading: false, error: toErrorMessage(err) }));
        }
      );
    },
    [fetchPage, pageSize]
  );

  const loadMore = useCallback(() => {
    if (state.loading || state.error !== null || state.nextPage === null) return;
    load(state.nextPage);
  }, [load, state.loading, state.error, state.nextPage]);

  const retry = useCallback(() => {
    if (state.nextPage === null) return;
    load(state.nextPage);
  }, [load, state.nextPage]);

  return {
    ...state,
    hasMore: state.nextPage !== null,
    loadMore,
    retry,
  };
}
