import { useCallback, useEffect, useState } from 'react';
import type { DependencyList } from 'react';
import { isAbortError, toErrorMessage } from '../utils/errors';

export interface FetchState<T> {
  data: T | null;
  loading: boolean;
  error: string | null;
}

export interface UseFetchResult<T> extends FetchState<T> {
  reload: () => void;
}

/**
 * Run an async fetcher whenever `deps` change.
 *
 * The fetcher receives an AbortSignal. The request is aborted when the deps
 * change or the component unmounts, and an aborted result is never stored.
 */
export function useFetch<T>(
  fetcher: (signal: AbortSignal) => Promise<T>,
  deps: DependencyList
): UseFetchResult<T> {
  const [state, setState] = useState<FetchState<T>>({
    data: null,
    loading: true,
    error: null,
  });
  const [reloadToken, setReloadToken] = useState(0);

  useEffect(() => {
    const controller = new AbortController();
    setState((prev) => ({ ...prev, loading: true, error: null }));

    void fetcher(controller.signal).then(
      (data) => {
        if (controller.signal.aborted) return;
        setState({ data, loading: false, error: null });
      },
      (err: unknown) => {
        if (controller.signal.aborted || isAbortError(err)) return;
        console.error('Failed to fetch:', err);
        setState({ data: null, loading: false, error: toErrorMessage(err) });
      }
    );

    return () => {
      controller.abort();
    };
    // The caller owns the dependency list, as with useEffect itself
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [...deps, reloadToken]);

  const reload = useCallback(() => {
    setReloadToken((token) => token + 1);
  }, []);

  return { ...state, reload };
}
