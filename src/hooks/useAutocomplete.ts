import { useCallback, useEffect, useRef, useState } from 'react';
import type { KeyboardEvent } from 'react';
import { useDebounce } from './useDebounce';
import { isAbortError, toErrorMessage } from '../utils/errors';
import type { SearchFn } from '../services/suggestions';

export interface AutocompleteOptions {
  debounceMs: number;
  /** Queries shorter than this never hit the source */
  minChars?: number;
  onSelect?: (value: string) => void;
}

export interface UseAutocompleteResult {
  query: string;
  setQuery: (value: string) => void;
  suggestions: string[];
  loading: boolean;
  error: string | null;
  open: boolean;
  /** Index into suggestions, -1 when nothing is highlighted */
  highlighted: number;
  setHighlighted: (index: number) => void;
  select: (value: string) => void;
  close: () => void;
  onKeyDown: (event: KeyboardEvent<HTMLInputElement>) => void;
}

export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase();
}

/**
 * Typeahead state: debounced, cached, abortable suggestions with keyboard
 * navigation.
 *
 * A response is only shown if its query still matches what is in the input,
 * so a slow answer to an older query never replaces a newer one.
 */
export function useAutocomplete(
  search: SearchFn,
  { debounceMs, minChars = 1, onSelect }: AutocompleteOptions
): UseAutocompleteResult {
  const [query, setQueryState] = useState('');
  const [suggestions, setSuggestions] = useState<string[]>([]);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [open, setOpen] = useState(false);
  const [highlighted, setHighlighted] = useState(-1);

  const cache = useRef(new Map<string, string[]>());
  const latestKey = useRef('');
  const searchRef = useRef(search);
  const debounced = useDebounce(query, debounceMs);

  useEffect(() => {
    searchRef.current = search;
  }, [search]);

  const setQuery = useCallback(
    (value: string) => {
      const key = normalizeQuery(value);
      latestKey.current = key;
      setQueryState(value);
      setOpen(true);
      setHighlighted(-1);

      // Cached answers show up immediately, no debounce needed
      const cached = cache.current.get(key);
      if (key.length >= minChars && cached) {
        setSuggestions(cached);
      }
    },
    [minChars]
  );

  useEffect(() => {
    const key = normalizeQuery(debounced);
    if (key.length < minChars) {
      setSuggestions((prev) => (prev.length > 0 ? [] : prev));
      setLoading(false);
      setError(null);
      return;
    }

    const cached = cache.current.get(key);
    if (cached) {
      setSuggestions(cached);
      setLoading(false);
      return;
    }

    const controller = new AbortController();
    setLoading(true);
    setError(null);

    void searchRef.current(key, controller.signal).then(
      (results) => {
        if (controller.signal.aborted) return;
        cache.current.set(key, results);
        setLoading(false);
        if (latestKey.current !== key) return;
        setSuggestions(results);
      },
      (err: unknown) => {
        if (controller.signal.aborted || isAbortError(err)) return;
        console.error(`Failed to load suggestions for "${key}":`, err);
        setSuggestions([]);
        setError(toErrorMessage(err));
        setLoading(false);
      }
    );

    return () => {
      controller.abort();
    };
  }, [debounced, minChars]);

  const close = useCallback(() => {
    setOpen(false);
    setHighlighted(-1);
  }, []);

  const select = useCallback(
    (value: string) => {
      latestKey.current = normalizeQuery(value);
      setQueryState(value);
      setOpen(false);
      setHighlighted(-1);
      onSelect?.(value);
    },
    [onSelect]
  );

  const onKeyDown = useCallback(
    (event: KeyboardEvent<HTMLInputElement>) => {
      const count = suggestions.length;

      switch (event.key) {
        case 'ArrowDown':
          event.preventDefault();
          setOpen(true);
          if (count > 0) setHighlighted((i) => (i + 1) % count);
          break;
        case 'ArrowUp':
          event.preventDefault();
          setOpen(true);
          if (count > 0) setHighlighted((i) => (i <= 0 ? count - 1 : i - 1));
          break;
        case 'Enter':
          if (open && highlighted >= 0 && highlighted < count) {
            event.preventDefault();
            select(suggestions[highlighted]);
          }
          break;
        case 'Escape':
          close();
          break;
      }
    },
    [suggestions, open, highlighted, select, close]
  );

  return {
    query,
    setQuery,
    suggestions,
    loading,
    error,
    open,
    highlighted,
    setHighlighted,
    select,
    close,
    onKeyDown,
  };
}
