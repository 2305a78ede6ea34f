import { useCallback, useRef, useState } from 'react';
import type { SetStateAction } from 'react';

export type StoredValueGuard<T> = (value: unknown) => value is T;

function readStorage<T>(key: string, fallback: T, validate?: StoredValueGuard<T>): T {
  const raw = localStorage.getItem(key);
  if (raw === null) return fallback;

  let parsed: T;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    console.warn(`Ignoring unreadable value for "${key}":`, err);
    return fallback;
  }

  if (!sameKind(parsed, fallback) || (validate && !validate(parsed))) {
    console.warn(`Ignoring malformed value for "${key}":`, parsed);
    return fallback;
  }
  return parsed;
}

// JSON kind of a value: null and arrays are told apart from objects
function kindOf(value: unknown): string {
  if (value === null) return 'null';
  return Array.isArray(value) ? 'array' : typeof value;
}

function sameKind(value: unknown, reference: unknown): boolean {
  return reference === null || kindOf(value) === kindOf(reference);
}

function writeStorage<T>(key: string, value: T): void {
  try {
    localStorage.setItem(key, JSON.stringify(value));
  } catch (err) {
    console.error(`Failed to persist "${key}":`, err);
  }
}

/**
 * useState backed by localStorage.
 *
 * The stored value is read once on mount. A stored value of a different JSON
 * kind than `initialValue`, or one `validate` rejects, is ignored with a
 * warning. Writes happen synchronously in the setter so a value is never lost
 * to an unmount between render and effect.
 *
 * @returns [value, setValue, remove] where remove() deletes the key and
 *          restores `initialValue`
 */
export function useLocalStorage<T>(
  key: string,
  initialValue: T,
  validate?: StoredValueGuard<T>
): [T, (next: SetStateAction<T>) => void, () => void] {
  const [stored, setStored] = useState<T>(() => readStorage(key, initialValue, validate));
  const current = useRef(stored);
  const initial = useRef(initialValue);

  const setValue = useCallback(
    (next: SetStateAction<T>) => {
      const resolved = next instanceof Function ? next(current.current) : next;
      current.current = resolved;
      writeStorage(key, resolved);
      setStored(resolved);
    },
    [key]
  );

  const remove = useCallback(() => {
    current.current = initial.current;
    localStorage.removeItem(key);
    setStored(initial.current);
  }, [key]);

  return [stored, setValue, remove];
}
