/**
 * Convert anything thrown into a message suitable for the UI.
 */
export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * True for the rejection produced by an aborted fetch or AbortSignal-aware source.
 */
export function isAbortError(err: unknown): boolean {
  return err instanceof DOMException && err.name === 'AbortError'
}

export function createAbortError(): DOMException {
  return new DOMException('The operation was aborted.', 'AbortError')
}
