export function throwIfAborted(signal?: AbortSignal | null): void {
  if (!signal) return;
  if (!signal.aborted) return;
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    throw reason;
  }
  const error = new Error('The operation was aborted', { cause: reason });
  error.name = 'AbortError';
  throw error;
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}
