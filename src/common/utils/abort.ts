/**
 * Throws the signal's abort reason if it has fired. Page walks call this
 * between iterations.
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw signal.reason ?? new Error('Operation aborted');
  }
}

/**
 * Skip-and-continue handlers must not swallow a cancellation: rethrow the
 * original error when the caller's signal has fired.
 */
export function rethrowIfAborted(error: unknown, signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw error;
  }
}
