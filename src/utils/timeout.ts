/**
 * Timeout helpers
 *
 * @module utils/timeout
 */

/**
 * Error raised when an operation exceeds its time budget.
 */
export class TimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Error raised when the caller aborted the operation.
 */
export class AbortedError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortedError';
  }
}

/**
 * Execute a function with timeout using Promise.race pattern
 *
 * Some SDKs (the Google Generative AI SDK among them) do not stop work on an
 * AbortSignal, so the race only settles the caller's promise. An abort of
 * `signal` settles it the same way.
 *
 * @param fn - Async function to execute
 * @param timeoutMs - Timeout in milliseconds
 * @param label - Operation name used in the timeout message
 * @param signal - Optional caller signal
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  label: string,
  signal?: AbortSignal
): Promise<T> {
  if (signal?.aborted) {
    throw new AbortedError(`${label} aborted before it started`);
  }

  let timeoutId: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);

    if (signal) {
      onAbort = () => reject(new AbortedError(`${label} aborted`));
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([fn(), guard]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
    if (signal && onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Build a signal that aborts when the parent aborts or the timeout elapses.
 * Call `dispose` once the guarded request settles.
 */
export function createTimeoutSignal(
  timeoutMs: number,
  parent?: AbortSignal
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = () => controller.abort();

  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', onAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timeoutId);
      parent?.removeEventListener('abort', onAbort);
    },
  };
}
