// Shared timeout helper for async operations.
//
// Wraps a Promise-based operation so callers can enforce an explicit time
// budget (engine handshakes, searches, quit) and tell completion from timeout
// without catching.

export type TimedOperationResult<T> = { kind: 'ok'; value: T } | { kind: 'timeout' };

export interface TimedOperationOptions {
  /** Maximum allowed duration in milliseconds. */
  timeoutMs: number;
}

const TIMED_OUT = Symbol('timed-out');

/**
 * Run an async operation with an upper time bound, returning a structured
 * result instead of throwing on timeout.
 *
 * This helper does **not** abort in-flight work; errors thrown by the
 * operation itself are rethrown unchanged.
 */
export async function runWithTimeout<T>(
  operation: () => Promise<T>,
  options: TimedOperationOptions
): Promise<TimedOperationResult<T>> {
  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<typeof TIMED_OUT>((resolve) => {
    timeoutHandle = setTimeout(() => resolve(TIMED_OUT), options.timeoutMs);
  });

  try {
    const result = await Promise.race([operation(), timeoutPromise]);
    if (result === TIMED_OUT) {
      return { kind: 'timeout' };
    }
    return { kind: 'ok', value: result };
  } finally {
    if (timeoutHandle !== undefined) {
      clearTimeout(timeoutHandle);
    }
  }
}
