import { CancelledError, TimeoutError } from '../errors';

export interface DeadlineOptions {
  label: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Runs an operation under a timeout and an optional caller signal. The operation
 * receives a signal that aborts when either fires; the returned promise rejects
 * with TimeoutError or CancelledError respectively.
 */
export async function withDeadline<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  { label, timeoutMs, signal }: DeadlineOptions
): Promise<T> {
  if (signal?.aborted) {
    throw new CancelledError(label);
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // reject before aborting: the operation's own abort rejection must not win the race
      reject(new TimeoutError(label, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  const cancelled = new Promise<never>((_, reject) => {
    if (!signal) return;
    onAbort = () => {
      reject(new CancelledError(label));
      controller.abort();
    };
    signal.addEventListener('abort', onAbort, { once: true });
  });

  try {
    return await Promise.race([operation(controller.signal), timeout, cancelled]);
  } finally {
    clearTimeout(timer);
    if (signal && onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}
