import { TimeoutError } from './errors.js';

/**
 * Run a task with a wall-clock limit. The task receives an AbortSignal that
 * fires when the limit is hit, so HTTP-backed work can cancel its request.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  if (!(timeoutMs > 0)) {
    return task(controller.signal);
  }

  let rejectTimeout: (error: Error) => void = () => undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    rejectTimeout = reject;
  });
  const timer = setTimeout(() => {
    // reject first so the race settles with the timeout, not the abort
    rejectTimeout(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs));
    controller.abort();
  }, timeoutMs);

  try {
    return await Promise.race([task(controller.signal), timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
