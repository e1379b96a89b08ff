import { AbortedError } from './errors';
import { logger } from './logger';

/**
 * Wraps a promise with a timeout
 *
 * Executes a promise and rejects if it doesn't complete within the specified timeout.
 * The optional callback runs before the rejection, which is where callers kill
 * child processes or close sockets tied to the stuck operation.
 *
 * @param promise - The promise to wrap with timeout protection
 * @param timeoutMs - Timeout duration in milliseconds (must be positive)
 * @param errorMessage - Message of the rejection on timeout
 * @param onTimeout - Cleanup executed before the timeout rejection
 *
 * @example
 * const probe = await withTimeout(runProcess(ffprobe, args), 15_000, 'ffprobe timed out', () =>
 *   child.kill('SIGKILL')
 * );
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  errorMessage: string,
  onTimeout?: () => void
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new Error(`Invalid timeoutMs: ${timeoutMs}. Must be a positive number.`);
  }

  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      try {
        onTimeout?.();
      } catch (error) {
        logger.warn('general', 'Error in timeout callback', {
          error: error instanceof Error ? error.message : String(error),
          timeoutMs,
        });
      }

      logger.warn('general', 'Promise timeout reached', {
        timeoutMs,
        message: errorMessage,
      });

      reject(new Error(errorMessage));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Sleep for `ms`, resolving early with `false` when the signal aborts.
 *
 * Resolves `true` when the full delay elapsed. Never rejects, so pacing loops
 * can treat cancellation as a normal exit.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };

    const timer = setTimeout(
      () => {
        signal?.removeEventListener('abort', onAbort);
        resolve(true);
      },
      Math.max(0, ms)
    );

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Throw an `AbortedError` when the signal has fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined, what = 'Operation'): void {
  if (signal?.aborted) {
    throw new AbortedError(`${what} aborted`);
  }
}
