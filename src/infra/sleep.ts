/**
 * Longest delay a single Node timer can hold; larger values fire after 1 ms
 */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * Delays execution for a number of milliseconds.
 * Delays past the timer limit are waited out in consecutive timers.
 * Rejects with the signal's reason as soon as the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;

    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };

    const arm = (remaining: number) => {
      const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS);
      timer = setTimeout(() => {
        if (remaining > chunk) {
          arm(remaining - chunk);
          return;
        }
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, chunk);
    };

    arm(Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason;
  const error = new Error('Aborted');
  error.name = 'AbortError';
  return error;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
