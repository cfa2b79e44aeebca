/**
 * Timer helpers for the background worker
 */

/**
 * Resolve after `ms`, or as soon as `signal` aborts. Never rejects.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Wait for `promise` for at most `ms`.
 * Resolves true if it settled in time, false on timeout.
 */
export async function settlesWithin(
  promise: Promise<unknown>,
  ms: number
): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });

  try {
    return await Promise.race([
      promise.then(
        () => true as const,
        () => true as const
      ),
      timeout,
    ]);
  } finally {
    clearTimeout(timer);
  }
}
