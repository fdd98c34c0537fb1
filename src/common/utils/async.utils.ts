/**
 * Async Utilities
 */

/**
 * Wait for a promise to settle, giving up after `timeoutMs`.
 * Resolves `true` when the promise settled in time (fulfilled or rejected), `false` on timeout.
 * The timer is always cleared, so nothing is left pending.
 */
export async function settlesWithin(promise: Promise<unknown>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<false>(resolve => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  const settled = promise.then(
    () => true,
    () => true
  );

  try {
    return await Promise.race([settled, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

