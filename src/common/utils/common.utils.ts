/**
 * Longest delay a single timer accepts; Node fires anything above it after 1ms
 */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * Sleep for `ms` milliseconds. When a signal is given, the sleep ends early
 * by rejecting with the signal's reason once it aborts.
 * Delays beyond MAX_TIMER_DELAY_MS are slept in consecutive chunks.
 */
export async function sleepFor(ms: number, signal?: AbortSignal): Promise<void> {
  let remaining = Math.max(0, ms);

  do {
    const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS);
    await sleepChunk(chunk, signal);
    remaining -= chunk;
  } while (remaining > 0);
}

async function sleepChunk(ms: number, signal?: AbortSignal): Promise<void> {
  signal?.throwIfAborted();

  await new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
