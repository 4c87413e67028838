/**
 * Bounded concurrent execution and externally enforced timeouts.
 */

export type Settlement<T> =
  | { kind: 'value'; value: T }
  | { kind: 'error'; error: unknown }
  | { kind: 'timeout' }
  | { kind: 'cancelled' };

/**
 * Run `tasks` with at most `limit` in flight. Results keep submission order.
 * Tasks are expected to capture their own failures.
 */
export async function runBounded<T>(tasks: ReadonlyArray<() => Promise<T>>, limit: number): Promise<T[]> {
  const results: T[] = new Array<T>(tasks.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < tasks.length) {
      const index = next++;
      results[index] = await tasks[index]();
    }
  };

  await Promise.all(Array.from({ length: Math.max(1, Math.min(limit, tasks.length)) }, lane));
  return results;
}

/**
 * Wait for `call` until `timeoutMs` elapses or `signal` aborts, whichever comes first.
 * Never rejects. The call itself keeps running after a timeout or cancellation.
 */
export function settleWithin<T>(call: Promise<T>, timeoutMs: number, signal?: AbortSignal): Promise<Settlement<T>> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve({ kind: 'cancelled' });
      call.catch(() => undefined);
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const onAbort = (): void => finish({ kind: 'cancelled' });
    const finish = (settlement: Settlement<T>): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      resolve(settlement);
    };

    timer = setTimeout(() => finish({ kind: 'timeout' }), timeoutMs);
    signal?.addEventListener('abort', onAbort, { once: true });
    call.then(
      (value) => finish({ kind: 'value', value }),
      (error: unknown) => finish({ kind: 'error', error })
    );
  });
}
