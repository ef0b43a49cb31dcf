import type { TimerPort } from '@/ports/TimerPort';

export class WaitInterruptedError extends Error {
  constructor(message = 'wait interrupted') {
    super(message);
    this.name = 'WaitInterruptedError';
  }
}

/**
 * Resolves after `delayMs`, or rejects with {@link WaitInterruptedError} once `signal` aborts.
 */
export function sleep(timers: TimerPort, delayMs: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new WaitInterruptedError());
      return;
    }
    const onAbort = (): void => {
      timer.cancel();
      reject(new WaitInterruptedError());
    };
    const timer = timers.schedule(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, delayMs);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export type TimedResult<T> = { kind: 'value'; value: T } | { kind: 'timeout' };

/**
 * Races `promise` against a timer. A rejection of `promise` propagates.
 */
export async function withTimeout<T>(
  timers: TimerPort,
  promise: Promise<T>,
  timeoutMs: number,
): Promise<TimedResult<T>> {
  let resolveTimeout: (result: TimedResult<T>) => void = () => undefined;
  const timeoutPromise = new Promise<TimedResult<T>>((resolve) => {
    resolveTimeout = resolve;
  });
  const timer = timers.schedule(() => resolveTimeout({ kind: 'timeout' }), timeoutMs);
  const valuePromise = promise.then((value): TimedResult<T> => ({ kind: 'value', value }));
  try {
    return await Promise.race([valuePromise, timeoutPromise]);
  } finally {
    timer.cancel();
  }
}
