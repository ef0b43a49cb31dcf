import { createLogger, errorMessage, type ComponentLogger } from '@/shared/logging/logger';

export type StopResult =
  | { kind: 'stopped' }
  | { kind: 'timeout' }
  | { kind: 'error'; error: unknown };

export type StopLogger = Pick<ComponentLogger, 'info' | 'warn' | 'error'>;

/**
 * Runs `stopFn` but gives up waiting after `timeoutMs`. A stop that fails after
 * the timeout is still logged.
 */
export async function stopWithTimeout(
  name: string,
  stopFn: () => Promise<void>,
  timeoutMs: number,
  log: StopLogger = createLogger('Runtime'),
): Promise<StopResult> {
  let timeoutHandle: NodeJS.Timeout | null = null;
  const stopPromise = (async (): Promise<StopResult> => {
    try {
      await stopFn();
      return { kind: 'stopped' };
    } catch (error) {
      return { kind: 'error', error };
    }
  })();
  const timeoutPromise = new Promise<StopResult>((resolve) => {
    timeoutHandle = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
  });

  const result = await Promise.race([stopPromise, timeoutPromise]).finally(() => {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  });

  switch (result.kind) {
    case 'stopped':
      log.info(`${name} stopped`);
      return result;
    case 'timeout':
      log.warn(`${name} stop timed out`, { timeoutMs });
      void stopPromise.then((finalResult) => {
        if (finalResult.kind === 'error') {
          log.error(`failed to stop ${name}`, { message: errorMessage(finalResult.error) });
        }
      });
      return result;
    case 'error':
      log.error(`failed to stop ${name}`, { message: errorMessage(result.error) });
      return result;
  }
}
