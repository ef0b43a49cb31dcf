import { errorMessage, type ComponentLogger, type LogContext } from '@/shared/logging/logger';

export type BestEffortOptions<T> = {
  fallback: T;
  onError?: 'ignore' | 'debug' | 'warn';
  label?: string;
  context?: LogContext;
  log?: ComponentLogger;
};

function logBestEffortFailure(error: unknown, options: BestEffortOptions<unknown>): void {
  if (!options.log || !options.onError || options.onError === 'ignore') {
    return;
  }
  const payload = { ...options.context, message: errorMessage(error) };
  const label = options.label ?? 'best-effort fallback used';
  if (options.onError === 'warn') {
    options.log.warn(label, payload);
  } else {
    options.log.debug(label, payload);
  }
}

/**
 * Runs `fn` and resolves with `fallback` when it rejects.
 */
export async function bestEffort<T>(
  fn: () => Promise<T>,
  options: BestEffortOptions<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    logBestEffortFailure(error, options);
    return options.fallback;
  }
}
