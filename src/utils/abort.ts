import { RunAbortedError } from './errors.js';

/**
 * Combine a caller's signal with an optional wall-clock budget
 */
export function runSignal(external: AbortSignal | undefined, timeBudgetMs: number | undefined): AbortSignal | undefined {
  const signals: AbortSignal[] = [];
  if (external) signals.push(external);
  if (timeBudgetMs !== undefined && timeBudgetMs > 0) signals.push(AbortSignal.timeout(timeBudgetMs));
  const [first, ...rest] = signals;
  if (!first) return undefined;
  return rest.length === 0 ? first : AbortSignal.any(signals);
}

/**
 * Settle with `promise`, or reject with RunAbortedError as soon as the
 * signal fires, whichever comes first. The abandoned promise keeps its
 * handlers, so a late rejection is not unhandled.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    void promise.catch(() => undefined);
    return Promise.reject(new RunAbortedError(signal.reason));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new RunAbortedError(signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Human-readable reason for an abort, naming the budget when it was a timeout
 */
export function describeAbort(reason: unknown, timeBudgetMs: number | undefined): string {
  if (reason instanceof RunAbortedError) {
    return describeAbort(reason.reason, timeBudgetMs);
  }
  if (reason instanceof Error && reason.name === 'TimeoutError' && timeBudgetMs) {
    return `Time budget of ${timeBudgetMs}ms exhausted`;
  }
  if (reason === undefined) return 'Run aborted';
  return reason instanceof Error ? reason.message : String(reason);
}
