import { setTimeout as delay } from 'timers/promises';
import { AnalysisError } from '../../domain/errors/AnalysisError';

export function cancellationFrom(signal: AbortSignal): AnalysisError {
  const reason: unknown = signal.reason;
  if (reason instanceof AnalysisError) {
    return reason;
  }
  if (typeof reason === 'string' && reason.length > 0) {
    return AnalysisError.cancelled(reason);
  }
  return AnalysisError.cancelled();
}

/**
 * Settle with the promise, or reject with Cancelled as soon as the signal aborts.
 * The abandoned promise keeps running but its outcome is ignored.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(cancellationFrom(signal));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(cancellationFrom(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const abortableSleep: Sleeper = async (ms, signal) => {
  if (signal?.aborted) {
    throw cancellationFrom(signal);
  }
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw cancellationFrom(signal);
    }
    throw error;
  }
};
