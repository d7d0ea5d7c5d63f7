import { RequestCancelledError } from '../errors/reddit-api-error.js';

/** Wait durations between attempts of one logical request. */
export const DEFAULT_BACKOFF_SCHEDULE_MS: ReadonlyArray<number> = [4_000, 8_000, 16_000];

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Suspend the calling task only. Rejects with `RequestCancelledError` as soon
 * as `signal` aborts.
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RequestCancelledError(signal.reason));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new RequestCancelledError(signal?.reason));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
