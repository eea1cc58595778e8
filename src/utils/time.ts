import { RefreshCancelledError } from './errors';

/**
 * Wait `ms` milliseconds. Rejects with RefreshCancelledError as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new RefreshCancelledError());
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RefreshCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Render unix-epoch seconds as an ISO-8601 UTC timestamp with an explicit offset,
 * e.g. 1600000000 -> "2020-09-13T12:26:40+00:00"
 */
export function formatUnixTime(unixSeconds: number): string {
  const iso = new Date(unixSeconds * 1000).toISOString();
  return `${iso.slice(0, 19)}+00:00`;
}
