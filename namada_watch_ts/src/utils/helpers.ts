import { formatUnits } from 'ethers';

/** Decimal places of the native token amounts reported by the node. */
export const NATIVE_TOKEN_DECIMALS = 6;

export function formatAmount(
  raw: bigint,
  decimals: number = NATIVE_TOKEN_DECIMALS
): string {
  return formatUnits(raw, decimals);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) return resolve();
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settles with the promise's value, or with `undefined` as soon as `signal`
 * aborts. The promise itself keeps running; its result is dropped.
 */
export function abandonOnAbort<T>(
  promise: Promise<T>,
  signal?: AbortSignal
): Promise<T | undefined> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.resolve(undefined);
  return new Promise<T | undefined>((resolve, reject) => {
    const onAbort = () => resolve(undefined);
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
 * Runs `worker` over `items` with at most `limit` calls in flight. Results
 * keep the order of `items`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const run = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  };

  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, run));
  return results;
}

export function maybeCoerceError(error: unknown): Error {
  if (error instanceof Error) return error;
  return new Error(String(error));
}
