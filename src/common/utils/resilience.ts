/**
 * Resilience utilities for handling transient failures.
 *
 * Features:
 * - Exponential backoff delay calculation
 * - Abort-aware sleep
 * - Bounded worker pool
 */

export interface BackoffOptions {
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
}

const DEFAULT_BACKOFF_OPTIONS: BackoffOptions = {
  baseDelayMs: 500,
  factor: 2,
  maxDelayMs: 4000,
};

/**
 * Delay before the given retry (1-based): base * factor^(retry-1), capped.
 */
export function backoffDelayMs(
  retry: number,
  options: Partial<BackoffOptions> = {},
): number {
  const opts = { ...DEFAULT_BACKOFF_OPTIONS, ...options };
  const exponent = Math.max(0, retry - 1);
  return Math.min(opts.baseDelayMs * Math.pow(opts.factor, exponent), opts.maxDelayMs);
}

export type DelayFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Waits for `ms` milliseconds. Resolves early (never rejects) when the
 * signal aborts, so callers check `signal.aborted` afterwards.
 */
export const sleep: DelayFn = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const finish = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', finish);
      resolve();
    };

    const timer = setTimeout(finish, ms);
    signal?.addEventListener('abort', finish, { once: true });
  });

/**
 * Runs `worker` over every item with at most `limit` in flight.
 * Items are picked up in input order; completion order is unspecified.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> {
  let next = 0;
  const lanes = Math.max(1, Math.min(Math.floor(limit), items.length));

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      await worker(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: lanes }, () => lane()));
}

/**
 * Combines an optional caller signal with an optional timeout.
 * Call `dispose` once the guarded work settles to clear the timer.
 */
export function linkAbortSignal(
  parent?: AbortSignal,
  timeoutMs?: number,
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const abort = () => controller.abort();

  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', abort, { once: true });
  }

  const timer =
    timeoutMs !== undefined && timeoutMs >= 0
      ? setTimeout(abort, timeoutMs)
      : undefined;
  timer?.unref();

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener('abort', abort);
    },
  };
}
