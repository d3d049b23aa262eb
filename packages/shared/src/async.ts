/**
 * Modelsync Shared - Async Helpers
 * Abortable timers and retry with backoff
 */

import type { RetryOptions } from './types.js';

/**
 * Resolve after `ms`, or reject with the signal's reason once it aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Delay before the retry that follows a failed `attempt` (1-based)
 */
export function backoffDelay(attempt: number, options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'linear'>): number {
  const raw = options.linear
    ? options.baseDelayMs * attempt
    : options.baseDelayMs * Math.pow(2, attempt - 1);
  return options.maxDelayMs !== undefined ? Math.min(raw, options.maxDelayMs) : raw;
}

/**
 * Run `fn` until it resolves or the attempt budget is spent.
 * An aborted signal stops retrying and rethrows immediately.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  let attempt = 1;

  while (true) {
    options.signal?.throwIfAborted();

    try {
      return await fn(attempt);
    } catch (error) {
      if (options.signal?.aborted) throw error;
      if (attempt >= options.attempts) throw error;
      if (options.shouldRetry && !options.shouldRetry(error, attempt)) throw error;

      const delay = backoffDelay(attempt, options);
      options.onRetry?.(error, attempt, delay);
      await sleep(delay, options.signal);
      attempt++;
    }
  }
}

/**
 * Normalize an unknown thrown value into a message
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export interface ScopedSignal {
  signal: AbortSignal;
  /** Clear the timer and detach from the parent */
  dispose(): void;
}

/**
 * Signal that follows `parent` and also aborts with `timeoutReason()` after `timeoutMs`.
 * Callers can tell a timeout from a parent abort by the reason.
 */
export function scopedSignal(
  parent: AbortSignal | undefined,
  timeoutMs: number | false,
  timeoutReason: () => unknown
): ScopedSignal {
  const controller = new AbortController();
  const onAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onAbort, { once: true });
  }

  const timer = timeoutMs === false ? undefined : setTimeout(() => controller.abort(timeoutReason()), timeoutMs);

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer !== undefined) clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    },
  };
}
