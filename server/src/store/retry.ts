import type { Logger } from 'pino';
import { BackendUnavailableError } from '../errors.js';

export type RetryOptions = {
  /** Extra attempts after the first one. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs = 5_000): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Runs `fn`, retrying retryable `BackendUnavailableError`s with exponential
 * backoff. The final error carries the number of attempts made.
 */
export async function withRetry<T>(label: string, fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const sleep = opts.sleep ?? defaultSleep;
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (e) {
      if (!(e instanceof BackendUnavailableError)) throw e;
      if (!e.retryable || attempt > opts.maxRetries) {
        throw new BackendUnavailableError(e.workbookId, e.reason, e.message, attempt, { cause: e.cause });
      }
      const delay = backoffDelay(attempt, opts.baseDelayMs, opts.maxDelayMs);
      opts.logger?.warn({ label, attempt, delay, err: e.message }, 'backend call failed; retrying');
      await sleep(delay);
    }
  }
}
