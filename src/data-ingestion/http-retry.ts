/**
 * Retry helper for external API calls, with exponential backoff
 */

import { Logger } from '../shared/utils/logger';
import { errorMessage } from '../shared/utils/errors';

const MAX_BACKOFF_MS = 10000;

// Resolves after ms, or rejects with the signal's reason once it aborts
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
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
 * Retries a failed call with backoff. An aborted signal ends the loop:
 * no further attempt is made and the pending backoff is cut short.
 */
export async function callWithRetry<T>(
  logger: Logger,
  label: string,
  maxAttempts: number,
  call: () => Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    signal?.throwIfAborted();
    try {
      logger.debug(`Calling ${label}`, { attempt });
      return await call();
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      logger.warn(`${label} call failed`, {
        attempt,
        maxAttempts,
        error: errorMessage(error),
      });

      if (attempt >= maxAttempts) {
        throw new Error(`${label} failed after ${attempt} attempt(s): ${errorMessage(error)}`, { cause: error });
      }

      await sleep(Math.min(1000 * Math.pow(2, attempt - 1), MAX_BACKOFF_MS), signal);
    }
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asFiniteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}
