import { getErrorMessage } from '../errors';
import { createLogger } from './logger';

export const DEFAULT_MAX_ATTEMPTS = 5;
export const DEFAULT_INITIAL_DELAY_MS = 1000;

const logger = createLogger('retry');

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  /** Operation name used in retry log lines. */
  label?: string;
}

/**
 * Runs `operation` until it resolves or `maxAttempts` attempts have failed.
 *
 * Every failure is retried, whatever its class; the delay doubles after each
 * failed attempt. The last attempt's error is rethrown unchanged.
 */
export async function runWithBackoff<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS));
  const label = options.label ?? 'Remote operation';
  let delayMs = Math.max(0, options.initialDelayMs ?? DEFAULT_INITIAL_DELAY_MS);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation();
    } catch (error: unknown) {
      if (attempt >= maxAttempts) {
        throw error;
      }

      logger.warn(
        `${label} failed (attempt ${attempt}/${maxAttempts}), retrying in ${delayMs}ms: ${getErrorMessage(error)}`,
      );
      await sleep(delayMs);
      delayMs *= 2;
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
