import { getStatus } from '../errors';

type BackoffOptions = {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  factor?: number;
  jitter?: boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
};

const wait = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

// Client errors are final, except throttling and request timeouts.
export const isTransientError = (error: unknown): boolean => {
  const status = getStatus(error);

  if (typeof status !== 'number') {
    return true;
  }

  return status === 408 || status === 429 || status >= 500;
};

export const computeDelay = (
  attempt: number,
  { initialDelayMs = 500, maxDelayMs = 8_000, factor = 2, jitter = true }: BackoffOptions = {},
): number => {
  const cappedDelay = Math.min(initialDelayMs * factor ** (attempt - 1), maxDelayMs);

  return jitter
    ? Math.round(cappedDelay / 2 + Math.random() * (cappedDelay / 2))
    : Math.round(cappedDelay);
};

export const exponentialBackoff = async <T>(
  action: (attempt: number) => Promise<T>,
  options: BackoffOptions = {},
): Promise<T> => {
  const { maxAttempts = 3, onRetry, shouldRetry = isTransientError } = options;

  let attempt = 0;

  // eslint-disable-next-line no-constant-condition
  while (true) {
    attempt += 1;

    try {
      return await action(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error, attempt)) {
        throw error;
      }

      const delay = computeDelay(attempt, options);

      if (typeof onRetry === 'function') {
        try {
          onRetry(error, attempt, delay);
        } catch (hookError) {
          console.warn('[RETRY] Retry hook threw an error.', hookError);
        }
      }

      await wait(delay);
    }
  }
};

export type { BackoffOptions };
