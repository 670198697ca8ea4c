import { StorageBusyError } from '../types/errors';
import type { Result } from '../types/result';

export type RetryOptions = {
  retries?: number;
  delayMs?: number;
};

const wait = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Re-runs an operation while it reports StorageBusy, backing off linearly.
 * Every other outcome, including DNC violations, is returned as-is.
 */
export const withStorageRetry = async <T, E>(
  operation: () => Promise<Result<T, E>>,
  options: RetryOptions = {}
): Promise<Result<T, E>> => {
  const retries = options.retries ?? 2;
  const delayMs = options.delayMs ?? 400;

  let attempt = 0;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    const result = await operation();
    if (result.ok || !(result.error instanceof StorageBusyError) || attempt >= retries) {
      return result;
    }
    attempt += 1;
    await wait(delayMs * attempt);
  }
};
