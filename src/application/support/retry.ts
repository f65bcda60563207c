import { setTimeout as sleep } from 'node:timers/promises';
import { StageTimeoutError } from '../../domain/errors/AnalysisErrors.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const calculateBackoffDelay = (attempt: number, policy: RetryPolicy): number => {
  const normalizedAttempt = Math.max(1, attempt);
  const delay = policy.baseDelayMs * 2 ** (normalizedAttempt - 1);
  return Math.min(delay, policy.maxDelayMs);
};

export interface RetryOptions {
  policy: RetryPolicy;
  shouldRetry: (error: unknown) => boolean;
  onAttemptFailed?: (error: unknown, attempt: number, retryInMs: number | null) => void;
  signal?: AbortSignal;
}

export const withRetry = async <T>(run: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> => {
  const { policy, shouldRetry, onAttemptFailed, signal } = options;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await run(attempt);
    } catch (error) {
      const canRetry = attempt < policy.maxAttempts && shouldRetry(error) && !signal?.aborted;
      const delayMs = canRetry ? calculateBackoffDelay(attempt, policy) : null;
      onAttemptFailed?.(error, attempt, delayMs);

      if (delayMs === null) {
        throw error;
      }

      await sleep(delayMs, undefined, { signal });
    }
  }
};

export interface TimeoutOptions {
  stage: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Runs `task` against its own abort signal. The signal fires when the budget runs out or the
 * parent signal aborts, and the returned promise settles right away in both cases even if the
 * task ignores the signal.
 */
export const withTimeout = async <T>(task: (signal: AbortSignal) => Promise<T>, options: TimeoutOptions): Promise<T> => {
  const { stage, timeoutMs, signal: parent } = options;
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const interrupted = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new StageTimeoutError(stage, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    if (parent) {
      onParentAbort = () => {
        controller.abort(parent.reason);
        reject(parent.reason);
      };

      if (parent.aborted) {
        onParentAbort();
      } else {
        parent.addEventListener('abort', onParentAbort, { once: true });
      }
    }
  });

  try {
    return await Promise.race([task(controller.signal), interrupted]);
  } finally {
    clearTimeout(timer);
    if (parent && onParentAbort) {
      parent.removeEventListener('abort', onParentAbort);
    }
  }
};
