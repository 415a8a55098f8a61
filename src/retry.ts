/**
 * Bounded exponential backoff for calls that create or mutate a resource.
 *
 * Only TransientBackendError is retried. Everything else (validation,
 * not-found, quota, precondition) propagates on the first attempt.
 */

import { classifyError, errorMessage } from "./errors.js";

export interface RetryPolicy {
  /** Total attempts including the first. Default: 3. */
  maxAttempts: number;
  /** Wait after the first failure. Default: 2000 ms. */
  baseWaitMs: number;
  /** Upper bound for any single wait. Default: 10000 ms. */
  maxWaitMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseWaitMs: 2000,
  maxWaitMs: 10000,
};

export type Sleep = (ms: number) => Promise<void>;

export interface RetryOptions {
  policy?: RetryPolicy;
  /** Shown in log lines, e.g. "create_store". */
  label?: string;
  sleep?: Sleep;
}

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Wait before the next attempt after attempt `attempt` (1-based) failed:
 * min(base * 2^(attempt - 1), cap).
 */
export function retryDelayMs(attempt: number, policy: RetryPolicy = DEFAULT_RETRY_POLICY): number {
  return Math.min(policy.baseWaitMs * 2 ** (attempt - 1), policy.maxWaitMs);
}

/**
 * Run `fn`, retrying transient failures per the policy. Errors are rethrown
 * classified; once attempts are exhausted the last error carries `attempts`.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const sleep = options.sleep ?? defaultSleep;
  const label = options.label ?? "backend call";
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const classified = classifyError(error);
      if (!classified.retryable) throw classified;

      if (attempt >= maxAttempts) {
        classified.attempts = attempt;
        console.error(`[retry] ${label} failed after ${attempt} attempt(s): ${errorMessage(classified)}`);
        throw classified;
      }

      const delayMs = retryDelayMs(attempt, policy);
      console.warn(
        `[retry] ${label} failed (attempt ${attempt}/${maxAttempts}): ${errorMessage(classified)}; ` +
        `retrying in ${delayMs}ms`,
      );
      await sleep(delayMs);
    }
  }
}
