import { setTimeout as sleep } from "timers/promises";
import { classifyFailure } from "#/errors";
import type { RetryConfig } from "#/schemas";

export interface RetryHooks {
  /** Called before waiting for the next attempt */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Backoff before the attempt following `attempt` (1-based).
 *
 * @example retryDelay(3, { baseDelayMs: 500, maxDelayMs: 10_000 }) → 2000
 */
export function retryDelay(attempt: number, policy: Pick<RetryConfig, "baseDelayMs" | "maxDelayMs">): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Run an operation, retrying retryable failures with exponential backoff.
 * Fatal failures and the last retryable failure are rethrown as-is.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryConfig,
  hooks: RetryHooks = {}
): Promise<T> {
  const wait = hooks.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (attempt >= policy.maxAttempts || classifyFailure(err) === "fatal") {
        throw err;
      }
      const delayMs = retryDelay(attempt, policy);
      hooks.onRetry?.(err, attempt, delayMs);
      await wait(delayMs);
    }
  }
}
