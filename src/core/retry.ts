import { retryPolicyConfigSchema } from '../schema/workflow.js';
import type { FailureClass, RetryPolicyConfig } from '../schema/workflow.js';
import { InvocationError } from '../llm/errors.js';
import * as log from '../utils/logger.js';
import { RetryExhaustedError } from './errors.js';

// ── Policy ───────────────────────────────────────────────────

export interface RetryPolicy {
  readonly attempts: number;
  readonly expBase: number;
  /** Delay before the second attempt, in seconds. */
  readonly initialDelay: number;
  readonly retryOn: ReadonlySet<FailureClass>;
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Build a frozen policy. Omitted fields take the defaults: 5 attempts,
 * base 7, 1s initial delay, retrying the four transient failure classes.
 */
export function createRetryPolicy(config: Partial<RetryPolicyConfig> = {}): RetryPolicy {
  const parsed = retryPolicyConfigSchema.parse(config);
  return Object.freeze({
    attempts: parsed.attempts,
    expBase: parsed.expBase,
    initialDelay: parsed.initialDelay,
    retryOn: new Set(parsed.retryOn),
  });
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = createRetryPolicy();

/** Wait before attempt `attempt + 1`, where `attempt` counts from 1. */
export function backoffDelayMs(policy: RetryPolicy, attempt: number): number {
  return policy.initialDelay * Math.pow(policy.expBase, attempt - 1) * 1000;
}

export function classifyFailure(err: unknown): FailureClass {
  return err instanceof InvocationError ? err.classification : 'other';
}

// ── Invocation wrapper ──────────────────────────────────────

export interface RetryOptions {
  sleep: Sleep;
  /** Names the call in logs and in `RetryExhaustedError`. */
  label: string;
}

/**
 * Run `fn` under `policy`. Retryable failures back off exponentially until
 * the attempts run out (`RetryExhaustedError`); any other failure is
 * rethrown as-is on the spot.
 */
export async function invokeWithRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const classification = classifyFailure(err);
      if (!policy.retryOn.has(classification)) throw err;
      if (attempt >= policy.attempts) {
        throw new RetryExhaustedError(options.label, attempt, err);
      }

      const waitMs = backoffDelayMs(policy, attempt);
      log.retry(options.label, attempt, policy.attempts, waitMs, classification);
      await options.sleep(waitMs);
    }
  }
}
