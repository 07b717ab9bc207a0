import {
  GENERATION_BACKOFF_BASE_MS,
  GENERATION_BACKOFF_MAX_MS,
  GENERATION_MAX_ATTEMPTS,
} from '@careplan/shared/constants/order.constants.js';
import type { DeadLetterSink } from './generation.queue.js';

// ---------------------------------------------------------------------------
// Retry policy
// ---------------------------------------------------------------------------

export interface RetryPolicy {
  readonly maxAttempts: number;
  /** Delay before the next delivery after `attempt` failed transiently. */
  backoffMs(attempt: number): number;
  /** True when `attempt` was the last delivery allowed. */
  isExhausted(attempt: number): boolean;
  readonly deadLetters: DeadLetterSink;
}

export interface RetryPolicyOptions {
  maxAttempts?: number;
  baseMs?: number;
  maxBackoffMs?: number;
  deadLetters: DeadLetterSink;
}

/** Exponential backoff: base * 2^(attempt-1), capped. */
export function createRetryPolicy(opts: RetryPolicyOptions): RetryPolicy {
  const maxAttempts = opts.maxAttempts ?? GENERATION_MAX_ATTEMPTS;
  const baseMs = opts.baseMs ?? GENERATION_BACKOFF_BASE_MS;
  const capMs = opts.maxBackoffMs ?? GENERATION_BACKOFF_MAX_MS;

  return {
    maxAttempts,
    backoffMs(attempt) {
      const exponent = Math.max(0, attempt - 1);
      return Math.min(capMs, baseMs * 2 ** exponent);
    },
    isExhausted(attempt) {
      return attempt >= maxAttempts;
    },
    deadLetters: opts.deadLetters,
  };
}
