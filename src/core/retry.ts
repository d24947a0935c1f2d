import { setTimeout as sleep } from 'node:timers/promises';
import { TimeoutError } from './errors';

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    if (ms > 0) {
      await sleep(ms);
    }
  },
};

export type PollPolicy = {
  maxAttempts: number;
  intervalMs: number;
  /** Multiplier applied to the interval after each miss. 1 means fixed interval. */
  backoff?: number;
  maxIntervalMs?: number;
  /** Wall-clock bound measured on the injected clock; unbounded when omitted. */
  timeoutMs?: number;
};

export type ProbeResult<T> = { done: true; value: T } | { done: false; reason: string };

export function validatePollPolicy(policy: PollPolicy): void {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts <= 0) {
    throw new Error(`maxAttempts must be a positive integer, got ${String(policy.maxAttempts)}`);
  }
  if (!Number.isFinite(policy.intervalMs) || policy.intervalMs < 0) {
    throw new Error(`intervalMs must be >= 0, got ${String(policy.intervalMs)}`);
  }
  if (policy.backoff !== undefined && (!Number.isFinite(policy.backoff) || policy.backoff < 1)) {
    throw new Error(`backoff must be >= 1, got ${String(policy.backoff)}`);
  }
}

export function delayBeforeAttempt(policy: PollPolicy, attempt: number): number {
  const factor = (policy.backoff ?? 1) ** Math.max(0, attempt - 2);
  const delay = policy.intervalMs * factor;
  return policy.maxIntervalMs === undefined ? delay : Math.min(delay, policy.maxIntervalMs);
}

/**
 * Calls `probe` until it reports done, at most `policy.maxAttempts` times.
 * Errors thrown by the probe are not retried.
 */
export async function pollUntil<T>(
  operation: string,
  probe: (attempt: number) => Promise<ProbeResult<T>>,
  policy: PollPolicy,
  clock: Clock = systemClock,
): Promise<T> {
  validatePollPolicy(policy);
  const deadline = policy.timeoutMs === undefined ? Infinity : clock.now() + policy.timeoutMs;
  let lastReason = 'no attempt made';
  let attempt = 0;
  while (attempt < policy.maxAttempts) {
    attempt += 1;
    if (attempt > 1) {
      await clock.sleep(delayBeforeAttempt(policy, attempt));
      if (clock.now() > deadline) {
        attempt -= 1;
        break;
      }
    }
    const result = await probe(attempt);
    if (result.done) {
      return result.value;
    }
    lastReason = result.reason;
  }
  throw new TimeoutError(operation, attempt, lastReason);
}
