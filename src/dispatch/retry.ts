export type RetryOptions = {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitterMs?: number;
};

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
};

export function normalizeRetryOptions(input: RetryOptions | undefined): RetryPolicy {
  const baseDelayMs = Math.max(0, input?.baseDelayMs ?? 250);
  return {
    maxAttempts: Math.max(1, Math.min(input?.maxAttempts ?? 4, 25)),
    baseDelayMs,
    maxDelayMs: Math.max(baseDelayMs, input?.maxDelayMs ?? 4_000),
    jitterMs: Math.max(0, input?.jitterMs ?? 100),
  };
}

/** Delay before retry number `retryIndex` (0 for the first retry): capped exponential plus jitter. */
export function computeRetryDelay(policy: RetryPolicy, retryIndex: number, random: () => number = Math.random): number {
  const exponential = Math.min(policy.baseDelayMs * 2 ** retryIndex, policy.maxDelayMs);
  const jitter = Math.floor(random() * (policy.jitterMs + 1));
  return exponential + jitter;
}

/** Upper bound on time spent sleeping between attempts for a policy. */
export function maxTotalBackoffMs(policy: RetryPolicy): number {
  let total = 0;
  for (let retryIndex = 0; retryIndex < policy.maxAttempts - 1; retryIndex += 1) {
    total += Math.min(policy.baseDelayMs * 2 ** retryIndex, policy.maxDelayMs) + policy.jitterMs;
  }
  return total;
}
