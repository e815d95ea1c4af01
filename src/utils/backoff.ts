export type BackoffPolicy = {
  delayMs: number;
  maxDelayMs?: number;
  jitterFactor?: number;
  random?: () => number;
};

export type BackoffMeta = {
  minDelayMs: number;
  maxDelayMs: number;
  baseDelayMs: number;
  appliedJitterMs: number;
};

export type BackoffResult = {
  delayMs: number;
  meta: BackoffMeta;
};

/**
 * Exponential delay for the given 1-based attempt, clamped to
 * `[delayMs, maxDelayMs]` after a symmetric jitter of `jitterFactor * base`.
 */
export function computeBackoffDelay(attempt: number, policy: BackoffPolicy): BackoffResult {
  const minDelayMs = Math.max(0, policy.delayMs);
  const maxDelayMs = Math.max(minDelayMs, policy.maxDelayMs ?? minDelayMs);

  let baseDelayMs = minDelayMs;
  if (attempt > 1) {
    const exponential = minDelayMs * 2 ** (attempt - 1);
    baseDelayMs = Math.min(maxDelayMs, Math.max(minDelayMs, Math.round(exponential)));
  }

  const factor = Math.max(0, policy.jitterFactor ?? 0);
  const jitterRange = Math.round(baseDelayMs * factor);
  let appliedJitterMs = 0;

  if (jitterRange > 0) {
    const random = policy.random?.() ?? Math.random();
    appliedJitterMs = Math.round((random * 2 - 1) * jitterRange);
  }

  let delayMs = baseDelayMs + appliedJitterMs;
  if (delayMs > maxDelayMs) {
    delayMs = maxDelayMs;
  } else if (delayMs < minDelayMs) {
    delayMs = minDelayMs;
  }

  return {
    delayMs,
    meta: {
      minDelayMs,
      maxDelayMs,
      baseDelayMs,
      appliedJitterMs: delayMs - baseDelayMs
    }
  };
}
