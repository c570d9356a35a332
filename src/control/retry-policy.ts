/** `retry: false` means no attempts are left; the caller gives the target up. */
export type RetryDecision = {
  retry: boolean;
  delayMs: number;
};

export function computeRetryDecision(input: {
  attempt: number;
  maxAttempts: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitterRatio?: number;
  random?: () => number;
}): RetryDecision {
  const base = Math.max(1, input.baseDelayMs ?? 250);
  const maxDelay = Math.max(base, input.maxDelayMs ?? 10_000);
  const jitterRatio = Math.max(0, Math.min(0.5, input.jitterRatio ?? 0.1));
  const random = input.random ?? Math.random;

  if (input.attempt >= input.maxAttempts) {
    return { retry: false, delayMs: 0 };
  }

  const exp = Math.min(maxDelay, base * 2 ** Math.max(0, input.attempt - 1));
  const jitter = Math.round(exp * jitterRatio * random());
  const delayMs = exp + jitter;

  return { retry: true, delayMs };
}

/** Result delivery waits the full ceiling after every failure, without growth. */
export function resendDelayAfterFailure(maxResendDelayMs: number): number {
  return Math.max(0, maxResendDelayMs);
}
