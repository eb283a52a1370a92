import type { DeliveryFailureKind } from "./types.js";

export interface RetryPolicy {
  /** Total attempts per event, including the first. */
  readonly maxAttempts: number;
  /** Wait before attempt n+1 is `backoffMs[n-1]`; the last entry repeats. */
  readonly backoffMs: ReadonlyArray<number>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffMs: [1000, 2000, 4000],
};

const isPositiveFinite = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value) && value > 0;

export const resolveRetryPolicy = (policy?: Partial<RetryPolicy>): RetryPolicy => {
  const maxAttempts =
    policy?.maxAttempts !== undefined && Number.isInteger(policy.maxAttempts) && policy.maxAttempts >= 1
      ? policy.maxAttempts
      : DEFAULT_RETRY_POLICY.maxAttempts;
  const backoffMs =
    policy?.backoffMs && policy.backoffMs.length > 0 ? [...policy.backoffMs] : [...DEFAULT_RETRY_POLICY.backoffMs];

  return { maxAttempts, backoffMs } satisfies RetryPolicy;
};

const getDelayMs = (policy: RetryPolicy, attemptNumber: number): number => {
  const index = Math.min(Math.max(attemptNumber - 1, 0), policy.backoffMs.length - 1);
  const value = policy.backoffMs[index];
  return isPositiveFinite(value) ? value : DEFAULT_RETRY_POLICY.backoffMs[0] ?? 1000;
};

export type RetryDecision =
  | { readonly shouldRetry: true; readonly delayMs: number }
  | { readonly shouldRetry: false; readonly reason: "exhausted" | "non_retryable" | "aborted" };

export const determineRetryDecision = (
  attemptNumber: number,
  failure: DeliveryFailureKind,
  policy: RetryPolicy,
): RetryDecision => {
  switch (failure) {
    case "transient":
      if (attemptNumber >= policy.maxAttempts) {
        return { shouldRetry: false, reason: "exhausted" };
      }
      return { shouldRetry: true, delayMs: getDelayMs(policy, attemptNumber) };
    case "rejected":
    case "security":
      return { shouldRetry: false, reason: "non_retryable" };
    case "aborted":
      return { shouldRetry: false, reason: "aborted" };
    default: {
      const unhandled: never = failure;
      throw new Error(`Unhandled delivery failure kind: ${String(unhandled)}`);
    }
  }
};
