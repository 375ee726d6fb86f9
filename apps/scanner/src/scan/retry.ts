import type { ScanConfig, TransportErrorKind } from "./types";

export type RetryDecision = { retry: true; retryAfterMs: number } | { retry: false };

export interface RetryPolicy {
  /** `attempt` is the 1-based number of the attempt that just failed. */
  shouldRetry(attempt: number, error: { kind: TransportErrorKind }): RetryDecision;
}

export type BackoffSettings = Pick<ScanConfig, "maxRetries" | "backoffBaseMs" | "backoffMultiplier" | "backoffMaxMs">;

export const RETRYABLE_KINDS: ReadonlySet<TransportErrorKind> = new Set<TransportErrorKind>([
  "Timeout",
  "ConnectionRefused",
]);

export const computeBackoff = (
  attempt: number,
  settings: Pick<BackoffSettings, "backoffBaseMs" | "backoffMultiplier" | "backoffMaxMs">,
) => Math.min(settings.backoffMaxMs, settings.backoffBaseMs * settings.backoffMultiplier ** Math.max(0, attempt - 1));

export const createRetryPolicy = (settings: BackoffSettings): RetryPolicy => ({
  shouldRetry(attempt, error) {
    if (!RETRYABLE_KINDS.has(error.kind)) return { retry: false };
    if (attempt > settings.maxRetries) return { retry: false };
    return { retry: true, retryAfterMs: computeBackoff(attempt, settings) };
  },
});
