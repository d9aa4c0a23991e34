import { log } from "../api/log";
import { RateLimitedError, RecordingPipelineError } from "./errors";

export type RetryPolicy = {
  /** Total attempts, including the first. */
  maxAttempts: number;
  /** Backoff after attempt n (from 0) is 2^n units. */
  unitMs: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  unitMs: 1000,
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run `operation`, retrying only when it throws RateLimitedError.
 *
 * Any other error propagates immediately. When every attempt is throttled the
 * result is an extraction_failure naming the exhausted retries.
 */
export async function withRateLimitRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: Partial<RetryPolicy> & { sleep?: Sleep; label?: string } = {},
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts));
  const unitMs = Math.max(0, options.unitMs ?? DEFAULT_RETRY_POLICY.unitMs);
  const wait = options.sleep ?? sleep;
  const label = options.label ?? "operation";

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (!(err instanceof RateLimitedError)) throw err;
      if (attempt === maxAttempts - 1) break;

      const delayMs = 2 ** attempt * unitMs;
      log("warn", "rate_limited_retry", { label, attempt, delayMs, error: err.message });
      await wait(delayMs);
    }
  }

  throw new RecordingPipelineError(
    "extraction_failure",
    `Extraction failed: rate limit retries exhausted after ${maxAttempts} attempts`,
  );
}
