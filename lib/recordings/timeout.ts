import { StageTimeoutError } from "./errors";

export type StageTimeouts = {
  storageMs: number;
  transcriptionMs: number;
  /** Applies to each extraction attempt, not the whole retry loop. */
  extractionMs: number;
  remoteSyncMs: number;
};

export const DEFAULT_STAGE_TIMEOUTS: StageTimeouts = {
  storageMs: 30_000,
  transcriptionMs: 120_000,
  extractionMs: 60_000,
  remoteSyncMs: 60_000,
};

/**
 * Bound a port call. The operation receives a signal that aborts at the
 * deadline; the returned promise rejects with StageTimeoutError at that point
 * even if the operation ignores the signal.
 */
export async function withStageTimeout<T>(
  label: string,
  timeoutMs: number,
  operation: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new StageTimeoutError(label, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timeoutId);
  }
}
