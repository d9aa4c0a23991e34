import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { StageTimeoutError } from "@/lib/recordings/errors";
import { withStageTimeout } from "@/lib/recordings/timeout";

describe("withStageTimeout", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves with the operation result inside the deadline", async () => {
    await expect(withStageTimeout("Transcription", 1000, async () => "text")).resolves.toBe("text");
    expect(vi.getTimerCount()).toBe(0);
  });

  it("rejects at the deadline and aborts the signal", async () => {
    let seen: AbortSignal | undefined;
    const pending = withStageTimeout("Transcription", 2000, (signal) => {
      seen = signal;
      return new Promise<string>(() => undefined);
    });
    const outcome = pending.catch((err: unknown) => err);

    await vi.advanceTimersByTimeAsync(2000);

    const error = await outcome;
    expect(error).toBeInstanceOf(StageTimeoutError);
    expect(error).toMatchObject({ message: "Transcription timed out after 2s" });
    expect(seen?.aborted).toBe(true);
  });

  it("passes operation errors through", async () => {
    await expect(
      withStageTimeout("Remote sync", 1000, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
  });
});
