import { describe, it, expect, vi } from "vitest";
import { retryWithBackoff, sleep } from "../sleep.js";

const policy = { maxAttempts: 3, baseDelayMs: 100 };

describe("retryWithBackoff", () => {
  it("returns the first non-null result and doubles the delay between attempts", async () => {
    const waits: number[] = [];
    const fn = vi.fn(async (attempt: number) => (attempt === 2 ? "ready" : null));

    const result = await retryWithBackoff(fn, policy, async (ms) => {
      waits.push(ms);
    });

    expect(result).toBe("ready");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(waits).toEqual([100, 200]);
  });

  it("returns null when every attempt comes back empty", async () => {
    const result = await retryWithBackoff(async () => null, policy, async () => {});

    expect(result).toBeNull();
  });

  it("rethrows the error from the final attempt", async () => {
    const fn = async (attempt: number): Promise<string | null> => {
      throw new Error(`boom ${attempt}`);
    };

    await expect(retryWithBackoff(fn, policy, async () => {})).rejects.toThrow("boom 2");
  });

  it("forgets an earlier error once a later attempt returns empty", async () => {
    const fn = async (attempt: number): Promise<string | null> => {
      if (attempt === 0) throw new Error("transient");
      return null;
    };

    await expect(retryWithBackoff(fn, { maxAttempts: 2, baseDelayMs: 1 }, async () => {})).resolves.toBeNull();
  });
});

describe("sleep", () => {
  it("resolves after the given delay", async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(1_000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
    vi.useRealTimers();
  });
});
