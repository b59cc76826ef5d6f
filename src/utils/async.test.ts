import { describe, it, expect, vi, afterEach } from "vitest";
import { TimeoutError, withTimeout } from "./async";

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves with the value when the promise settles in time", async () => {
    await expect(withTimeout(Promise.resolve(42), 100, "Answer")).resolves.toBe(42);
  });

  it("passes through the original rejection", async () => {
    await expect(
      withTimeout(Promise.reject(new Error("boom")), 100, "Answer")
    ).rejects.toThrow("boom");
  });

  it("rejects with a TimeoutError once the deadline passes", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<number>(() => {}), 500, "Slow call");
    const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutError);

    await vi.advanceTimersByTimeAsync(500);

    await assertion;
    await expect(pending).rejects.toThrow("Slow call timed out after 500ms");
  });

  it("clears its timer after settling", async () => {
    vi.useFakeTimers();

    await withTimeout(Promise.resolve("done"), 1000, "Quick call");

    expect(vi.getTimerCount()).toBe(0);
  });
});
