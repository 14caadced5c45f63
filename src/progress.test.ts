/**
 * Propagation waits unit tests
 */

import { describe, it, expect, vi } from "vitest";
import { waitForPropagation } from "./progress.js";

function virtualClock() {
  let t = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => t,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      t += ms;
    },
  };
}

describe("waitForPropagation", () => {
  it("returns immediately when the object is already visible", async () => {
    const clock = virtualClock();
    const check = vi.fn().mockResolvedValue(true);

    const result = await waitForPropagation(check, { initialDelayMs: 1000, maxDelayMs: 4000, maxWaitMs: 10_000 }, clock);

    expect(result).toEqual({ visible: true, attempts: 1, elapsedMs: 0 });
    expect(clock.sleeps).toEqual([]);
  });

  it("backs off exponentially until the object appears", async () => {
    const clock = virtualClock();
    const check = vi.fn()
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce(true);

    const result = await waitForPropagation(check, { initialDelayMs: 1000, maxDelayMs: 4000, maxWaitMs: 10_000 }, clock);

    expect(result).toEqual({ visible: true, attempts: 3, elapsedMs: 3000 });
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it("caps delays and clips the last one to the deadline", async () => {
    const clock = virtualClock();
    const onMiss = vi.fn();
    const check = vi.fn().mockResolvedValue(false);

    const result = await waitForPropagation(
      check,
      { initialDelayMs: 1000, maxDelayMs: 4000, maxWaitMs: 10_000 },
      { ...clock, onMiss },
    );

    expect(result).toEqual({ visible: false, attempts: 5, elapsedMs: 10_000 });
    expect(clock.sleeps).toEqual([1000, 2000, 4000, 3000]);
    expect(onMiss).toHaveBeenNthCalledWith(1, 1, 1000);
    expect(onMiss).toHaveBeenLastCalledWith(4, 3000);
  });

  it("propagates errors from the check", async () => {
    const clock = virtualClock();
    const check = vi.fn().mockRejectedValue(new Error("forbidden"));

    await expect(
      waitForPropagation(check, { initialDelayMs: 10, maxDelayMs: 10, maxWaitMs: 100 }, clock),
    ).rejects.toThrow("forbidden");
  });
});
