import { describe, expect, it } from "vitest";

import { forEachWithConcurrency } from "../src/lib/concurrency.js";

const tick = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("forEachWithConcurrency", () => {
  it("never runs more than the limit at once", async () => {
    let inFlight = 0;
    let peak = 0;
    const seen: number[] = [];

    await forEachWithConcurrency([5, 1, 4, 2, 3, 1, 2], 3, async (delay, index) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await tick(delay);
      seen.push(index);
      inFlight -= 1;
    });

    expect(peak).toBe(3);
    expect([...seen].sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5, 6]);
  });

  it("runs tasks in order with a limit of one", async () => {
    const order: number[] = [];

    await forEachWithConcurrency(["a", "b", "c"], 1, async (_item, index) => {
      await tick(3 - index);
      order.push(index);
    });

    expect(order).toEqual([0, 1, 2]);
  });

  it("stops scheduling after a failure and waits for running tasks", async () => {
    const started: number[] = [];
    const finished: number[] = [];

    await expect(
      forEachWithConcurrency(Array.from({ length: 10 }, (_, index) => index), 2, async (item) => {
        started.push(item);
        if (item === 1) {
          throw new Error("chunk 1 failed");
        }
        await tick(10);
        finished.push(item);
      }),
    ).rejects.toThrow("chunk 1 failed");

    expect(started).toEqual([0, 1]);
    expect(finished).toEqual([0]);
  });

  it("rejects a non-positive limit", async () => {
    await expect(forEachWithConcurrency([1], 0, async () => undefined)).rejects.toBeInstanceOf(
      RangeError,
    );
  });
});
