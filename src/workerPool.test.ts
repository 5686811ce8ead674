import { describe, expect, it } from "vitest";
import { runPool } from "./workerPool.js";

const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("runPool", () => {
  it("keeps results in input order when calls finish late", async () => {
    const delays = [30, 5, 15, 0];

    const { results, skipped } = await runPool(
      delays,
      async (delay, index) => {
        await sleep(delay);
        return `item-${index}`;
      },
      { concurrency: 4 },
    );

    expect(results).toEqual(["item-0", "item-1", "item-2", "item-3"]);
    expect(skipped).toBe(0);
  });

  it("never runs more than the concurrency limit at once", async () => {
    let active = 0;
    let peak = 0;

    await runPool(
      Array.from({ length: 9 }, (_, index) => index),
      async (index) => {
        active += 1;
        peak = Math.max(peak, active);
        await sleep(index % 3);
        active -= 1;
        return index;
      },
      { concurrency: 3 },
    );

    expect(peak).toBe(3);
  });

  it("starts nothing new once the signal aborts", async () => {
    const controller = new AbortController();
    const started: number[] = [];

    const { results, skipped } = await runPool(
      [0, 1, 2, 3, 4],
      async (item) => {
        started.push(item);
        if (item === 1) {
          controller.abort();
        }
        await sleep(1);
        return item * 10;
      },
      { concurrency: 1, signal: controller.signal },
    );

    expect(started).toEqual([0, 1]);
    expect(results).toEqual([0, 10, undefined, undefined, undefined]);
    expect(skipped).toBe(3);
  });

  it("rejects a concurrency below one", async () => {
    await expect(
      runPool([1], async (item) => item, { concurrency: 0 }),
    ).rejects.toThrow(RangeError);
  });

  it("handles an empty list", async () => {
    expect(await runPool([], async () => 1, { concurrency: 2 })).toEqual({
      results: [],
      skipped: 0,
    });
  });
});
