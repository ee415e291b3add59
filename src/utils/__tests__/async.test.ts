/**
 * Tests for cancellation and the bounded worker pool
 */

import { describe, it, expect } from "vitest";
import { CancellationTokenSource, mapConcurrent } from "../async.js";

describe("CancellationToken", () => {
  it("should throw the cancellation reason", () => {
    const source = new CancellationTokenSource();
    source.cancel("stop here");

    expect(() => source.token.throwIfCancelled()).toThrow("stop here");
  });
});

describe("mapConcurrent", () => {
  it("should keep the order of the input", async () => {
    const delays = [30, 10, 20];

    const results = await mapConcurrent(
      delays,
      async (delay, index) => {
        await new Promise((resolve) => setTimeout(resolve, delay));
        return index;
      },
      { concurrency: 3 }
    );

    expect(results).toEqual([0, 1, 2]);
  });

  it("should not run more operations than the concurrency limit", async () => {
    let running = 0;
    let peak = 0;

    await mapConcurrent(
      [1, 2, 3, 4, 5],
      async () => {
        running++;
        peak = Math.max(peak, running);
        await new Promise((resolve) => setTimeout(resolve, 5));
        running--;
      },
      { concurrency: 2 }
    );

    expect(peak).toBe(2);
  });

  it("should cancel remaining work after the first failure", async () => {
    const source = new CancellationTokenSource();
    const started: number[] = [];

    await expect(
      mapConcurrent(
        [1, 2, 3],
        async (item) => {
          started.push(item);
          if (item === 1) throw new Error("first failed");
          return item;
        },
        { concurrency: 1, cancellation: source }
      )
    ).rejects.toThrow("first failed");

    expect(started).toEqual([1]);
    expect(source.token.cancelled).toBe(true);
  });

  it("should wait for running operations before rejecting", async () => {
    const finished: string[] = [];

    await expect(
      mapConcurrent(
        ["fails", "slow"],
        async (item) => {
          if (item === "fails") throw new Error("fails at once");
          await new Promise((resolve) => setTimeout(resolve, 30));
          finished.push(item);
          return item;
        },
        { concurrency: 2 }
      )
    ).rejects.toThrow("fails at once");

    expect(finished).toEqual(["slow"]);
  });

  it("should reject with the first failure", async () => {
    await expect(
      mapConcurrent(
        [10, 0],
        async (delay) => {
          await new Promise((resolve) => setTimeout(resolve, delay));
          throw new Error(`failed after ${delay}`);
        },
        { concurrency: 2 }
      )
    ).rejects.toThrow("failed after 0");
  });

  it("should return an empty result for no items", async () => {
    expect(await mapConcurrent([], async () => 1, { concurrency: 4 })).toEqual([]);
  });
});
