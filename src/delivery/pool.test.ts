import { describe, expect, it } from "vitest";
import { runParallel } from "./pool";

describe("runParallel", () => {
  it("keeps task order and caps concurrency", async () => {
    let running = 0;
    let peak = 0;
    const tasks = [30, 5, 20, 1, 10].map((delay, index) => async () => {
      running += 1;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, delay));
      running -= 1;
      return index;
    });

    expect(await runParallel(tasks, 2)).toEqual([0, 1, 2, 3, 4]);
    expect(peak).toBe(2);
  });

  it("handles an empty task list", async () => {
    expect(await runParallel([], 4)).toEqual([]);
  });
});
