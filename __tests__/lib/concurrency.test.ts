/**
 * Tests for the concurrency limiter
 */

import { describe, it, expect } from "vitest";
import { createLimiter } from "../../src/lib/concurrency";

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("createLimiter", () => {
  it("never runs more than the limit at once", async () => {
    const limit = createLimiter(2);
    let active = 0;
    let peak = 0;

    const task = async (value: number) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((r) => setTimeout(r, 5));
      active--;
      return value;
    };

    const results = await Promise.all([1, 2, 3, 4, 5].map((n) => limit(() => task(n))));

    expect(results).toEqual([1, 2, 3, 4, 5]);
    expect(peak).toBe(2);
  });

  it("starts queued tasks in submission order", async () => {
    const limit = createLimiter(1);
    const gate = deferred<void>();
    const started: string[] = [];

    const first = limit(async () => {
      started.push("first");
      await gate.promise;
    });
    const second = limit(async () => {
      started.push("second");
    });
    const third = limit(async () => {
      started.push("third");
    });

    await Promise.resolve();
    expect(started).toEqual(["first"]);

    gate.resolve();
    await Promise.all([first, second, third]);
    expect(started).toEqual(["first", "second", "third"]);
  });

  it("keeps going after a task fails", async () => {
    const limit = createLimiter(1);
    const failing = limit(async () => {
      throw new Error("nope");
    });
    const next = limit(async () => "ok");

    await expect(failing).rejects.toThrow("nope");
    await expect(next).resolves.toBe("ok");
  });

  it("rejects a non-positive limit", () => {
    expect(() => createLimiter(0)).toThrow("maxConcurrent must be a positive integer, got 0");
  });
});
