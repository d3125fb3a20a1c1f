import { describe, expect, test } from "vitest";

import { SerialQueue } from "../../src/serial-queue";

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe("SerialQueue", () => {
  test("runs tasks one at a time in submission order", async () => {
    const queue = new SerialQueue();
    const trace: string[] = [];

    const slow = queue.run(async () => {
      trace.push("a:start");
      await delay(10);
      trace.push("a:end");
      return "a";
    });
    const fast = queue.run(() => {
      trace.push("b");
      return "b";
    });

    expect(await Promise.all([slow, fast])).toEqual(["a", "b"]);
    expect(trace).toEqual(["a:start", "a:end", "b"]);
  });

  test("a rejected task does not block later tasks", async () => {
    const queue = new SerialQueue();

    const failed = queue.run(() => {
      throw new Error("boom");
    });
    const next = queue.run(() => 42);

    await expect(failed).rejects.toThrow("boom");
    expect(await next).toBe(42);
  });

  test("size tracks unsettled tasks", async () => {
    const queue = new SerialQueue();
    const first = queue.run(() => delay(5));
    const second = queue.run(() => undefined);

    expect(queue.size).toBe(2);
    await Promise.all([first, second]);
    await queue.idle();
    expect(queue.size).toBe(0);
  });
});
