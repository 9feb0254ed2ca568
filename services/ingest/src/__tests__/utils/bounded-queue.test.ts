import { describe, it, expect } from "vitest";
import { BoundedQueue } from "../../utils/bounded-queue.js";

describe("BoundedQueue", () => {
  it("rejects a capacity below one", () => {
    expect(() => new BoundedQueue(0)).toThrow(RangeError);
    expect(() => new BoundedQueue(1.5)).toThrow(RangeError);
  });

  it("delivers items in order and ends after close", async () => {
    const queue = new BoundedQueue<number>(4);
    await queue.push(1);
    await queue.push(2);
    queue.close();

    const seen: number[] = [];
    for await (const item of queue) seen.push(item);
    expect(seen).toEqual([1, 2]);
  });

  it("blocks a push while the queue is full", async () => {
    const queue = new BoundedQueue<string>(1);
    await queue.push("a");

    let pushed = false;
    const pending = queue.push("b").then(() => {
      pushed = true;
    });
    await Promise.resolve();
    expect(pushed).toBe(false);
    expect(queue.size).toBe(1);

    expect(await queue.pull()).toEqual({ done: false, value: "a" });
    await pending;
    expect(pushed).toBe(true);
    expect(await queue.pull()).toEqual({ done: false, value: "b" });
  });

  it("hands an item straight to a waiting consumer", async () => {
    const queue = new BoundedQueue<string>(1);
    const next = queue.pull();
    await queue.push("x");
    expect(await next).toEqual({ done: false, value: "x" });
    expect(queue.size).toBe(0);
  });

  it("wakes waiting consumers on close", async () => {
    const queue = new BoundedQueue<string>(1);
    const next = queue.pull();
    queue.close();
    expect(await next).toEqual({ done: true, value: undefined });
  });

  it("fails pushes after close, including blocked ones", async () => {
    const queue = new BoundedQueue<string>(1);
    await queue.push("a");
    const blocked = queue.push("b");
    queue.close();
    await expect(blocked).rejects.toThrow("Queue is closed");
    await expect(queue.push("c")).rejects.toThrow("Queue is closed");
  });
});
