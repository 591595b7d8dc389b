import { describe, expect, it } from "vitest";
import { Semaphore } from "../src/utils/semaphore.js";

describe("Semaphore", () => {
  it("grants slots up to capacity immediately", async () => {
    const slots = new Semaphore(2);
    expect(await slots.acquire()).toBe(true);
    expect(await slots.acquire()).toBe(true);
    expect(slots.tryAcquire()).toBe(false);
    expect(slots.getStats()).toEqual({ active: 2, peak: 2, waiting: 0, available: 0 });
  });

  it("hands released slots to waiters in arrival order", async () => {
    const slots = new Semaphore(1);
    await slots.acquire();
    const order: string[] = [];
    const first = slots.acquire().then(() => order.push("first"));
    const second = slots.acquire().then(() => order.push("second"));
    expect(slots.getStats().waiting).toBe(2);

    slots.release();
    await first;
    expect(order).toEqual(["first"]);

    slots.release();
    await second;
    expect(order).toEqual(["first", "second"]);
    expect(slots.getStats().active).toBe(1);
  });

  it("returns the slot to the pool when nobody waits", async () => {
    const slots = new Semaphore(1);
    await slots.acquire();
    slots.release();
    expect(slots.getStats()).toEqual({ active: 0, peak: 1, waiting: 0, available: 1 });
    expect(slots.tryAcquire()).toBe(true);
  });

  it("resolves false for a waiter whose signal aborts", async () => {
    const slots = new Semaphore(1);
    await slots.acquire();
    const controller = new AbortController();
    const pending = slots.acquire(controller.signal);

    controller.abort();

    expect(await pending).toBe(false);
    expect(slots.getStats().waiting).toBe(0);
    expect(slots.getStats().active).toBe(1);
  });

  it("does not take a slot for an already aborted signal", async () => {
    const slots = new Semaphore(3);
    const controller = new AbortController();
    controller.abort();
    expect(await slots.acquire(controller.signal)).toBe(false);
    expect(slots.getStats().active).toBe(0);
  });

  it("throws on release without acquire", () => {
    expect(() => new Semaphore(1).release()).toThrow("released more times than acquired");
  });

  it("rejects a capacity below 1", () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
    expect(() => new Semaphore(1.5)).toThrow(RangeError);
  });
});
