import { describe, expect, it, vi } from "vitest";
import { exponentialBackoff } from "../src/utils/backoff.js";
import type { AttemptResult } from "../src/utils/retry.js";
import { retry, sleep } from "../src/utils/retry.js";
import { recordingSleep } from "./helpers.js";

function sequence(results: boolean[]): (attempt: number) => Promise<AttemptResult<string>> {
  return async (attempt) =>
    results[attempt - 1] ? { ok: true, value: `ok on ${attempt}` } : { ok: false, error: `fail ${attempt}` };
}

describe("retry", () => {
  it("returns after the first successful attempt without sleeping", async () => {
    const { sleep: fakeSleep, delays } = recordingSleep();
    const outcome = await retry(sequence([true]), { retries: 3, sleep: fakeSleep });

    expect(outcome).toEqual({ ok: true, value: "ok on 1", attempts: 1 });
    expect(delays).toEqual([]);
  });

  it("waits according to the backoff policy between attempts", async () => {
    const { sleep: fakeSleep, delays } = recordingSleep();
    const outcome = await retry(sequence([false, false, true]), {
      retries: 3,
      backoff: exponentialBackoff({ baseMs: 100 }),
      sleep: fakeSleep,
    });

    expect(outcome).toEqual({ ok: true, value: "ok on 3", attempts: 3 });
    expect(delays).toEqual([100, 200]);
  });

  it("fails after retries + 1 attempts with the last error", async () => {
    const { sleep: fakeSleep, delays } = recordingSleep();
    const outcome = await retry(sequence([false, false, false, true]), { retries: 2, sleep: fakeSleep });

    expect(outcome).toEqual({ ok: false, error: "fail 3", attempts: 3, aborted: false });
    expect(delays).toHaveLength(2);
  });

  it("counts a thrown error as a failed attempt", async () => {
    const fn = vi.fn(async (): Promise<AttemptResult<string>> => {
      throw new Error("boom");
    });
    const outcome = await retry(fn, { retries: 1, sleep: recordingSleep().sleep });

    expect(fn).toHaveBeenCalledTimes(2);
    expect(outcome).toEqual({ ok: false, error: "boom", attempts: 2, aborted: false });
  });

  it("makes a single attempt when retries is 0", async () => {
    const { sleep: fakeSleep, delays } = recordingSleep();
    const backoff = vi.fn(() => 50);
    const outcome = await retry(sequence([false]), { retries: 0, backoff, sleep: fakeSleep });

    expect(outcome.attempts).toBe(1);
    expect(backoff).not.toHaveBeenCalled();
    expect(delays).toEqual([]);
  });

  it("stops before the next attempt once the signal is aborted", async () => {
    const controller = new AbortController();
    const fn = vi.fn(async (): Promise<AttemptResult<string>> => {
      controller.abort();
      return { ok: false, error: "nope" };
    });

    const outcome = await retry(fn, { retries: 5, signal: controller.signal, sleep: recordingSleep().sleep });

    expect(fn).toHaveBeenCalledTimes(1);
    expect(outcome).toEqual({ ok: false, error: "nope", attempts: 1, aborted: true });
  });

  it("cuts a backoff wait short on abort", async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);
    const started = Date.now();

    const outcome = await retry(sequence([false, true]), {
      retries: 1,
      backoff: () => 60_000,
      signal: controller.signal,
    });

    expect(outcome).toEqual({ ok: false, error: "fail 1", attempts: 1, aborted: true });
    expect(Date.now() - started).toBeLessThan(5_000);
  });

  it("reports each retry", async () => {
    const onRetry = vi.fn();
    await retry(sequence([false, true]), {
      retries: 1,
      backoff: () => 7,
      sleep: recordingSleep().sleep,
      onRetry,
    });

    expect(onRetry).toHaveBeenCalledWith(1, 7, "fail 1");
  });
});

describe("sleep", () => {
  it("resolves immediately for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    const started = Date.now();
    await sleep(60_000, controller.signal);
    expect(Date.now() - started).toBeLessThan(1_000);
  });
});
