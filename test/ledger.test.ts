import { describe, expect, it } from "vitest";
import { RunLedger } from "../src/executor/ledger.js";

describe("RunLedger", () => {
  it("records outcomes and derives the rollback set from failures", () => {
    const ledger = new RunLedger();
    ledger.record({ id: "a", variant: "formula", status: "succeeded", durationMs: 10, attempts: 1 });
    ledger.record({ id: "b", variant: "cask", status: "failed", durationMs: 30, attempts: 3, error: "boom" });

    expect(ledger.size).toBe(2);
    expect(ledger.succeeded()).toEqual(["a"]);
    expect(ledger.failed()).toEqual(["b"]);
    expect(ledger.rollbackSet()).toEqual(["b"]);
    expect(ledger.timings()).toEqual([
      { id: "a", durationMs: 10 },
      { id: "b", durationMs: 30 },
    ]);
  });

  it("refuses a second outcome for the same task", () => {
    const ledger = new RunLedger();
    ledger.record({ id: "a", variant: "formula", status: "failed", durationMs: 1, attempts: 1 });
    expect(() =>
      ledger.record({ id: "a", variant: "formula", status: "succeeded", durationMs: 1, attempts: 2 }),
    ).toThrow('Task "a" already has a recorded outcome');
    expect(ledger.get("a")?.status).toBe("failed");
  });

  it("freezes recorded outcomes", () => {
    const ledger = new RunLedger();
    ledger.record({ id: "a", variant: "formula", status: "succeeded", durationMs: 1, attempts: 1 });
    expect(Object.isFrozen(ledger.get("a"))).toBe(true);
    expect(ledger.has("a")).toBe(true);
    expect(ledger.has("b")).toBe(false);
  });
});
