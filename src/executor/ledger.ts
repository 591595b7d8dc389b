import type { TaskOutcome, TaskTiming } from "./types.js";

/**
 * Per-run record of task outcomes. Only the executor writes to it, one
 * outcome per task; the rollback set is exactly the failed outcomes.
 */
export class RunLedger {
  private outcomes = new Map<string, TaskOutcome>();
  private rollback = new Set<string>();
  private timingList: TaskTiming[] = [];

  record(outcome: TaskOutcome): void {
    if (this.outcomes.has(outcome.id)) {
      throw new Error(`Task "${outcome.id}" already has a recorded outcome`);
    }
    const frozen = Object.freeze({ ...outcome });
    this.outcomes.set(frozen.id, frozen);
    this.timingList.push({ id: frozen.id, durationMs: frozen.durationMs });
    if (frozen.status === "failed") this.rollback.add(frozen.id);
  }

  get(id: string): TaskOutcome | undefined {
    return this.outcomes.get(id);
  }

  has(id: string): boolean {
    return this.outcomes.has(id);
  }

  get size(): number {
    return this.outcomes.size;
  }

  succeeded(): string[] {
    return [...this.outcomes.values()].filter((o) => o.status === "succeeded").map((o) => o.id);
  }

  failed(): string[] {
    return [...this.outcomes.values()].filter((o) => o.status === "failed").map((o) => o.id);
  }

  rollbackSet(): string[] {
    return [...this.rollback];
  }

  timings(): TaskTiming[] {
    return this.timingList.map((t) => ({ ...t }));
  }

  toRecord(): Record<string, TaskOutcome> {
    return Object.fromEntries(this.outcomes);
  }
}
