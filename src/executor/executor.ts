import { getConfig } from "../config.js";
import { ValidationError, errorMessage } from "../errors.js";
import type { ActionResult, PackageInstaller } from "../installers/adapter.js";
import { succeeded } from "../installers/adapter.js";
import type { InstallTask } from "../planner/types.js";
import { createBackoff } from "../utils/backoff.js";
import { log } from "../utils/logger.js";
import { retry } from "../utils/retry.js";
import { Semaphore } from "../utils/semaphore.js";
import { RunLedger } from "./ledger.js";
import type { ExecutionOptions, ExecutionResult, RollbackRecord, TaskOutcome } from "./types.js";

export class Executor {
  private installer: PackageInstaller;

  constructor(installer: PackageInstaller) {
    this.installer = installer;
  }

  /**
   * Install every task once, at most `maxConcurrency` at a time, retrying each
   * up to `retries` extra times. Failed tasks are rolled back after the rest
   * have finished.
   */
  async execute(tasks: InstallTask[], opts?: ExecutionOptions): Promise<ExecutionResult> {
    assertUniqueIds(tasks);

    const start = Date.now();
    const cfg = getConfig();
    const maxConcurrency = opts?.maxConcurrency ?? cfg.limits.maxParallelJobs;
    const retries = opts?.retries ?? cfg.retry.maxRetries;
    if (!Number.isInteger(retries) || retries < 0) {
      throw new ValidationError(`retries must be an integer >= 0 (got ${retries})`);
    }

    const signal = opts?.abortSignal;
    const slots = new Semaphore(maxConcurrency);
    const ledger = new RunLedger();
    const inFlight = new Set<Promise<void>>();
    const notDispatched: string[] = [];

    for (let i = 0; i < tasks.length; i++) {
      const task = tasks[i];
      const acquired = await slots.acquire(signal);
      if (!acquired || signal?.aborted) {
        if (acquired) slots.release();
        notDispatched.push(...tasks.slice(i).map((t) => t.id));
        log.warn("Interrupted: no further tasks will be started", { notDispatched: notDispatched.length });
        break;
      }

      const position = i + 1;
      log.success(
        `Installing [${position}/${tasks.length}] (${Math.floor((position * 100) / tasks.length)}%): ${task.id}`,
        { task: task.id, variant: task.variant },
      );
      notify("onTaskStart", task.id, () => opts?.onTaskStart?.(task, position, tasks.length));

      const run: Promise<void> = this.runTask(task, retries, opts)
        .then((outcome) => {
          ledger.record(outcome);
          notify("onTaskEnd", task.id, () => opts?.onTaskEnd?.(outcome));
        })
        .catch((err: unknown) => {
          log.error(`Task ${task.id} could not be recorded`, { task: task.id, error: errorMessage(err) });
        })
        .finally(() => {
          slots.release();
          inFlight.delete(run);
        });
      inFlight.add(run);
    }

    await Promise.allSettled(inFlight);

    const rollbacks = await this.rollback(ledger.rollbackSet(), tasks, opts);
    const interrupted = signal?.aborted ?? false;

    return {
      outcomes: ledger.toRecord(),
      rollbackSet: ledger.rollbackSet(),
      timings: ledger.timings(),
      rollbacks,
      notDispatched,
      interrupted,
      success: !interrupted && notDispatched.length === 0 && ledger.failed().length === 0,
      durationMs: Date.now() - start,
      peakConcurrency: slots.getStats().peak,
    };
  }

  private async runTask(task: InstallTask, retries: number, opts?: ExecutionOptions): Promise<TaskOutcome> {
    const start = Date.now();
    const cfg = getConfig().retry;
    const backoff =
      opts?.backoff ??
      createBackoff({ kind: cfg.backoff, baseMs: cfg.delayMs, jitterMs: cfg.jitterMs, maxMs: cfg.maxDelayMs });

    const outcome = await retry<ActionResult>(
      async (attempt) => {
        log.info(`Attempt ${attempt}: install ${task.id}`, { task: task.id, attempt });
        notify("onAttempt", task.id, () => opts?.onAttempt?.(task, attempt));
        const result = await this.installer.install(task);
        return succeeded(result) ? { ok: true, value: result } : { ok: false, error: result.output };
      },
      {
        retries,
        backoff,
        signal: opts?.abortSignal,
        sleep: opts?.sleep,
        onRetry: (attempt, delayMs, error) => {
          log.warn(`Attempt ${attempt} failed for ${task.id}, retrying in ${delayMs}ms`, {
            task: task.id,
            attempt,
            error,
          });
        },
      },
    );

    const durationMs = Date.now() - start;
    if (outcome.ok) {
      log.success(`Installed ${task.id}`, { task: task.id, attempts: outcome.attempts, durationMs });
      return { id: task.id, variant: task.variant, status: "succeeded", durationMs, attempts: outcome.attempts };
    }

    log.error(`Failed to install ${task.id}${outcome.aborted ? " (interrupted)" : ""}`, {
      task: task.id,
      attempts: outcome.attempts,
      durationMs,
      error: outcome.error,
    });
    return {
      id: task.id,
      variant: task.variant,
      status: "failed",
      durationMs,
      attempts: outcome.attempts,
      error: outcome.error,
    };
  }

  /** Uninstall each failed task once. Errors are logged and recorded, never thrown. */
  private async rollback(ids: string[], tasks: InstallTask[], opts?: ExecutionOptions): Promise<RollbackRecord[]> {
    if (ids.length === 0) return [];
    log.warn(`Rolling back ${ids.length} failed installation(s)`, { tasks: ids });

    const byId = new Map(tasks.map((t) => [t.id, t]));
    const records: RollbackRecord[] = [];

    for (const id of ids) {
      const task = byId.get(id);
      if (!task) continue;

      let record: RollbackRecord;
      try {
        const result = await this.installer.uninstall(task);
        if (result.status === "ok") {
          record = { id, status: "rolled-back" };
          log.warn(`Rolled back: ${id}`, { task: id });
        } else if (result.status === "skipped") {
          record = { id, status: "not-installed" };
          log.warn(`${id} was not fully installed or already removed, skipping rollback`, { task: id });
        } else {
          record = { id, status: "failed", error: result.output };
          log.warn(`Rollback failed for ${id}`, { task: id, error: result.output });
        }
      } catch (err) {
        record = { id, status: "failed", error: errorMessage(err) };
        log.warn(`Rollback failed for ${id}`, { task: id, error: record.error });
      }

      records.push(record);
      const done = record;
      notify("onRollback", id, () => opts?.onRollback?.(done));
    }

    return records;
  }
}

/** Progress callbacks are observers; a throwing one is logged and the run goes on. */
function notify(callback: string, taskId: string, fn: () => void): void {
  try {
    fn();
  } catch (err) {
    log.warn(`${callback} callback threw for ${taskId}`, { task: taskId, error: errorMessage(err) });
  }
}

function assertUniqueIds(tasks: InstallTask[]): void {
  const seen = new Set<string>();
  for (const task of tasks) {
    if (seen.has(task.id)) {
      throw new ValidationError(`Task "${task.id}" appears more than once`);
    }
    seen.add(task.id);
  }
}
