import { randomUUID } from "node:crypto";
import { getConfig } from "./config.js";
import { errorMessage, isFatal } from "./errors.js";
import { Executor } from "./executor/executor.js";
import type { ExecutionOptions, ExecutionResult } from "./executor/types.js";
import type { PackageInstaller } from "./installers/adapter.js";
import { BrewInstaller } from "./installers/brew-installer.js";
import { DryRunInstaller } from "./installers/dry-run-installer.js";
import type { RunStore } from "./persistence/store.js";
import type { RunRecord, RunRecordStatus } from "./persistence/types.js";
import { formatTask } from "./planner/task-list.js";
import type { InstallTask } from "./planner/types.js";
import { defaultChecks } from "./preflight/checks.js";
import type { PreflightReport } from "./preflight/runner.js";
import { runPreflight } from "./preflight/runner.js";
import type { Confirm, PreflightCheck } from "./preflight/types.js";
import { log } from "./utils/logger.js";

export const ExitCode = {
  Success: 0,
  Fatal: 1,
  TasksFailed: 2,
  Interrupted: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type InstallerOptions = {
  /** Used for real runs. Defaults to Homebrew. */
  installer?: PackageInstaller;
  /** Pre-flight checks; defaults to the standard sequence. Pass [] to skip. */
  checks?: PreflightCheck[];
  /** Answers warning prompts. Defaults to declining. */
  confirm?: Confirm;
  /** Where finished runs are recorded. */
  store?: RunStore;
};

export type RunOptions = Omit<ExecutionOptions, "abortSignal"> & {
  dryRun?: boolean;
  abortSignal?: AbortSignal;
};

export type InstallRun = {
  runId: string;
  status: RunRecordStatus;
  exitCode: ExitCode;
  dryRun: boolean;
  preflight: PreflightReport;
  result?: ExecutionResult;
  error?: string;
  startedAt: number;
  finishedAt: number;
};

export type InstallPlan = {
  dryRun: boolean;
  maxParallelJobs: number;
  maxRetries: number;
  backoff: string;
  tasks: Array<{ id: string; variant: string; label: string }>;
};

// ---------------------------------------------------------------------------
// Installer
// ---------------------------------------------------------------------------

/** Pre-flight checks, then the executor, then cleanup and history. */
export class Installer {
  private installer?: PackageInstaller;
  private checks?: PreflightCheck[];
  private confirm: Confirm;
  private store?: RunStore;

  constructor(opts?: InstallerOptions) {
    this.installer = opts?.installer;
    this.checks = opts?.checks;
    this.confirm = opts?.confirm ?? (async () => false);
    this.store = opts?.store;
  }

  async run(tasks: InstallTask[], opts?: RunOptions): Promise<InstallRun> {
    const cfg = getConfig();
    const dryRun = opts?.dryRun ?? cfg.dryRun;
    const runId = randomUUID();
    const startedAt = Date.now();

    log.success("Starting macOS setup", { runId, dryRun, tasks: tasks.length });

    let preflight: PreflightReport;
    try {
      preflight = await runPreflight(this.checks ?? defaultChecks(cfg), this.confirm);
    } catch (err) {
      if (!isFatal(err)) throw err;
      const run: InstallRun = {
        runId,
        status: "aborted",
        exitCode: ExitCode.Fatal,
        dryRun,
        preflight: [],
        error: err.message,
        startedAt,
        finishedAt: Date.now(),
      };
      this.save(run);
      return run;
    }

    const installer: PackageInstaller = dryRun ? new DryRunInstaller() : (this.installer ?? new BrewInstaller());
    const result = await new Executor(installer).execute(tasks, opts);

    if (installer.cleanup && !result.interrupted) {
      log.info("Cleaning up...");
      try {
        await installer.cleanup();
      } catch (err) {
        log.warn("Cleanup failed", { error: errorMessage(err) });
      }
    }

    const status: RunRecordStatus = result.interrupted ? "interrupted" : result.success ? "succeeded" : "failed";
    const run: InstallRun = {
      runId,
      status,
      exitCode:
        status === "succeeded" ? ExitCode.Success : status === "interrupted" ? ExitCode.Interrupted : ExitCode.TasksFailed,
      dryRun,
      preflight,
      result,
      startedAt,
      finishedAt: Date.now(),
    };

    if (status === "succeeded") {
      log.success("All applications installed successfully.", { runId, durationMs: result.durationMs });
    } else if (status === "interrupted") {
      log.error("Run interrupted by the user.", { runId, notDispatched: result.notDispatched });
    } else {
      log.error("Some applications failed to install.", { runId, failed: result.rollbackSet });
    }

    this.save(run);
    return run;
  }

  /** Preview: what a run would do with the current config, without checks or installs. */
  plan(tasks: InstallTask[], opts?: { dryRun?: boolean }): InstallPlan {
    const cfg = getConfig();
    return {
      dryRun: opts?.dryRun ?? cfg.dryRun,
      maxParallelJobs: cfg.limits.maxParallelJobs,
      maxRetries: cfg.retry.maxRetries,
      backoff: cfg.retry.backoff,
      tasks: tasks.map((t) => ({ id: t.id, variant: t.variant, label: formatTask(t) })),
    };
  }

  private save(run: InstallRun): void {
    if (!this.store) return;
    const record: RunRecord = {
      runId: run.runId,
      status: run.status,
      dryRun: run.dryRun,
      outcomes: run.result ? Object.values(run.result.outcomes) : [],
      rollbacks: run.result?.rollbacks ?? [],
      notDispatched: run.result?.notDispatched ?? [],
      error: run.error,
      startedAt: run.startedAt,
      finishedAt: run.finishedAt,
    };
    try {
      this.store.insert(record);
    } catch (err) {
      log.warn("Could not save run history", { error: errorMessage(err) });
    }
  }
}
