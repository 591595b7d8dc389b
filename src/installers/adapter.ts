import type { InstallTask } from "../planner/types.js";

/** `skipped` means there was nothing to do (already current, or nothing to remove). */
export type ActionStatus = "ok" | "skipped" | "error" | "timeout";

export type ActionResult = {
  status: ActionStatus;
  output: string;
  metadata?: Record<string, unknown>;
};

export interface PackageInstaller {
  name: string;
  type: "brew" | "dry-run" | "function" | string;

  install(task: InstallTask): Promise<ActionResult>;
  /** Compensating action for a task that ended failed. Called at most once per task. */
  uninstall(task: InstallTask): Promise<ActionResult>;
  /** Housekeeping after a run, e.g. clearing download caches. */
  cleanup?(): Promise<void>;
}

export function succeeded(result: ActionResult): boolean {
  return result.status === "ok" || result.status === "skipped";
}
