import type { InstallTask } from "../planner/types.js";
import { log } from "../utils/logger.js";
import type { ActionResult, PackageInstaller } from "./adapter.js";

/** Logs what would be installed. Every install reports success; nothing on the system changes. */
export class DryRunInstaller implements PackageInstaller {
  readonly name = "dry-run";
  readonly type = "dry-run" as const;

  async install(task: InstallTask): Promise<ActionResult> {
    log.warn(`Dry run: would install ${task.id} (cask: ${task.variant === "cask"})`, {
      task: task.id,
      variant: task.variant,
    });
    return { status: "ok", output: `dry run: ${task.id}`, metadata: { dryRun: true } };
  }

  async uninstall(task: InstallTask): Promise<ActionResult> {
    log.warn(`Dry run: would uninstall ${task.id}`, { task: task.id });
    return { status: "skipped", output: `dry run: ${task.id}`, metadata: { dryRun: true } };
  }
}
