import { getConfig } from "../config.js";
import type { InstallTask } from "../planner/types.js";
import { log } from "../utils/logger.js";
import type { ActionResult, PackageInstaller } from "./adapter.js";

/** Resolves true on success, false on failure. A rejection also counts as failure. */
export type InstallFunction = (task: InstallTask) => Promise<boolean>;

export type FunctionInstallerOptions = {
  name: string;
  install: InstallFunction;
  /** Defaults to an uninstall that always succeeds. */
  uninstall?: InstallFunction;
  /** Timeout in ms per call (default: config limits.commandTimeoutMs) */
  timeout?: number;
};

/** Installer backed by plain async functions, for embedding and tests. */
export class FunctionInstaller implements PackageInstaller {
  readonly name: string;
  readonly type = "function" as const;

  private installFn: InstallFunction;
  private uninstallFn: InstallFunction;
  private timeout: number;

  constructor(opts: FunctionInstallerOptions) {
    this.name = opts.name;
    this.installFn = opts.install;
    this.uninstallFn = opts.uninstall ?? (async () => true);
    this.timeout = opts.timeout ?? getConfig().limits.commandTimeoutMs;
  }

  install(task: InstallTask): Promise<ActionResult> {
    return this.call("install", this.installFn, task);
  }

  uninstall(task: InstallTask): Promise<ActionResult> {
    return this.call("uninstall", this.uninstallFn, task);
  }

  private async call(action: string, fn: InstallFunction, task: InstallTask): Promise<ActionResult> {
    const start = Date.now();
    let timer: NodeJS.Timeout | undefined;
    try {
      const ok = await Promise.race([
        fn(task),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new Error("Function timed out")), this.timeout);
        }),
      ]);
      return {
        status: ok ? "ok" : "error",
        output: ok ? `${action} ${task.id}: done` : `${action} ${task.id}: failed`,
        metadata: { durationMs: Date.now() - start },
      };
    } catch (err) {
      const isTimeout = err instanceof Error && err.message === "Function timed out";
      log.debug(`[${this.name}] ${action} "${task.id}" threw`, { error: String(err) });
      return {
        status: isTimeout ? "timeout" : "error",
        output: String(err),
        metadata: { durationMs: Date.now() - start },
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
