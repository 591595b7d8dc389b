import { getConfig } from "../config.js";
import type { InstallTask } from "../planner/types.js";
import type { CommandRunner } from "../system/exec.js";
import { runCommand } from "../system/exec.js";
import { log } from "../utils/logger.js";
import type { ActionResult, PackageInstaller } from "./adapter.js";

export type BrewInstallerOptions = {
  name?: string;
  /** Path or name of the brew executable (default: "brew"). */
  brewPath?: string;
  run?: CommandRunner;
  /** Timeout in ms for install, upgrade and uninstall commands. */
  timeout?: number;
};

/** Installs formulae and casks with Homebrew, upgrading packages that are already present. */
export class BrewInstaller implements PackageInstaller {
  readonly name: string;
  readonly type = "brew" as const;

  private brewPath: string;
  private run: CommandRunner;
  private timeout: number;

  constructor(opts: BrewInstallerOptions = {}) {
    this.name = opts.name ?? "homebrew";
    this.brewPath = opts.brewPath ?? "brew";
    this.run = opts.run ?? runCommand;
    this.timeout = opts.timeout ?? getConfig().limits.commandTimeoutMs;
  }

  async install(task: InstallTask): Promise<ActionResult> {
    if (await this.isInstalled(task)) {
      if (!(await this.isOutdated(task))) {
        return { status: "skipped", output: `${task.id} is already installed and up to date` };
      }
      return this.brew(["upgrade", variantFlag(task), task.id]);
    }
    return this.brew(["install", variantFlag(task), task.id]);
  }

  async uninstall(task: InstallTask): Promise<ActionResult> {
    if (!(await this.isInstalled(task))) {
      return { status: "skipped", output: `${task.id} is not installed` };
    }
    return this.brew(["uninstall", "--force", variantFlag(task), task.id]);
  }

  async isInstalled(task: InstallTask): Promise<boolean> {
    const result = await this.run(this.brewPath, ["list", variantFlag(task), "--versions", task.id]);
    return result.code === 0 && result.stdout.trim() !== "";
  }

  async isOutdated(task: InstallTask): Promise<boolean> {
    const result = await this.run(this.brewPath, ["outdated", variantFlag(task), "--quiet", task.id]);
    // brew exits 1 when a named package is outdated, so only stdout decides
    return result.code !== null && !result.timedOut && result.stdout.split(/\s+/).includes(task.id);
  }

  async cleanup(): Promise<void> {
    const result = await this.run(this.brewPath, ["cleanup"], { timeoutMs: this.timeout });
    if (result.code !== 0) {
      log.warn("brew cleanup failed", { code: result.code, stderr: result.stderr.trim() });
    }
  }

  private async brew(args: string[]): Promise<ActionResult> {
    const start = Date.now();
    log.debug(`[${this.name}] ${this.brewPath} ${args.join(" ")}`);
    const result = await this.run(this.brewPath, args, { timeoutMs: this.timeout });
    const metadata = { durationMs: Date.now() - start, exitCode: result.code };

    if (result.timedOut) {
      return { status: "timeout", output: `brew ${args.join(" ")} timed out after ${this.timeout}ms`, metadata };
    }
    if (result.code === 0) {
      return { status: "ok", output: result.stdout.trim(), metadata };
    }
    return {
      status: "error",
      output: result.stderr.trim() || `brew ${args.join(" ")} exited with code ${result.code ?? "null"}`,
      metadata,
    };
  }
}

function variantFlag(task: InstallTask): "--cask" | "--formula" {
  return task.variant === "cask" ? "--cask" : "--formula";
}
