import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { configure, resetConfig } from "../src/config.js";
import type { PackageInstaller } from "../src/installers/adapter.js";
import { ExitCode, Installer } from "../src/installer.js";
import { RunStore } from "../src/persistence/store.js";
import type { PreflightCheck } from "../src/preflight/types.js";
import { formulae, quietConsole, recordingSleep, scriptedInstaller } from "./helpers.js";

const passing: PreflightCheck = { name: "ok", run: async () => ({ status: "pass", message: "fine" }) };
const failing: PreflightCheck = { name: "disk-space", run: async () => ({ status: "fail", message: "No space." }) };

describe("Installer", () => {
  let store: RunStore;

  beforeEach(() => {
    quietConsole();
    store = new RunStore(":memory:");
  });

  afterEach(() => {
    store.close();
    vi.restoreAllMocks();
    resetConfig();
  });

  it("aborts with exit code 1 when a pre-flight check fails", async () => {
    const scripted = scriptedInstaller({});
    const installer = new Installer({ installer: scripted.installer, checks: [failing], store });

    const run = await installer.run(formulae("git"));

    expect(run).toMatchObject({ status: "aborted", exitCode: ExitCode.Fatal, error: "No space." });
    expect(run.result).toBeUndefined();
    expect(scripted.attempts).toEqual({});
    expect(store.get(run.runId)?.status).toBe("aborted");
  });

  it("exits 0 when every package installs", async () => {
    const scripted = scriptedInstaller({});
    const installer = new Installer({ installer: scripted.installer, checks: [passing], store });

    const run = await installer.run(formulae("git", "wget"), { retries: 0 });

    expect(run.status).toBe("succeeded");
    expect(run.exitCode).toBe(0);
    expect(run.preflight).toEqual([{ name: "ok", status: "pass", message: "fine" }]);
    expect(store.get(run.runId)?.outcomes.map((o) => o.id).sort()).toEqual(["git", "wget"]);
  });

  it("exits 2 and records rollbacks when a package fails", async () => {
    const scripted = scriptedInstaller({ wget: [false, false] });
    const installer = new Installer({ installer: scripted.installer, checks: [], store });

    const run = await installer.run(formulae("git", "wget"), { retries: 1, sleep: recordingSleep().sleep });

    expect(run.status).toBe("failed");
    expect(run.exitCode).toBe(ExitCode.TasksFailed);
    expect(run.result?.rollbackSet).toEqual(["wget"]);
    expect(store.get(run.runId)?.rollbacks).toEqual([{ id: "wget", status: "rolled-back" }]);
  });

  it("exits 130 when interrupted", async () => {
    const scripted = scriptedInstaller({});
    const controller = new AbortController();
    controller.abort();
    const installer = new Installer({ installer: scripted.installer, checks: [] });

    const run = await installer.run(formulae("git", "wget"), { abortSignal: controller.signal });

    expect(run.status).toBe("interrupted");
    expect(run.exitCode).toBe(ExitCode.Interrupted);
    expect(run.result?.notDispatched).toEqual(["git", "wget"]);
  });

  it("never touches the real installer on a dry run", async () => {
    const install = vi.fn<PackageInstaller["install"]>();
    const spy: PackageInstaller = {
      name: "spy",
      type: "function",
      install,
      uninstall: vi.fn<PackageInstaller["uninstall"]>(),
    };
    const installer = new Installer({ installer: spy, checks: [] });

    const run = await installer.run(formulae("git"), { dryRun: true });

    expect(run).toMatchObject({ status: "succeeded", dryRun: true, exitCode: 0 });
    expect(install).not.toHaveBeenCalled();
  });

  it("runs cleanup after a finished run and logs a failing cleanup", async () => {
    const cleanup = vi.fn(async () => {
      throw new Error("cache locked");
    });
    const spy: PackageInstaller = {
      name: "spy",
      type: "function",
      install: async () => ({ status: "ok", output: "" }),
      uninstall: async () => ({ status: "ok", output: "" }),
      cleanup,
    };

    const run = await new Installer({ installer: spy, checks: [] }).run(formulae("git"));

    expect(cleanup).toHaveBeenCalledTimes(1);
    expect(run.exitCode).toBe(0);
    expect(console.warn).toHaveBeenCalled();
  });

  it("plans from the current config", () => {
    configure({ limits: { maxParallelJobs: 2 }, retry: { maxRetries: 5 } });

    const plan = new Installer().plan([
      { id: "iterm2", variant: "cask" },
      { id: "git", variant: "formula" },
    ]);

    expect(plan).toEqual({
      dryRun: false,
      maxParallelJobs: 2,
      maxRetries: 5,
      backoff: "linear",
      tasks: [
        { id: "iterm2", variant: "cask", label: "iterm2 (cask)" },
        { id: "git", variant: "formula", label: "git" },
      ],
    });
  });
});
