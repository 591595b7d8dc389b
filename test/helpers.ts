import { vi } from "vitest";
import { FunctionInstaller } from "../src/installers/function-installer.js";
import type { InstallTask } from "../src/planner/types.js";
import type { Sleep } from "../src/utils/retry.js";

export function formulae(...ids: string[]): InstallTask[] {
  return ids.map((id) => ({ id, variant: "formula" }));
}

/** Silence console output from the logger for the current test. */
export function quietConsole(): void {
  for (const method of ["debug", "info", "warn", "error", "log"] as const) {
    vi.spyOn(console, method).mockImplementation(() => {});
  }
}

/** Sleep stub that records requested delays and returns immediately. */
export function recordingSleep(): { sleep: Sleep; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    },
  };
}

export type ScriptedInstaller = {
  installer: FunctionInstaller;
  attempts: Record<string, number>;
  uninstalled: string[];
  maxRunning: () => number;
};

/**
 * Installer whose install results follow `script[id]`, one entry per attempt.
 * Missing or exhausted entries succeed. Each install takes `delayMs`.
 */
export function scriptedInstaller(script: Record<string, boolean[]>, delayMs = 5): ScriptedInstaller {
  const attempts: Record<string, number> = {};
  const uninstalled: string[] = [];
  let running = 0;
  let peak = 0;

  const installer = new FunctionInstaller({
    name: "scripted",
    install: async (task) => {
      running++;
      peak = Math.max(peak, running);
      attempts[task.id] = (attempts[task.id] ?? 0) + 1;
      await new Promise((r) => setTimeout(r, delayMs));
      running--;
      return script[task.id]?.[attempts[task.id] - 1] ?? true;
    },
    uninstall: async (task) => {
      uninstalled.push(task.id);
      return true;
    },
  });

  return { installer, attempts, uninstalled, maxRunning: () => peak };
}
