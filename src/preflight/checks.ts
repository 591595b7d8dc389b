import { statfs } from "node:fs/promises";
import { cpus, freemem, loadavg } from "node:os";
import type { InstallerConfig } from "../config.js";
import type { CommandRunner } from "../system/exec.js";
import { commandExists, runCommand } from "../system/exec.js";
import type { CheckResult, PreflightCheck } from "./types.js";

const GiB = 1024 ** 3;

// --- internet ---

export type Probe = (url: string, timeoutMs: number) => Promise<boolean>;

export const headProbe: Probe = async (url, timeoutMs) => {
  const c = new AbortController();
  const t = setTimeout(() => c.abort(), timeoutMs);
  try {
    const r = await fetch(url, { method: "HEAD", signal: c.signal });
    return r.status < 500;
  } catch {
    return false;
  } finally {
    clearTimeout(t);
  }
};

export function internetCheck(opts: { endpoints: string[]; timeoutMs: number; probe?: Probe }): PreflightCheck {
  const probe = opts.probe ?? headProbe;
  return {
    name: "internet",
    async run(): Promise<CheckResult> {
      for (const endpoint of opts.endpoints) {
        if (await probe(endpoint, opts.timeoutMs)) {
          return { status: "pass", message: `Internet connection detected through ${endpoint}.` };
        }
      }
      return {
        status: "fail",
        message: "No internet connection detected. Please check your connection and try again.",
      };
    },
  };
}

// --- macOS version ---

/** Numeric comparison of dotted versions: "13.10" > "13.9". */
export function compareVersions(a: string, b: string): number {
  const pa = a.split(".").map((n) => Number.parseInt(n, 10) || 0);
  const pb = b.split(".").map((n) => Number.parseInt(n, 10) || 0);
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const diff = (pa[i] ?? 0) - (pb[i] ?? 0);
    if (diff !== 0) return Math.sign(diff);
  }
  return 0;
}

export async function readMacosVersion(run: CommandRunner = runCommand): Promise<string | null> {
  if (process.platform !== "darwin") return null;
  const result = await run("sw_vers", ["-productVersion"]);
  return result.code === 0 ? result.stdout.trim() : null;
}

export function macosVersionCheck(opts: {
  requiredVersion: string;
  readVersion?: () => Promise<string | null>;
}): PreflightCheck {
  const readVersion = opts.readVersion ?? (() => readMacosVersion());
  return {
    name: "macos-version",
    async run(): Promise<CheckResult> {
      const current = await readVersion();
      if (!current) {
        return { status: "fail", message: "Unable to determine the macOS version. This tool runs on macOS only." };
      }
      if (compareVersions(current, opts.requiredVersion) < 0) {
        return {
          status: "warn",
          message: `This tool requires macOS ${opts.requiredVersion} or later. Current version: ${current}.`,
        };
      }
      return { status: "pass", message: `macOS version validated: ${current}.` };
    },
  };
}

// --- system load ---

export type LoadSample = { cpuPercent: number; freeMemMb: number };

export async function sampleLoad(): Promise<LoadSample> {
  return {
    cpuPercent: (loadavg()[0] / Math.max(1, cpus().length)) * 100,
    freeMemMb: freemem() / 1024 / 1024,
  };
}

export function systemLoadCheck(opts: {
  maxCpuPercent: number;
  minFreeMemMb: number;
  sample?: () => Promise<LoadSample>;
}): PreflightCheck {
  const sample = opts.sample ?? sampleLoad;
  return {
    name: "system-load",
    async run(): Promise<CheckResult> {
      const { cpuPercent, freeMemMb } = await sample();
      const problems: string[] = [];
      if (cpuPercent > opts.maxCpuPercent) problems.push(`High CPU usage detected: ${Math.round(cpuPercent)}%.`);
      if (freeMemMb < opts.minFreeMemMb) problems.push(`Low free RAM detected: ${Math.round(freeMemMb)} MB.`);
      if (problems.length > 0) return { status: "warn", message: problems.join(" ") };
      return { status: "pass", message: "System performance is sufficient." };
    },
  };
}

// --- disk space ---

export async function freeBytes(path: string): Promise<number> {
  const stats = await statfs(path);
  return stats.bavail * stats.bsize;
}

export function diskSpaceCheck(opts: {
  requiredBytes: number;
  path?: string;
  free?: (path: string) => Promise<number>;
}): PreflightCheck {
  const path = opts.path ?? "/";
  const free = opts.free ?? freeBytes;
  return {
    name: "disk-space",
    async run(): Promise<CheckResult> {
      const available = await free(path);
      if (available < opts.requiredBytes) {
        return {
          status: "fail",
          message: `Insufficient disk space on ${path}. At least ${Math.round(opts.requiredBytes / GiB)} GB is required, ${Math.floor(available / GiB)} GB available.`,
        };
      }
      return { status: "pass", message: `Available disk space: ${Math.floor(available / GiB)} GB` };
    },
  };
}

// --- required commands ---

export function dependenciesCheck(opts: {
  commands: string[];
  exists?: (command: string) => Promise<boolean>;
}): PreflightCheck {
  const exists = opts.exists ?? ((command: string) => commandExists(command));
  return {
    name: "dependencies",
    async run(): Promise<CheckResult> {
      const missing: string[] = [];
      for (const command of opts.commands) {
        if (!(await exists(command))) missing.push(command);
      }
      if (missing.length > 0) {
        return { status: "fail", message: `Missing required commands: ${missing.join(", ")}. Install them and try again.` };
      }
      return { status: "pass", message: `Required commands found: ${opts.commands.join(", ")}.` };
    },
  };
}

/** The standard check sequence, in the order the installer runs it. */
export function defaultChecks(config: Readonly<InstallerConfig>): PreflightCheck[] {
  return [
    internetCheck({ endpoints: config.checks.endpoints, timeoutMs: config.checks.probeTimeoutMs }),
    macosVersionCheck({ requiredVersion: config.requiredVersion }),
    systemLoadCheck({ maxCpuPercent: config.checks.maxCpuPercent, minFreeMemMb: config.checks.minFreeMemMb }),
    diskSpaceCheck({ requiredBytes: config.checks.requiredFreeBytes }),
    dependenciesCheck({ commands: config.checks.requiredCommands }),
  ];
}
