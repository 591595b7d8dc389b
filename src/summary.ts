import type { ExecutionResult } from "./executor/types.js";

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${Math.round(seconds - minutes * 60)}s`;
}

/** Human-readable end-of-run report: failures, successes, rollbacks, per-task timings. */
export function formatSummary(result: ExecutionResult): string[] {
  const lines: string[] = [];
  const outcomes = Object.values(result.outcomes);
  const ok = outcomes.filter((o) => o.status === "succeeded");
  const failed = outcomes.filter((o) => o.status === "failed");

  if (result.interrupted && failed.length === 0) {
    lines.push("Installation interrupted before all applications were processed.");
  } else if (failed.length === 0 && result.notDispatched.length === 0) {
    lines.push("All applications installed successfully.");
  } else if (failed.length > 0) {
    lines.push("Failed to install the following applications:");
    for (const o of failed) {
      lines.push(`  - ${o.id} (${o.attempts} attempt${o.attempts === 1 ? "" : "s"})${o.error ? `: ${o.error}` : ""}`);
    }
  }

  if (ok.length > 0) {
    lines.push(`Installed: ${ok.map((o) => o.id).join(", ")}`);
  }
  if (result.notDispatched.length > 0) {
    lines.push(`Not started (interrupted): ${result.notDispatched.join(", ")}`);
  }
  if (result.rollbacks.length > 0) {
    lines.push("Rollback:");
    for (const r of result.rollbacks) {
      lines.push(`  - ${r.id}: ${r.status}${r.error ? ` (${r.error})` : ""}`);
    }
  }
  if (result.timings.length > 0) {
    lines.push("Timings:");
    for (const t of result.timings) {
      lines.push(`  ${t.id}: ${formatDuration(t.durationMs)}`);
    }
  }
  lines.push(`Completed in ${formatDuration(result.durationMs)}`);
  return lines;
}
