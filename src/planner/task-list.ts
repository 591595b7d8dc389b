import { existsSync, readFileSync } from "node:fs";
import { ConfigError, ValidationError } from "../errors.js";
import { PackageNameSchema, VariantSchema, parseOrThrow } from "../schemas.js";
import type { InstallTask } from "./types.js";

/** Parse one `name[:variant]` entry, e.g. `iterm2:true` or `git`. */
export function parseTaskEntry(entry: string): InstallTask {
  const trimmed = entry.trim();
  const sep = trimmed.lastIndexOf(":");
  const name = sep === -1 ? trimmed : trimmed.slice(0, sep).trim();
  const variant = sep === -1 ? undefined : trimmed.slice(sep + 1);
  return {
    id: parseOrThrow(PackageNameSchema, name, `package name "${name}"`),
    variant: parseOrThrow(VariantSchema, variant, `variant in "${trimmed}"`),
  };
}

/**
 * Parse a task list, one entry per line. Blank lines and lines starting with
 * `#` are ignored. A package listed twice is rejected.
 */
export function parseTaskList(text: string): InstallTask[] {
  const tasks: InstallTask[] = [];
  const seen = new Set<string>();

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    if (!line || line.startsWith("#")) return;
    let task: InstallTask;
    try {
      task = parseTaskEntry(line);
    } catch (err) {
      if (err instanceof ValidationError) {
        throw new ValidationError(`Line ${index + 1}: ${err.message}`, err.issues);
      }
      throw err;
    }
    if (seen.has(task.id)) {
      throw new ValidationError(`Line ${index + 1}: package "${task.id}" is listed more than once`);
    }
    seen.add(task.id);
    tasks.push(task);
  });

  return tasks;
}

export function loadTaskList(path: string): InstallTask[] {
  if (!existsSync(path)) {
    throw new ConfigError(`Task list not found: ${path}`, path);
  }
  return parseTaskList(readFileSync(path, "utf-8"));
}

/** Display label used in summaries and plans. */
export function formatTask(task: InstallTask): string {
  return task.variant === "cask" ? `${task.id} (cask)` : task.id;
}
