#!/usr/bin/env node

import { createInterface } from "node:readline/promises";
import { Command, InvalidArgumentError, Option } from "commander";
import type { DeepPartial, InstallerConfig } from "./config.js";
import { DEFAULT_CONFIG_FILE, getConfig, loadConfig } from "./config.js";
import { errorMessage, isFatal } from "./errors.js";
import { ExitCode, Installer } from "./installer.js";
import { RunStore } from "./persistence/store.js";
import { loadTaskList } from "./planner/task-list.js";
import { defaultChecks } from "./preflight/checks.js";
import { runPreflight } from "./preflight/runner.js";
import type { Confirm } from "./preflight/types.js";
import { formatDuration, formatSummary } from "./summary.js";
import type { BackoffKind } from "./utils/backoff.js";
import { closeLogFile, log, openLogFile, setLogLevel, setVerbose } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason instanceof Error ? reason.message : reason);
});

const program = new Command();

program
  .name("mac-app-installer")
  .description("Install or upgrade a list of macOS applications with Homebrew")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
});

function parseIntArg(min: number) {
  return (value: string): number => {
    const n = Number(value);
    if (!Number.isInteger(n) || n < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
    }
    return n;
  };
}

function promptConfirm(assumeYes: boolean): Confirm {
  if (assumeYes) return async () => true;
  return async (question) => {
    if (!process.stdin.isTTY) return false;
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
      const answer = await rl.question(`${question} (yes/no): `);
      return ["y", "yes"].includes(answer.trim().toLowerCase());
    } finally {
      rl.close();
    }
  };
}

type ConfigFlags = {
  config: string;
  dryRun?: boolean;
  jobs?: number;
  retries?: number;
  backoff?: BackoffKind;
  logFile?: string;
  quiet?: boolean;
};

function loadFromFlags(opts: ConfigFlags): Readonly<InstallerConfig> {
  const overrides: DeepPartial<InstallerConfig> = {
    dryRun: opts.dryRun,
    verbose: opts.quiet ? false : undefined,
    retry: { maxRetries: opts.retries, backoff: opts.backoff },
    limits: { maxParallelJobs: opts.jobs },
    paths: { logFile: opts.logFile },
  };
  return loadConfig({ configPath: opts.config, overrides });
}

function reportFatal(err: unknown): void {
  console.error(isFatal(err) ? `${err.name}: ${err.message}` : `Error: ${errorMessage(err)}`);
  process.exitCode = ExitCode.Fatal;
}

// --- run ---
program
  .command("run", { isDefault: true })
  .description("Run pre-flight checks, then install every package in the task list")
  .option("-c, --config <path>", "Configuration file", DEFAULT_CONFIG_FILE)
  .option("-a, --apps <path>", "Task list file (default: APPS_FILE or apps.txt beside the config)")
  .option("--dry-run", "Log what would be installed without installing anything")
  .option("-j, --jobs <n>", "Max parallel installs", parseIntArg(1))
  .option("-r, --retries <n>", "Retries per package after the first attempt", parseIntArg(0))
  .addOption(new Option("--backoff <kind>", "Delay policy between retries").choices(["linear", "exponential", "constant"]))
  .option("--log-file <path>", "JSON lines log file (truncated at start)")
  .option("-q, --quiet", "Only print warnings, errors and the summary")
  .option("-y, --yes", "Answer yes to pre-flight warnings")
  .option("--skip-checks", "Skip pre-flight checks")
  .option("--no-history", "Do not record this run in the history database")
  .action(async (opts: ConfigFlags & { apps?: string; yes?: boolean; skipChecks?: boolean; history: boolean }) => {
    let store: RunStore | undefined;
    const controller = new AbortController();
    const onSignal = (signal: NodeJS.Signals) => {
      if (controller.signal.aborted) {
        console.error("Forced exit.");
        process.exit(ExitCode.Interrupted);
      }
      log.error(`Received ${signal}. Finishing running installs, then rolling back failures...`);
      controller.abort();
    };

    try {
      const cfg = loadFromFlags(opts);
      setVerbose(cfg.verbose);
      openLogFile(cfg.paths.logFile);
      const tasks = loadTaskList(opts.apps ?? cfg.paths.appsFile);

      if (opts.history) store = new RunStore();
      const installer = new Installer({
        checks: opts.skipChecks ? [] : undefined,
        confirm: promptConfirm(opts.yes === true),
        store,
      });

      process.on("SIGINT", onSignal);
      process.on("SIGTERM", onSignal);
      const run = await installer.run(tasks, { abortSignal: controller.signal });

      if (run.result) {
        console.log("\n--- Summary ---");
        for (const line of formatSummary(run.result)) console.log(line);
      } else if (run.error) {
        console.error(`Aborted: ${run.error}`);
      }
      process.exitCode = run.exitCode;
    } catch (err) {
      reportFatal(err);
    } finally {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      store?.close();
      closeLogFile();
    }
  });

// --- check ---
program
  .command("check")
  .description("Run the pre-flight checks only")
  .option("-c, --config <path>", "Configuration file", DEFAULT_CONFIG_FILE)
  .option("-y, --yes", "Answer yes to pre-flight warnings")
  .action(async (opts: { config: string; yes?: boolean }) => {
    try {
      const cfg = loadConfig({ configPath: opts.config });
      const report = await runPreflight(defaultChecks(cfg), promptConfirm(opts.yes === true));
      for (const r of report) {
        const icon = r.status === "pass" ? "+" : "!";
        console.log(`[${icon}] ${r.name}: ${r.message}`);
      }
    } catch (err) {
      reportFatal(err);
    }
  });

// --- plan ---
program
  .command("plan")
  .description("Show the parsed task list and effective settings (no checks, no installs)")
  .option("-c, --config <path>", "Configuration file", DEFAULT_CONFIG_FILE)
  .option("-a, --apps <path>", "Task list file")
  .option("--dry-run", "Mark the plan as a dry run")
  .action(async (opts: { config: string; apps?: string; dryRun?: boolean }) => {
    try {
      const cfg = loadConfig({ configPath: opts.config, overrides: { dryRun: opts.dryRun } });
      const tasks = loadTaskList(opts.apps ?? cfg.paths.appsFile);
      console.log(JSON.stringify(new Installer().plan(tasks), null, 2));
    } catch (err) {
      reportFatal(err);
    }
  });

// --- history ---
program
  .command("history")
  .description("List recent installer runs")
  .option("-n, --limit <n>", "Number of runs to show", parseIntArg(1), 20)
  .option("--prune <days>", "Delete runs older than this many days", parseIntArg(0))
  .option("--db <path>", "History database", getConfig().paths.historyDb)
  .action(async (opts: { limit: number; prune?: number; db: string }) => {
    let store: RunStore | undefined;
    try {
      store = new RunStore(opts.db);
      if (opts.prune !== undefined) {
        const removed = store.deleteOlderThan(Date.now() - opts.prune * 24 * 60 * 60 * 1000);
        console.log(`Deleted ${removed} run(s).`);
      }
      const runs = store.list(opts.limit);
      if (runs.length === 0) {
        console.log("No runs recorded.");
        return;
      }
      for (const run of runs) {
        const ok = run.outcomes.filter((o) => o.status === "succeeded").length;
        const failed = run.outcomes.filter((o) => o.status === "failed").length;
        const duration = run.finishedAt ? formatDuration(run.finishedAt - run.startedAt) : "?";
        console.log(
          `${new Date(run.startedAt).toISOString()}  ${run.status.padEnd(11)} ${ok} ok, ${failed} failed  ${duration}${run.dryRun ? "  (dry run)" : ""}  ${run.runId}`,
        );
        if (run.error) console.log(`    ${run.error}`);
      }
    } catch (err) {
      reportFatal(err);
    } finally {
      store?.close();
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
