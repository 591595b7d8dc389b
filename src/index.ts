// Config
export { getConfig, configure, resetConfig, loadConfig, parseKeyValue, defaults } from "./config.js";
export type { InstallerConfig, DeepPartial, LoadConfigOptions } from "./config.js";

// Errors
export {
  InstallerError,
  ConfigError,
  ValidationError,
  PreconditionError,
  isFatal,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export { parseOrThrow, ConfigFileSchema, PackageNameSchema, VariantSchema } from "./schemas.js";

// Persistence
export { RunStore } from "./persistence/store.js";
export type { RunRecord, RunRecordStatus } from "./persistence/types.js";

// Core
export { Installer, ExitCode } from "./installer.js";
export type { InstallerOptions, RunOptions, InstallRun, InstallPlan } from "./installer.js";
export { Executor } from "./executor/executor.js";
export { RunLedger } from "./executor/ledger.js";
export type {
  ExecutionOptions,
  ExecutionResult,
  TaskOutcome,
  TaskStatus,
  TaskTiming,
  RollbackRecord,
  RollbackStatus,
} from "./executor/types.js";

// Tasks
export { parseTaskEntry, parseTaskList, loadTaskList, formatTask } from "./planner/task-list.js";
export type { InstallTask, TaskVariant } from "./planner/types.js";

// Installers
export type { PackageInstaller, ActionResult, ActionStatus } from "./installers/adapter.js";
export { BrewInstaller } from "./installers/brew-installer.js";
export type { BrewInstallerOptions } from "./installers/brew-installer.js";
export { DryRunInstaller } from "./installers/dry-run-installer.js";
export { FunctionInstaller } from "./installers/function-installer.js";
export type { InstallFunction, FunctionInstallerOptions } from "./installers/function-installer.js";

// Pre-flight
export {
  internetCheck,
  macosVersionCheck,
  systemLoadCheck,
  diskSpaceCheck,
  dependenciesCheck,
  defaultChecks,
  compareVersions,
} from "./preflight/checks.js";
export { runPreflight } from "./preflight/runner.js";
export type { PreflightReport } from "./preflight/runner.js";
export type { PreflightCheck, CheckResult, CheckStatus, Confirm } from "./preflight/types.js";

// Summary
export { formatSummary, formatDuration } from "./summary.js";

// Utils
export { log, setLogLevel, setVerbose, setLogSink, openLogFile, closeLogFile } from "./utils/logger.js";
export type { LogLevel, LogRecord, LogSink } from "./utils/logger.js";
export { retry, sleep } from "./utils/retry.js";
export type { RetryOptions, RetryOutcome, AttemptResult, Sleep } from "./utils/retry.js";
export {
  linearJitterBackoff,
  exponentialBackoff,
  constantBackoff,
  createBackoff,
} from "./utils/backoff.js";
export type { BackoffPolicy, BackoffKind } from "./utils/backoff.js";
export { Semaphore } from "./utils/semaphore.js";
export { runCommand, commandExists } from "./system/exec.js";
export type { CommandRunner, CommandResult } from "./system/exec.js";
