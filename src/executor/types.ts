import type { InstallTask, TaskVariant } from "../planner/types.js";
import type { BackoffPolicy } from "../utils/backoff.js";
import type { Sleep } from "../utils/retry.js";

export type TaskStatus = "succeeded" | "failed";

/** Final result of one task's retry loop. Frozen once recorded. */
export type TaskOutcome = Readonly<{
  id: string;
  variant: TaskVariant;
  status: TaskStatus;
  durationMs: number;
  attempts: number;
  error?: string;
}>;

export type TaskTiming = {
  id: string;
  durationMs: number;
};

export type RollbackStatus = "rolled-back" | "not-installed" | "failed";

export type RollbackRecord = {
  id: string;
  status: RollbackStatus;
  error?: string;
};

export type ExecutionOptions = {
  maxConcurrency?: number;
  /** Extra attempts per task after the first. */
  retries?: number;
  backoff?: BackoffPolicy;
  /** Stops dispatch; in-flight tasks finish their current attempt. */
  abortSignal?: AbortSignal;
  sleep?: Sleep;
  onTaskStart?: (task: InstallTask, position: number, total: number) => void;
  onAttempt?: (task: InstallTask, attempt: number) => void;
  onTaskEnd?: (outcome: TaskOutcome) => void;
  onRollback?: (record: RollbackRecord) => void;
};

export type ExecutionResult = {
  outcomes: Record<string, TaskOutcome>;
  /** Ids of failed tasks, in completion order. */
  rollbackSet: string[];
  /** Per-task durations, in completion order. */
  timings: TaskTiming[];
  rollbacks: RollbackRecord[];
  /** Tasks never started because the run was interrupted. */
  notDispatched: string[];
  interrupted: boolean;
  success: boolean;
  durationMs: number;
  peakConcurrency: number;
};
