import type { RollbackRecord, TaskOutcome } from "../executor/types.js";

/**
 * - `succeeded`: every task installed
 * - `failed`: finished with at least one failed task
 * - `interrupted`: stopped by a signal
 * - `aborted`: a pre-flight check or config error stopped it before any task ran
 */
export type RunRecordStatus = "succeeded" | "failed" | "interrupted" | "aborted";

export type RunRecord = {
  runId: string;
  status: RunRecordStatus;
  dryRun: boolean;
  outcomes: TaskOutcome[];
  rollbacks: RollbackRecord[];
  notDispatched: string[];
  error?: string;
  startedAt: number;
  finishedAt?: number;
};
