import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { getConfig } from "../config.js";
import type { RunRecord, RunRecordStatus } from "./types.js";

const STATUSES: readonly RunRecordStatus[] = ["succeeded", "failed", "interrupted", "aborted"];

/** SQLite-backed history of installer runs. Pass ":memory:" for a throwaway store. */
export class RunStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? getConfig().paths.historyDb;
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id         TEXT PRIMARY KEY,
        status         TEXT NOT NULL,
        dry_run        INTEGER NOT NULL DEFAULT 0,
        outcomes       TEXT NOT NULL DEFAULT '[]',
        rollbacks      TEXT NOT NULL DEFAULT '[]',
        not_dispatched TEXT NOT NULL DEFAULT '[]',
        error          TEXT,
        started_at     INTEGER NOT NULL,
        finished_at    INTEGER
      );
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC);
    `);
  }

  insert(run: RunRecord): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO runs (run_id, status, dry_run, outcomes, rollbacks, not_dispatched, error, started_at, finished_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      run.runId,
      run.status,
      run.dryRun ? 1 : 0,
      JSON.stringify(run.outcomes),
      JSON.stringify(run.rollbacks),
      JSON.stringify(run.notDispatched),
      run.error ?? null,
      run.startedAt,
      run.finishedAt ?? null,
    );
  }

  get(runId: string): RunRecord | undefined {
    const row = this.db.prepare("SELECT * FROM runs WHERE run_id = ?").get(runId) as RunRow | undefined;
    return row ? rowToRunRecord(row) : undefined;
  }

  list(limit = 20): RunRecord[] {
    const rows = this.db.prepare("SELECT * FROM runs ORDER BY started_at DESC LIMIT ?").all(limit) as RunRow[];
    return rows.map(rowToRunRecord);
  }

  /** Delete runs older than a given timestamp. */
  deleteOlderThan(timestamp: number): number {
    const result = this.db.prepare("DELETE FROM runs WHERE started_at < ?").run(timestamp);
    return result.changes;
  }

  close(): void {
    this.db.close();
  }
}

type RunRow = {
  run_id: string;
  status: string;
  dry_run: number;
  outcomes: string;
  rollbacks: string;
  not_dispatched: string;
  error: string | null;
  started_at: number;
  finished_at: number | null;
};

function parseStatus(value: string): RunRecordStatus {
  const status = STATUSES.find((s) => s === value);
  if (!status) throw new Error(`Unknown run status in history: ${value}`);
  return status;
}

function rowToRunRecord(row: RunRow): RunRecord {
  return {
    runId: row.run_id,
    status: parseStatus(row.status),
    dryRun: row.dry_run === 1,
    outcomes: JSON.parse(row.outcomes),
    rollbacks: JSON.parse(row.rollbacks),
    notDispatched: JSON.parse(row.not_dispatched),
    error: row.error ?? undefined,
    startedAt: row.started_at,
    finishedAt: row.finished_at ?? undefined,
  };
}
