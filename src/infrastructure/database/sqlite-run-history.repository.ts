import Database from "better-sqlite3";
import {
  IRunHistoryRepository,
  RunHistoryEntry,
} from "../../core/domain/repositories/run-history.repository.js";

type RunHistoryRow = {
  run_id: string;
  command: string;
  started_at: string;
  finished_at: string;
  dry_run: number;
  counters: string;
};

function parseCounters(raw: string): Record<string, number> {
  const out: Record<string, number> = {};
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === "object") {
      for (const [name, value] of Object.entries(parsed)) {
        if (typeof value === "number") out[name] = value;
      }
    }
  } catch (err) {
    console.error("[RunHistory] Skipping unreadable counters:", err);
  }
  return out;
}

export class SqliteRunHistoryRepository implements IRunHistoryRepository {
  constructor(private db: Database.Database) {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS run_history (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id      TEXT    NOT NULL,
        command     TEXT    NOT NULL,
        started_at  TEXT    NOT NULL,
        finished_at TEXT    NOT NULL,
        dry_run     INTEGER NOT NULL,
        counters    TEXT    NOT NULL -- JSON string
      );
      CREATE INDEX IF NOT EXISTS idx_run_history_started_at ON run_history(started_at);
    `);
  }

  async append(entry: RunHistoryEntry): Promise<void> {
    this.db
      .prepare(
        "INSERT INTO run_history (run_id, command, started_at, finished_at, dry_run, counters) VALUES (?, ?, ?, ?, ?, ?)",
      )
      .run(
        entry.runId,
        entry.command,
        entry.startedAt,
        entry.finishedAt,
        entry.dryRun ? 1 : 0,
        JSON.stringify(entry.counters),
      );
  }

  async listRecent(limit: number): Promise<RunHistoryEntry[]> {
    const rows = this.db
      .prepare<[number], RunHistoryRow>(
        "SELECT run_id, command, started_at, finished_at, dry_run, counters FROM run_history ORDER BY id DESC LIMIT ?",
      )
      .all(limit);
    return rows.map((r) => ({
      runId: r.run_id,
      command: r.command === "verify" ? "verify" : "sync",
      startedAt: r.started_at,
      finishedAt: r.finished_at,
      dryRun: r.dry_run === 1,
      counters: parseCounters(r.counters),
    }));
  }
}
