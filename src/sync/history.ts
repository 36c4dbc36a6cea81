import Database from 'better-sqlite3';
import type { Outcome, OutcomeStatus, RunStatus, RunSummary } from '../types.js';
import type { SyncRun } from './run.js';

export interface OutcomeLogEntry {
  id: number;
  runId: string;
  status: OutcomeStatus;
  kind: string;
  remotePath: string;
  localPath: string;
  details: string | null;
  timestamp: number;
}

export interface OutcomeLogOptions {
  runId?: string;
  status?: string;
  path?: string;
  limit?: number;
  offset?: number;
}

export interface RunRecord {
  id: string;
  reference: string;
  destination: string;
  startedAt: number;
  finishedAt: number | null;
  status: RunStatus | null;
  succeeded: number;
  skipped: number;
  failed: number;
  bytes: number;
  fatalError: string | null;
}

interface RunRow {
  id: string;
  reference: string;
  destination: string;
  started_at: number;
  finished_at: number | null;
  status: RunStatus | null;
  succeeded: number;
  skipped: number;
  failed: number;
  bytes: number;
  fatal_error: string | null;
}

interface OutcomeRow {
  id: number;
  run_id: string;
  status: OutcomeStatus;
  kind: string;
  remote_path: string;
  local_path: string;
  details: string | null;
  timestamp: number;
}

/** Escape LIKE wildcards so `value` matches literally under ESCAPE '\\'. */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export function describeOutcome(outcome: Outcome): string {
  switch (outcome.status) {
    case 'succeeded':
    case 'skipped':
      return outcome.detail;
    case 'failed':
      return `${outcome.errorKind}: ${outcome.reason}`;
  }
}

const RUN_COLUMNS =
  'id, reference, destination, started_at, finished_at, status, succeeded, skipped, failed, bytes, fatal_error';

function toRunRecord(row: RunRow): RunRecord {
  return {
    id: row.id,
    reference: row.reference,
    destination: row.destination,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    status: row.status,
    succeeded: row.succeeded,
    skipped: row.skipped,
    failed: row.failed,
    bytes: row.bytes,
    fatalError: row.fatal_error,
  };
}

/** Local record of past runs and their per-item outcomes. */
export class HistoryDB {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.createSchema();
  }

  private createSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        id TEXT PRIMARY KEY,
        reference TEXT NOT NULL,
        destination TEXT NOT NULL,
        started_at INTEGER NOT NULL,
        finished_at INTEGER,
        status TEXT,
        succeeded INTEGER NOT NULL DEFAULT 0,
        skipped INTEGER NOT NULL DEFAULT 0,
        failed INTEGER NOT NULL DEFAULT 0,
        bytes INTEGER NOT NULL DEFAULT 0,
        fatal_error TEXT
      );

      CREATE TABLE IF NOT EXISTS outcomes (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id TEXT NOT NULL REFERENCES runs(id),
        status TEXT NOT NULL,
        kind TEXT NOT NULL,
        remote_path TEXT NOT NULL,
        local_path TEXT NOT NULL,
        details TEXT,
        timestamp INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS outcomes_run ON outcomes(run_id);
    `);
  }

  startRun(id: string, reference: string, destination: string, startedAt: number = Date.now()): void {
    this.db.prepare(
      'INSERT INTO runs (id, reference, destination, started_at) VALUES (?, ?, ?, ?)',
    ).run(id, reference, destination, startedAt);
  }

  finishRun(summary: RunSummary, finishedAt: number = Date.now()): void {
    this.db.prepare(`
      UPDATE runs SET
        finished_at = ?, status = ?, succeeded = ?, skipped = ?, failed = ?, bytes = ?, fatal_error = ?
      WHERE id = ?
    `).run(
      finishedAt,
      summary.status,
      summary.succeeded,
      summary.skipped,
      summary.failed,
      summary.bytes,
      summary.fatalError ?? null,
      summary.runId,
    );
  }

  addOutcome(runId: string, outcome: Outcome, timestamp: number = Date.now()): void {
    this.db.prepare(
      'INSERT INTO outcomes (run_id, status, kind, remote_path, local_path, details, timestamp) VALUES (?, ?, ?, ?, ?, ?, ?)',
    ).run(
      runId,
      outcome.status,
      outcome.subject.kind,
      outcome.subject.remotePath,
      outcome.subject.localPath,
      describeOutcome(outcome),
      timestamp,
    );
  }

  getOutcomeLog(options: OutcomeLogOptions = {}): OutcomeLogEntry[] {
    const conditions: string[] = [];
    const params: (string | number)[] = [];

    if (options.runId) {
      conditions.push('run_id = ?');
      params.push(options.runId);
    }
    if (options.status) {
      conditions.push('status = ?');
      params.push(options.status);
    }
    if (options.path) {
      conditions.push("remote_path LIKE ? ESCAPE '\\'");
      params.push(escapeLike(options.path) + '%');
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const limit = options.limit ?? 50;
    const offset = options.offset ?? 0;

    const rows = this.db.prepare(
      `SELECT id, run_id, status, kind, remote_path, local_path, details, timestamp FROM outcomes ${where} ORDER BY timestamp DESC, id DESC LIMIT ? OFFSET ?`,
    ).all(...params, limit, offset) as OutcomeRow[];

    return rows.map((row) => ({
      id: row.id,
      runId: row.run_id,
      status: row.status,
      kind: row.kind,
      remotePath: row.remote_path,
      localPath: row.local_path,
      details: row.details,
      timestamp: row.timestamp,
    }));
  }

  getRecentRuns(limit = 5): RunRecord[] {
    const rows = this.db.prepare(
      `SELECT ${RUN_COLUMNS} FROM runs ORDER BY started_at DESC, rowid DESC LIMIT ?`,
    ).all(limit) as RunRow[];
    return rows.map(toRunRecord);
  }

  /** Runs whose id starts with `prefix`, newest first. */
  findRuns(prefix: string, limit = 2): RunRecord[] {
    const rows = this.db.prepare(
      `SELECT ${RUN_COLUMNS} FROM runs WHERE id LIKE ? ESCAPE '\\' ORDER BY started_at DESC, rowid DESC LIMIT ?`,
    ).all(escapeLike(prefix) + '%', limit) as RunRow[];
    return rows.map(toRunRecord);
  }

  close(): void {
    this.db.close();
  }
}

export interface RunTracker {
  /** Store the summary and stop listening. */
  finish(summary: RunSummary): void;
  stop(): void;
}

/**
 * Write the run and each outcome as it is recorded. The first storage
 * error is handed to `onError` and ends tracking; the run itself goes on.
 */
export function trackRun(
  db: HistoryDB,
  run: SyncRun,
  reference: string,
  destination: string,
  onError: (err: unknown) => void,
): RunTracker {
  let active = true;

  const stop = (): void => {
    if (!active) return;
    active = false;
    run.off('outcome', onOutcome);
  };
  const fail = (err: unknown): void => {
    if (!active) return;
    stop();
    onError(err);
  };
  const onOutcome = (outcome: Outcome): void => {
    try {
      db.addOutcome(run.id, outcome);
    } catch (err) {
      fail(err);
    }
  };

  try {
    db.startRun(run.id, reference, destination, run.startedAt);
    run.on('outcome', onOutcome);
  } catch (err) {
    fail(err);
  }

  return {
    finish(summary) {
      if (!active) return;
      try {
        db.finishRun(summary);
        stop();
      } catch (err) {
        fail(err);
      }
    },
    stop,
  };
}
