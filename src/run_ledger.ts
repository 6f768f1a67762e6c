// src/run_ledger.ts
//
// Run Ledger: SQLite audit trail of design runs.
//
// - One row per run, per module, per attempt
// - Attempts are append-only; a (run, module, idx) triple is written once
// - Forward-compatible schema migrations (schema_version)
//
// Not on the hot path: written from orchestrator hooks, read by tooling.

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { createLogger } from './logger';
import { LedgerError, errorMessage } from './structured_error';
import type { Attempt, ModuleResult } from './design_types';

const log = createLogger('ledger');

const SCHEMA_VERSION = 2;

export type RunStatus = 'RUNNING' | 'VERIFIED' | 'PARTIALLY_FAILED' | 'ABORTED';

export interface RunMeta {
  prompt: string;
  provider?: string;
  model?: string;
}

export interface RunRecord {
  runId: string;
  prompt: string;
  provider: string | null;
  model: string | null;
  status: RunStatus;
  startedAt: string;
  finishedAt: string | null;
  reason: string | null;
}

export interface ModuleRecord {
  name: string;
  status: ModuleResult['status'];
  attempts: number;
  lastCategory: string | null;
}

export interface AttemptRecord {
  index: number;
  status: string;
  category: string | null;
  evidence: string | null;
  implementation: string;
  harness: string;
  startedAt: string;
  durationMs: number;
}

interface RunRow {
  run_id: string;
  prompt: string;
  provider: string | null;
  model: string | null;
  status: RunStatus;
  started_at: string;
  finished_at: string | null;
  reason: string | null;
}

interface ModuleRow {
  name: string;
  status: ModuleResult['status'];
  attempts: number;
  last_category: string | null;
}

interface AttemptRow {
  idx: number;
  status: string;
  category: string | null;
  evidence: string | null;
  implementation: string;
  harness: string;
  started_at: string;
  duration_ms: number;
}

function lastCategory(result: ModuleResult): string | null {
  if (result.status === 'EXHAUSTED') return result.lastDiagnosis.category;
  const last = result.attempts[result.attempts.length - 1];
  return last?.diagnosis?.category ?? null;
}

export class RunLedger {
  private readonly db: Database.Database;

  /** `:memory:` for an in-process ledger. */
  constructor(dbPath: string) {
    try {
      if (dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
      }
      this.db = new Database(dbPath);
    } catch (err) {
      throw new LedgerError(`Cannot open ledger at ${dbPath}: ${errorMessage(err)}`, { path: dbPath });
    }
    this.configureDatabase();
    this.runMigrations();
  }

  /* ------------------------------------------------------------------------ */
  /* SQLite Configuration                                                     */
  /* ------------------------------------------------------------------------ */

  private configureDatabase(): void {
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('busy_timeout = 5000');
  }

  /* ------------------------------------------------------------------------ */
  /* Migrations                                                               */
  /* ------------------------------------------------------------------------ */

  private runMigrations(): void {
    const tx = this.db.transaction(() => {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS schema_version (
          version INTEGER PRIMARY KEY,
          applied_at TEXT DEFAULT CURRENT_TIMESTAMP
        ) STRICT
      `);

      const row = this.db
        .prepare<[], { version: number }>(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
        .get();
      const current = row?.version ?? 0;

      if (current < 1) {
        this.db.exec(`
          CREATE TABLE IF NOT EXISTS runs (
            run_id TEXT PRIMARY KEY,
            prompt TEXT NOT NULL,
            status TEXT NOT NULL,
            started_at TEXT NOT NULL,
            finished_at TEXT,
            reason TEXT,
            CHECK(status IN ('RUNNING','VERIFIED','PARTIALLY_FAILED','ABORTED'))
          ) STRICT;

          CREATE TABLE IF NOT EXISTS modules (
            run_id TEXT NOT NULL,
            name TEXT NOT NULL,
            status TEXT NOT NULL,
            attempts INTEGER NOT NULL,
            last_category TEXT,
            PRIMARY KEY (run_id, name),
            FOREIGN KEY (run_id) REFERENCES runs(run_id) ON DELETE CASCADE,
            CHECK(status IN ('VERIFIED','EXHAUSTED','ABORTED')),
            CHECK(attempts >= 0)
          ) STRICT;

          CREATE TABLE IF NOT EXISTS attempts (
            run_id TEXT NOT NULL,
            module TEXT NOT NULL,
            idx INTEGER NOT NULL,
            status TEXT NOT NULL,
            category TEXT,
            evidence TEXT,
            implementation TEXT NOT NULL,
            harness TEXT NOT NULL,
            started_at TEXT NOT NULL,
            duration_ms INTEGER NOT NULL,
            PRIMARY KEY (run_id, module, idx),
            FOREIGN KEY (run_id) REFERENCES runs(run_id) ON DELETE CASCADE,
            CHECK(idx >= 1),
            CHECK(duration_ms >= 0)
          ) STRICT;

          CREATE INDEX IF NOT EXISTS idx_attempts_run ON attempts(run_id);
        `);
        this.db.prepare(`INSERT INTO schema_version (version) VALUES (1)`).run();
      }

      // v2: record which backend produced a run
      if (current < 2) {
        const cols = this.db.prepare<[], { name: string }>(`PRAGMA table_info(runs)`).all();
        if (!cols.some(c => c.name === 'provider')) {
          this.db.exec(`ALTER TABLE runs ADD COLUMN provider TEXT`);
        }
        if (!cols.some(c => c.name === 'model')) {
          this.db.exec(`ALTER TABLE runs ADD COLUMN model TEXT`);
        }
        this.db.exec(`CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at)`);
        this.db.prepare(`INSERT INTO schema_version (version) VALUES (2)`).run();
      }
    });

    tx();
    log.debug(`Ledger schema ready`, { version: SCHEMA_VERSION });
  }

  /* ------------------------------------------------------------------------ */
  /* Writes                                                                   */
  /* ------------------------------------------------------------------------ */

  startRun(runId: string, meta: RunMeta): void {
    this.write('startRun', { run_id: runId }, () => {
      this.db.prepare(
        `INSERT INTO runs (run_id, prompt, provider, model, status, started_at) VALUES (?, ?, ?, ?, 'RUNNING', ?)`
      ).run(runId, meta.prompt, meta.provider ?? null, meta.model ?? null, new Date().toISOString());
    });
  }

  recordAttempt(runId: string, module: string, attempt: Attempt): void {
    this.write('recordAttempt', { run_id: runId, module, idx: attempt.index }, () => {
      this.db.prepare(
        `INSERT INTO attempts (run_id, module, idx, status, category, evidence, implementation, harness, started_at, duration_ms)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      ).run(
        runId,
        module,
        attempt.index,
        attempt.outcome.status,
        attempt.diagnosis?.category ?? null,
        attempt.diagnosis?.evidence ?? null,
        attempt.implementation,
        attempt.harness,
        attempt.startedAt,
        Math.max(0, Math.round(attempt.durationMs))
      );
    });
  }

  finishModule(runId: string, result: ModuleResult): void {
    this.write('finishModule', { run_id: runId, module: result.name }, () => {
      this.db.prepare(
        `INSERT INTO modules (run_id, name, status, attempts, last_category) VALUES (?, ?, ?, ?, ?)
         ON CONFLICT (run_id, name) DO UPDATE SET
           status = excluded.status, attempts = excluded.attempts, last_category = excluded.last_category`
      ).run(runId, result.name, result.status, result.attempts.length, lastCategory(result));
    });
  }

  finishRun(runId: string, status: Exclude<RunStatus, 'RUNNING'>, reason: string | null = null): void {
    this.write('finishRun', { run_id: runId }, () => {
      const info = this.db.prepare(
        `UPDATE runs SET status = ?, finished_at = ?, reason = ? WHERE run_id = ?`
      ).run(status, new Date().toISOString(), reason, runId);
      if (info.changes === 0) {
        throw new LedgerError(`Unknown run: ${runId}`, { run_id: runId });
      }
    });
  }

  /* ------------------------------------------------------------------------ */
  /* Reads                                                                    */
  /* ------------------------------------------------------------------------ */

  getRun(runId: string): RunRecord | null {
    const row = this.db
      .prepare<[string], RunRow>(
        `SELECT run_id, prompt, provider, model, status, started_at, finished_at, reason FROM runs WHERE run_id = ?`
      )
      .get(runId);
    if (!row) return null;
    return {
      runId: row.run_id,
      prompt: row.prompt,
      provider: row.provider,
      model: row.model,
      status: row.status,
      startedAt: row.started_at,
      finishedAt: row.finished_at,
      reason: row.reason,
    };
  }

  getModules(runId: string): ModuleRecord[] {
    return this.db
      .prepare<[string], ModuleRow>(
        `SELECT name, status, attempts, last_category FROM modules WHERE run_id = ? ORDER BY rowid`
      )
      .all(runId)
      .map(r => ({ name: r.name, status: r.status, attempts: r.attempts, lastCategory: r.last_category }));
  }

  getAttempts(runId: string, module: string): AttemptRecord[] {
    return this.db
      .prepare<[string, string], AttemptRow>(
        `SELECT idx, status, category, evidence, implementation, harness, started_at, duration_ms
         FROM attempts WHERE run_id = ? AND module = ? ORDER BY idx`
      )
      .all(runId, module)
      .map(r => ({
        index: r.idx,
        status: r.status,
        category: r.category,
        evidence: r.evidence,
        implementation: r.implementation,
        harness: r.harness,
        startedAt: r.started_at,
        durationMs: r.duration_ms,
      }));
  }

  close(): void {
    this.db.close();
  }

  private write(op: string, context: Record<string, unknown>, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      if (err instanceof LedgerError) throw err;
      log.error(`Ledger ${op} failed`, { ...context, error: errorMessage(err) });
      throw new LedgerError(`Ledger ${op} failed: ${errorMessage(err)}`, context);
    }
  }
}
