/**
 * History Store
 *
 * SQLite-backed record of collection runs, via better-sqlite3.
 * Database lives at ~/.ticket-pulse/history.db by default.
 *
 * InfluxDB remains the source of truth for dashboards; this store backs
 * `ticket-pulse history` and the MCP tools without a round trip to it.
 */

import Database from 'better-sqlite3';
import type { CollectionResult, MetricSource } from '../orchestrator/types.js';
import type { RunRecord, StoredSample } from './types.js';
import { historyDbPath, ensureConfigDir } from '../config/paths.js';

export class HistoryStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? historyDbPath();
    if (!dbPath) {
      ensureConfigDir();
    }
    this.db = new Database(path);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.migrate();
  }

  /**
   * Record a run and its samples in one transaction. Returns the run ID.
   * Failures are counted, not stored.
   */
  recordRun(result: CollectionResult): number {
    const insertRun = this.db.prepare(`
      INSERT INTO runs (timestamp, sample_count, failure_count)
      VALUES (@timestamp, @sampleCount, @failureCount)
    `);
    const insertSample = this.db.prepare(`
      INSERT INTO samples (run_id, series, source, value)
      VALUES (@runId, @series, @source, @value)
    `);

    const record = this.db.transaction((r: CollectionResult): number => {
      const run = insertRun.run({
        timestamp: r.timestamp,
        sampleCount: r.samples.length,
        failureCount: r.failures.length,
      });
      const runId = Number(run.lastInsertRowid);
      for (const sample of r.samples) {
        insertSample.run({ runId, series: sample.series, source: sample.source, value: sample.value });
      }
      return runId;
    });

    return record(result);
  }

  /** Most recent value of every series ever recorded, sorted by series. */
  getLatestValues(): StoredSample[] {
    const rows = this.db
      .prepare<[], SampleRow>(
        `SELECT s.run_id, r.timestamp, s.series, s.source, s.value
         FROM samples s JOIN runs r ON r.id = s.run_id
         WHERE s.run_id = (
           SELECT MAX(s2.run_id) FROM samples s2 WHERE s2.series = s.series
         )
         ORDER BY s.series`
      )
      .all();

    return rows.map(mapSampleRow);
  }

  /** Values of one series, most recent first. */
  getSeriesHistory(series: string, limit = 20): StoredSample[] {
    const rows = this.db
      .prepare<[string, number], SampleRow>(
        `SELECT s.run_id, r.timestamp, s.series, s.source, s.value
         FROM samples s JOIN runs r ON r.id = s.run_id
         WHERE s.series = ?
         ORDER BY r.timestamp DESC, s.run_id DESC
         LIMIT ?`
      )
      .all(series, limit);

    return rows.map(mapSampleRow);
  }

  /** Runs, most recent first. */
  getRecentRuns(limit = 10): RunRecord[] {
    const rows = this.db
      .prepare<[number], RunRow>(`SELECT * FROM runs ORDER BY timestamp DESC, id DESC LIMIT ?`)
      .all(limit);

    return rows.map((row) => ({
      id: row.id,
      timestamp: row.timestamp,
      sampleCount: row.sample_count,
      failureCount: row.failure_count,
      createdAt: row.created_at,
    }));
  }

  close(): void {
    this.db.close();
  }

  // ─── Schema Migration ─────────────────────────────────────

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        id             INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp      INTEGER NOT NULL,
        sample_count   INTEGER NOT NULL DEFAULT 0,
        failure_count  INTEGER NOT NULL DEFAULT 0,
        created_at     TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS samples (
        id       INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id   INTEGER NOT NULL REFERENCES runs(id),
        series   TEXT NOT NULL,
        source   TEXT NOT NULL,
        value    REAL NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_samples_series_run ON samples(series, run_id);
      CREATE INDEX IF NOT EXISTS idx_runs_timestamp ON runs(timestamp);
    `);
  }
}

// ─── Row Mapping ────────────────────────────────────────────

interface RunRow {
  id: number;
  timestamp: number;
  sample_count: number;
  failure_count: number;
  created_at: string;
}

interface SampleRow {
  run_id: number;
  timestamp: number;
  series: string;
  source: string;
  value: number;
}

function toSource(value: string): MetricSource {
  return value === 'github' ? 'github' : 'jira';
}

function mapSampleRow(row: SampleRow): StoredSample {
  return {
    runId: row.run_id,
    timestamp: row.timestamp,
    series: row.series,
    source: toSource(row.source),
    value: row.value,
  };
}
