import Database from 'better-sqlite3';
import type { CanonicalRecord, HeadlineMetric, RankingEntry, RunRecord } from '../types/index.js';
import { canonicalKey } from '../pipeline/reconciler.js';
import { canonicalRecordSchema } from '../utils/record-schemas.js';
import { getLogger, type Logger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 * Runs, the reconciled records of each run, and each run's ranking.
 */
const MIGRATION_V1 = `
-- Runs: build session metadata
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  scholarank_version TEXT NOT NULL,
  config_json TEXT NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Researchers: reconciled records snapshotted per run
CREATE TABLE IF NOT EXISTS researchers (
  run_id INTEGER NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
  record_key TEXT NOT NULL,
  id TEXT NOT NULL,
  id_kind TEXT NOT NULL,
  name TEXT NOT NULL,
  affiliation TEXT NOT NULL DEFAULT '',
  country_code TEXT,
  h_index INTEGER NOT NULL DEFAULT 0,
  citations INTEGER NOT NULL DEFAULT 0,
  record_json TEXT NOT NULL,
  PRIMARY KEY (run_id, record_key)
);

-- Rankings: ordered output of a run
CREATE TABLE IF NOT EXISTS rankings (
  run_id INTEGER NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
  rank INTEGER NOT NULL,
  record_key TEXT NOT NULL,
  sort_by TEXT NOT NULL,
  discipline TEXT NOT NULL,
  consistency_score REAL NOT NULL,
  impact_score REAL NOT NULL,
  PRIMARY KEY (run_id, rank)
);

CREATE INDEX IF NOT EXISTS idx_researchers_name ON researchers(name);
CREATE INDEX IF NOT EXISTS idx_rankings_key ON rankings(run_id, record_key);
`;

/** One ranking row joined with its researcher */
export interface StoredRankingRow {
    rank: number;
    record_key: string;
    name: string;
    affiliation: string;
    discipline: string;
    h_index: number;
    citations: number;
    consistency_score: number;
    impact_score: number;
}

export interface DatabaseStats {
    runs: number;
    researchers: number;
    rankings: number;
    latestRunId: number | null;
}

type CountRow = { count: number };

/**
 * Run store wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys and run snapshots.
 */
export class RankingDatabase {
    private db: Database.Database;
    private readonly logger: Logger;

    constructor(dbPath: string, options: { logger?: Logger } = {}) {
        this.db = new Database(dbPath);
        this.logger = options.logger ?? getLogger();

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        // Run migrations
        this.migrate();

        this.logger.debug({ dbPath }, 'Database initialized');
    }

    /**
     * Schema version recorded in `PRAGMA user_version`.
     */
    getSchemaVersion(): number {
        const version = this.db.pragma('user_version', { simple: true });
        return typeof version === 'number' ? version : 0;
    }

    private migrate(): void {
        if (this.getSchemaVersion() < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            this.logger.info('Database migrated to v1');
        }
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const stmt = this.db.prepare(`
      INSERT INTO runs (created_at, scholarank_version, config_json, stats_json)
      VALUES (@created_at, @scholarank_version, @config_json, @stats_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    getRuns(): RunRecord[] {
        return this.db
            .prepare<[], RunRecord>('SELECT run_id, created_at, scholarank_version, config_json, stats_json FROM runs ORDER BY run_id')
            .all();
    }

    getLatestRunId(): number | null {
        const row = this.db.prepare<[], { run_id: number }>('SELECT MAX(run_id) AS run_id FROM runs').get();
        return row?.run_id ?? null;
    }

    // ─── Researchers ──────────────────────────────────────────

    /**
     * Snapshot reconciled records for a run in a single transaction.
     * A record key seen twice keeps the last record.
     */
    insertResearchers(runId: number, records: CanonicalRecord[]): void {
        const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO researchers (run_id, record_key, id, id_kind, name, affiliation, country_code, h_index, citations, record_json)
      VALUES (@run_id, @record_key, @id, @id_kind, @name, @affiliation, @country_code, @h_index, @citations, @record_json)
    `);

        const insertAll = this.db.transaction((rows: CanonicalRecord[]) => {
            for (const record of rows) {
                stmt.run({
                    run_id: runId,
                    record_key: canonicalKey(record),
                    id: record.id,
                    id_kind: record.id_kind,
                    name: record.name,
                    affiliation: record.affiliation,
                    country_code: record.country_code,
                    h_index: record.h_index,
                    citations: record.citations,
                    record_json: JSON.stringify(record),
                });
            }
        });

        insertAll(records);
    }

    /**
     * Records snapshotted for a run. Rows whose JSON no longer validates are skipped.
     */
    getCanonicalRecords(runId: number): CanonicalRecord[] {
        const rows = this.db
            .prepare<[number], { record_key: string; record_json: string }>(
                'SELECT record_key, record_json FROM researchers WHERE run_id = ? ORDER BY record_key'
            )
            .all(runId);

        const records: CanonicalRecord[] = [];
        for (const row of rows) {
            let raw: unknown;
            try {
                raw = JSON.parse(row.record_json);
            } catch {
                this.logger.warn({ runId, key: row.record_key }, 'Stored record is not valid JSON, skipping');
                continue;
            }
            const parsed = canonicalRecordSchema.safeParse(raw);
            if (parsed.success) {
                records.push(parsed.data);
            } else {
                this.logger.warn({ runId, key: row.record_key }, 'Stored record failed validation, skipping');
            }
        }
        return records;
    }

    // ─── Rankings ─────────────────────────────────────────────

    insertRanking(runId: number, entries: RankingEntry[], sortBy: HeadlineMetric): void {
        const stmt = this.db.prepare(`
      INSERT INTO rankings (run_id, rank, record_key, sort_by, discipline, consistency_score, impact_score)
      VALUES (@run_id, @rank, @record_key, @sort_by, @discipline, @consistency_score, @impact_score)
    `);

        const insertAll = this.db.transaction((rows: RankingEntry[]) => {
            for (const entry of rows) {
                stmt.run({
                    run_id: runId,
                    rank: entry.rank,
                    record_key: canonicalKey(entry),
                    sort_by: sortBy,
                    discipline: entry.discipline,
                    consistency_score: entry.consistency_score,
                    impact_score: entry.impact_score,
                });
            }
        });

        insertAll(entries);
    }

    getRanking(runId: number, limit = -1): StoredRankingRow[] {
        return this.db
            .prepare<[number, number], StoredRankingRow>(`
      SELECT k.rank, k.record_key, r.name, r.affiliation, k.discipline, r.h_index, r.citations,
             k.consistency_score, k.impact_score
      FROM rankings k
      JOIN researchers r ON r.run_id = k.run_id AND r.record_key = k.record_key
      WHERE k.run_id = ?
      ORDER BY k.rank
      LIMIT ?
    `)
            .all(runId, limit);
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): DatabaseStats {
        const count = (table: 'runs' | 'researchers' | 'rankings'): number =>
            this.db.prepare<[], CountRow>(`SELECT COUNT(*) as count FROM ${table}`).get()?.count ?? 0;

        return {
            runs: count('runs'),
            researchers: count('researchers'),
            rankings: count('rankings'),
            latestRunId: this.getLatestRunId(),
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Execute a function within a transaction.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    close(): void {
        this.db.close();
        this.logger.debug('Database closed');
    }
}
