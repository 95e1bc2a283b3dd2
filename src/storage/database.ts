import Database from 'better-sqlite3';
import type { ArtifactStage, LedgerStage, LedgerStatus, RunRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 * Paper store, index catalog with ledger, the three artifact stores and run history.
 */
const MIGRATION_V1 = `
-- Runs: one row per stage invocation
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL,
  finished_at TEXT,
  hecorpus_version TEXT NOT NULL,
  stage TEXT NOT NULL,
  config_json TEXT NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Papers: raw fetched content, keyed by the stable id
CREATE TABLE IF NOT EXISTS papers (
  paper_id TEXT PRIMARY KEY,
  external_id TEXT NOT NULL,
  raw_content TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  fetched_at TEXT NOT NULL
);

-- Index entries: extracted metadata; seq preserves insertion order
CREATE TABLE IF NOT EXISTS index_entries (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  paper_id TEXT NOT NULL UNIQUE REFERENCES papers(paper_id),
  title TEXT,
  abstract TEXT,
  source_metadata_json TEXT NOT NULL DEFAULT '{}',
  indexed_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

-- Ledger: per-paper, per-stage processing status
CREATE TABLE IF NOT EXISTS ledger (
  paper_id TEXT NOT NULL REFERENCES index_entries(paper_id) ON DELETE CASCADE,
  stage TEXT NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('pending', 'running', 'done', 'failed')),
  attempts INTEGER NOT NULL DEFAULT 0,
  error TEXT,
  owner TEXT,
  updated_at TEXT NOT NULL,
  PRIMARY KEY (paper_id, stage)
);

-- Artifact stores: one table per stage, identical shape
CREATE TABLE IF NOT EXISTS query_artifacts (
  artifact_id TEXT PRIMARY KEY,
  paper_id TEXT NOT NULL REFERENCES index_entries(paper_id),
  sequence_index INTEGER NOT NULL,
  payload_json TEXT NOT NULL,
  generator_version TEXT NOT NULL,
  generated_at TEXT NOT NULL,
  run_id INTEGER REFERENCES runs(run_id),
  UNIQUE (paper_id, sequence_index)
);

CREATE TABLE IF NOT EXISTS synthesis_artifacts (
  artifact_id TEXT PRIMARY KEY,
  paper_id TEXT NOT NULL REFERENCES index_entries(paper_id),
  sequence_index INTEGER NOT NULL,
  payload_json TEXT NOT NULL,
  generator_version TEXT NOT NULL,
  generated_at TEXT NOT NULL,
  run_id INTEGER REFERENCES runs(run_id),
  UNIQUE (paper_id, sequence_index)
);

CREATE TABLE IF NOT EXISTS label_artifacts (
  artifact_id TEXT PRIMARY KEY,
  paper_id TEXT NOT NULL REFERENCES index_entries(paper_id),
  sequence_index INTEGER NOT NULL,
  payload_json TEXT NOT NULL,
  generator_version TEXT NOT NULL,
  generated_at TEXT NOT NULL,
  run_id INTEGER REFERENCES runs(run_id),
  UNIQUE (paper_id, sequence_index)
);

-- Reference sets of synthesis artifacts (every member of the batch)
CREATE TABLE IF NOT EXISTS synthesis_refs (
  artifact_id TEXT NOT NULL REFERENCES synthesis_artifacts(artifact_id) ON DELETE CASCADE,
  paper_id TEXT NOT NULL REFERENCES index_entries(paper_id),
  position INTEGER NOT NULL,
  PRIMARY KEY (artifact_id, paper_id)
);

CREATE UNIQUE INDEX IF NOT EXISTS idx_papers_external_id ON papers(external_id);
CREATE INDEX IF NOT EXISTS idx_ledger_stage_status ON ledger(stage, status);
CREATE INDEX IF NOT EXISTS idx_synthesis_refs_paper ON synthesis_refs(paper_id);
`;

/**
 * SQLite schema migration v2.
 * Index entries remember the content hash they were extracted from.
 */
const MIGRATION_V2 = `
ALTER TABLE index_entries ADD COLUMN content_hash TEXT;
`;

/**
 * Artifact table per stage. Table names are only ever taken from this map.
 */
export const ARTIFACT_TABLES: Record<ArtifactStage, string> = {
    query: 'query_artifacts',
    synthesis: 'synthesis_artifacts',
    label: 'label_artifacts',
};

export interface CorpusStats {
    papers: number;
    entries: number;
    runs: number;
    artifacts: Record<ArtifactStage, number>;
    ledger: Partial<Record<LedgerStage, Partial<Record<LedgerStatus, number>>>>;
}

/**
 * Corpus database wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, run records and transactions;
 * the stores in this directory share its connection.
 */
export class CorpusDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        this.migrate();

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    private migrate(): void {
        const currentVersion = Number(this.db.pragma('user_version', { simple: true }));

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Database migrated to v1');
        }

        if (currentVersion < 2) {
            this.db.exec(MIGRATION_V2);
            this.db.pragma('user_version = 2');
            getLogger().info('Database migrated to v2');
        }
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id' | 'finished_at'>): number {
        const stmt = this.db.prepare(`
      INSERT INTO runs (created_at, hecorpus_version, stage, config_json, stats_json)
      VALUES (@created_at, @hecorpus_version, @stage, @config_json, @stats_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    finishRun(runId: number, stats: object): void {
        this.db
            .prepare('UPDATE runs SET finished_at = ?, stats_json = ? WHERE run_id = ?')
            .run(new Date().toISOString(), JSON.stringify(stats), runId);
    }

    getRun(runId: number): RunRecord | undefined {
        return this.db.prepare<[number], RunRecord>('SELECT * FROM runs WHERE run_id = ?').get(runId);
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): CorpusStats {
        const count = (table: string): number =>
            this.db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`).get()?.count ?? 0;

        const artifacts: Record<ArtifactStage, number> = {
            query: count(ARTIFACT_TABLES.query),
            synthesis: count(ARTIFACT_TABLES.synthesis),
            label: count(ARTIFACT_TABLES.label),
        };

        const ledgerRows = this.db
            .prepare<[], { stage: LedgerStage; status: LedgerStatus; count: number }>(
                'SELECT stage, status, COUNT(*) as count FROM ledger GROUP BY stage, status ORDER BY stage, status'
            )
            .all();
        const ledger: CorpusStats['ledger'] = {};
        for (const row of ledgerRows) {
            const byStatus = ledger[row.stage] ?? {};
            byStatus[row.status] = row.count;
            ledger[row.stage] = byStatus;
        }

        return {
            papers: count('papers'),
            entries: count('index_entries'),
            runs: count('runs'),
            artifacts,
            ledger,
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Execute a function within a transaction (a savepoint when nested).
     * Any throw rolls the whole function back.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 instance shared by the stores.
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}
