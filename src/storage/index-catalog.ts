import type Database from 'better-sqlite3';
import type {
    ArtifactStage,
    ExtractedMetadata,
    IndexEntry,
    Ledger,
    LedgerStage,
    LedgerStatus,
    MetadataExtractor,
    PaperRecord,
} from '../types/index.js';
import { ARTIFACT_STAGES } from '../types/index.js';
import type { CorpusDatabase } from './database.js';
import { ExtractionError, LedgerWriteError, NotFoundError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

interface EntryRow {
    seq: number;
    paper_id: string;
    title: string | null;
    abstract: string | null;
    source_metadata_json: string;
    content_hash: string | null;
    indexed_at: string;
    updated_at: string;
}

interface LedgerRow {
    paper_id: string;
    stage: LedgerStage;
    status: LedgerStatus;
    attempts: number;
    error: string | null;
    owner: string | null;
    updated_at: string;
}

export interface ClaimOptions {
    /** Allow failed → running */
    retryFailed?: boolean;
    /** Allow done → running (force regeneration) */
    force?: boolean;
    /** Leases last touched at or before this ISO time are reclaimable */
    staleBefore?: string;
}

function parseMetadata(json: string): Record<string, string> {
    const parsed: unknown = JSON.parse(json);
    const metadata: Record<string, string> = {};
    if (typeof parsed === 'object' && parsed !== null) {
        for (const [key, value] of Object.entries(parsed)) {
            if (typeof value === 'string') metadata[key] = value;
        }
    }
    return metadata;
}

/**
 * Metadata index over the paper store, one entry per paper, with the per-stage ledger.
 *
 * The ledger is the only record of whether a stage has produced output for a paper.
 * Every transition is a single conditional UPDATE, so callers that lose a race see
 * `false` (claim) or a LedgerWriteError (complete/fail/release) instead of clobbering.
 */
export class IndexCatalog {
    private readonly raw: Database.Database;
    private readonly selectEntry: Database.Statement<[string], EntryRow>;
    private readonly selectLedger: Database.Statement<[string], LedgerRow>;
    private readonly selectStatus: Database.Statement<[string, string], { status: LedgerStatus; error: string | null }>;
    private readonly ensureLedgerRow: Database.Statement<[string, string, string]>;

    constructor(private readonly db: CorpusDatabase) {
        this.raw = db.getRawDb();
        this.selectEntry = this.raw.prepare<[string], EntryRow>('SELECT * FROM index_entries WHERE paper_id = ?');
        this.selectLedger = this.raw.prepare<[string], LedgerRow>('SELECT * FROM ledger WHERE paper_id = ? ORDER BY stage');
        this.selectStatus = this.raw.prepare<[string, string], { status: LedgerStatus; error: string | null }>(
            'SELECT status, error FROM ledger WHERE paper_id = ? AND stage = ?'
        );
        this.ensureLedgerRow = this.raw.prepare<[string, string, string]>(
            "INSERT OR IGNORE INTO ledger (paper_id, stage, status, updated_at) VALUES (?, ?, 'pending', ?)"
        );
    }

    // ─── Indexing ─────────────────────────────────────────────

    /**
     * Index (or re-index) a stored paper.
     *
     * An ExtractionError does not abort: the entry is written with the partial metadata
     * the error carries and its `indexing` ledger row is marked failed.
     * Re-indexing the same content refreshes metadata only. Re-indexing changed content
     * also moves every artifact stage that was done back to pending.
     */
    index(paper: PaperRecord, extractor: MetadataExtractor): IndexEntry {
        let metadata: ExtractedMetadata;
        let failure: string | null = null;

        try {
            metadata = extractor(paper.rawContent);
        } catch (error) {
            if (!(error instanceof ExtractionError)) throw error;
            metadata = error.partial;
            failure = error.message;
            getLogger().warn({ paperId: paper.id, externalId: paper.externalId, reason: error.message }, 'Indexed with partial metadata');
        }

        return this.db.transaction(() => {
            const paperExists = this.raw.prepare<[string], { one: number }>('SELECT 1 AS one FROM papers WHERE paper_id = ?').get(paper.id);
            if (!paperExists) throw new NotFoundError('paper', paper.id);

            const previous = this.selectEntry.get(paper.id);
            const now = new Date().toISOString();
            this.raw
                .prepare(`
          INSERT INTO index_entries (paper_id, title, abstract, source_metadata_json, content_hash, indexed_at, updated_at)
          VALUES (@paper_id, @title, @abstract, @source_metadata_json, @content_hash, @now, @now)
          ON CONFLICT(paper_id) DO UPDATE SET
            title = excluded.title,
            abstract = excluded.abstract,
            source_metadata_json = excluded.source_metadata_json,
            content_hash = excluded.content_hash,
            updated_at = excluded.updated_at
        `)
                .run({
                    paper_id: paper.id,
                    title: metadata.title,
                    abstract: metadata.abstract,
                    source_metadata_json: JSON.stringify(metadata.sourceMetadata),
                    content_hash: paper.contentHash,
                    now,
                });

            const changed = previous !== undefined && previous.content_hash !== paper.contentHash;
            const reopened: ArtifactStage[] = [];
            for (const stage of ARTIFACT_STAGES) {
                this.ensureLedgerRow.run(paper.id, stage, now);
                if (changed && this.reopen(paper.id, stage)) reopened.push(stage);
            }
            if (reopened.length > 0) {
                getLogger().info({ paperId: paper.id, stages: reopened }, 'Content changed, stages reopened');
            }
            this.mark(paper.id, 'indexing', failure ? 'failed' : 'done', failure);

            return this.get(paper.id);
        });
    }

    // ─── Reads ────────────────────────────────────────────────

    get(paperId: string): IndexEntry {
        const entry = this.find(paperId);
        if (!entry) throw new NotFoundError('index entry', paperId);
        return entry;
    }

    find(paperId: string): IndexEntry | undefined {
        const row = this.selectEntry.get(paperId);
        return row ? this.toEntry(row) : undefined;
    }

    /**
     * All entries in insertion order.
     */
    *entries(): Generator<IndexEntry> {
        const ids = this.raw
            .prepare<[], { paper_id: string }>('SELECT paper_id FROM index_entries ORDER BY seq')
            .all();
        for (const { paper_id } of ids) {
            const entry = this.find(paper_id);
            if (entry) yield entry;
        }
    }

    /**
     * Entries whose status for `stage` is anything but done, in insertion order.
     *
     * Lazy and uncached: the candidate list is read when iteration starts and each entry's
     * status is re-read just before it is yielded, so an entry finished meanwhile is skipped.
     */
    *pendingFor(stage: LedgerStage): Generator<IndexEntry> {
        const ids = this.raw
            .prepare<[string], { paper_id: string }>(`
        SELECT e.paper_id FROM index_entries e
        LEFT JOIN ledger l ON l.paper_id = e.paper_id AND l.stage = ?
        WHERE l.status IS NULL OR l.status != 'done'
        ORDER BY e.seq
      `)
            .all(stage);

        for (const { paper_id } of ids) {
            if (this.selectStatus.get(paper_id, stage)?.status === 'done') continue;
            const entry = this.find(paper_id);
            if (entry) yield entry;
        }
    }

    statusOf(paperId: string, stage: LedgerStage): LedgerStatus {
        return this.selectStatus.get(paperId, stage)?.status ?? 'pending';
    }

    ledgerCounts(): Partial<Record<LedgerStage, Partial<Record<LedgerStatus, number>>>> {
        return this.db.getStats().ledger;
    }

    // ─── Ledger transitions ───────────────────────────────────

    /**
     * Set a ledger status directly. Repeating the current status is a no-op.
     */
    mark(paperId: string, stage: LedgerStage, status: LedgerStatus, error: string | null = null): void {
        this.db.transaction(() => {
            this.requireEntry(paperId);

            const current = this.selectStatus.get(paperId, stage);
            if (current && current.status === status && (status !== 'failed' || current.error === error)) {
                return;
            }

            this.raw
                .prepare(`
          INSERT INTO ledger (paper_id, stage, status, error, owner, updated_at)
          VALUES (@paper_id, @stage, @status, @error, NULL, @now)
          ON CONFLICT(paper_id, stage) DO UPDATE SET
            status = excluded.status,
            error = excluded.error,
            owner = NULL,
            updated_at = excluded.updated_at
        `)
                .run({ paper_id: paperId, stage, status, error: status === 'failed' ? error : null, now: new Date().toISOString() });
        });
    }

    /**
     * Compare-and-swap to `running` under `owner`. Returns false when the row is not claimable.
     */
    claim(paperId: string, stage: ArtifactStage, owner: string, options: ClaimOptions = {}): boolean {
        return this.db.transaction(() => {
            this.requireEntry(paperId);
            const now = new Date().toISOString();
            this.ensureLedgerRow.run(paperId, stage, now);

            const result = this.raw
                .prepare(`
          UPDATE ledger
          SET status = 'running', owner = @owner, attempts = attempts + 1, updated_at = @now
          WHERE paper_id = @paper_id AND stage = @stage AND (
            status = 'pending'
            OR (status = 'failed' AND @retry = 1)
            OR (status = 'done' AND @force = 1)
            OR (status = 'running' AND @stale_before IS NOT NULL AND updated_at <= @stale_before)
          )
        `)
                .run({
                    paper_id: paperId,
                    stage,
                    owner,
                    now,
                    retry: options.retryFailed ? 1 : 0,
                    force: options.force ? 1 : 0,
                    stale_before: options.staleBefore ?? null,
                });

            return result.changes > 0;
        });
    }

    /**
     * running → done. Meant to be called inside the transaction that writes the artifacts.
     */
    complete(paperId: string, stage: ArtifactStage, owner: string): void {
        this.transition(paperId, stage, owner, 'done', null);
    }

    /**
     * running → failed, recording the reason.
     */
    fail(paperId: string, stage: ArtifactStage, owner: string, message: string): void {
        this.transition(paperId, stage, owner, 'failed', message);
    }

    /**
     * running → pending, for a claim that was taken but never used.
     */
    release(paperId: string, stage: ArtifactStage, owner: string): void {
        this.transition(paperId, stage, owner, 'pending', null);
    }

    /**
     * done → pending, so the next run regenerates the stage. Returns false for any other status.
     */
    reopen(paperId: string, stage: ArtifactStage): boolean {
        return (
            this.raw
                .prepare(`
          UPDATE ledger SET status = 'pending', error = NULL, owner = NULL, updated_at = @now
          WHERE paper_id = @paper_id AND stage = @stage AND status = 'done'
        `)
                .run({ paper_id: paperId, stage, now: new Date().toISOString() }).changes > 0
        );
    }

    // ─── Internal helpers ─────────────────────────────────────

    private transition(
        paperId: string,
        stage: ArtifactStage,
        owner: string,
        status: Exclude<LedgerStatus, 'running'>,
        error: string | null
    ): void {
        const result = this.raw
            .prepare(`
        UPDATE ledger SET status = @status, error = @error, owner = NULL, updated_at = @now
        WHERE paper_id = @paper_id AND stage = @stage AND status = 'running' AND owner = @owner
      `)
            .run({ paper_id: paperId, stage, owner, status, error, now: new Date().toISOString() });

        if (result.changes === 0) {
            throw new LedgerWriteError(`Ledger row ${paperId}/${stage} is not held by ${owner}`, {
                paperId,
                stage,
                owner,
                target: status,
                current: this.selectStatus.get(paperId, stage)?.status ?? null,
            });
        }
    }

    private requireEntry(paperId: string): void {
        if (!this.selectEntry.get(paperId)) {
            throw new NotFoundError('index entry', paperId);
        }
    }

    private toEntry(row: EntryRow): IndexEntry {
        const ledger: Ledger = {};
        for (const l of this.selectLedger.all(row.paper_id)) {
            ledger[l.stage] = {
                status: l.status,
                attempts: l.attempts,
                error: l.error,
                owner: l.owner,
                updatedAt: l.updated_at,
            };
        }

        return {
            paperId: row.paper_id,
            title: row.title,
            abstract: row.abstract,
            sourceMetadata: parseMetadata(row.source_metadata_json),
            ledger,
            indexedAt: row.indexed_at,
            updatedAt: row.updated_at,
        };
    }
}
