import type Database from 'better-sqlite3';
import type { PaperRecord, PutResult } from '../types/index.js';
import type { CorpusDatabase } from './database.js';
import { ConflictError, NotFoundError } from '../utils/errors.js';
import { derivePaperId, sha256Hex } from '../utils/hash.js';
import { getLogger } from '../utils/logger.js';

interface PaperRow {
    paper_id: string;
    external_id: string;
    raw_content: string;
    content_hash: string;
    fetched_at: string;
}

function toRecord(row: PaperRow): PaperRecord {
    return {
        id: row.paper_id,
        externalId: row.external_id,
        rawContent: row.raw_content,
        contentHash: row.content_hash,
        fetchedAt: row.fetched_at,
    };
}

/**
 * Immutable store of fetched papers.
 *
 * Ids come from the external source id only, so re-fetching a paper always lands on
 * the same row and identical content under two external ids stays two papers.
 */
export class PaperStore {
    private readonly raw: Database.Database;
    private readonly selectById: Database.Statement<[string], PaperRow>;

    constructor(private readonly db: CorpusDatabase) {
        this.raw = db.getRawDb();
        this.selectById = this.raw.prepare<[string], PaperRow>('SELECT * FROM papers WHERE paper_id = ?');
    }

    /**
     * Store a fetched paper.
     * Unchanged content is a no-op; changed content needs `overwrite`.
     */
    put(externalId: string, rawContent: string, options: { overwrite?: boolean } = {}): PutResult {
        const id = derivePaperId(externalId);
        const contentHash = sha256Hex(rawContent);

        return this.db.transaction((): PutResult => {
            const existing = this.selectById.get(id);

            if (!existing) {
                const row: PaperRow = {
                    paper_id: id,
                    external_id: externalId.trim(),
                    raw_content: rawContent,
                    content_hash: contentHash,
                    fetched_at: new Date().toISOString(),
                };
                this.raw
                    .prepare(`
          INSERT INTO papers (paper_id, external_id, raw_content, content_hash, fetched_at)
          VALUES (@paper_id, @external_id, @raw_content, @content_hash, @fetched_at)
        `)
                    .run(row);
                getLogger().debug({ paperId: id, externalId }, 'Paper stored');
                return { record: toRecord(row), outcome: 'created' };
            }

            if (existing.content_hash === contentHash) {
                return { record: toRecord(existing), outcome: 'unchanged' };
            }

            if (!options.overwrite) {
                throw new ConflictError(`Paper ${externalId} was re-fetched with different content`, {
                    paperId: id,
                    externalId,
                    storedHash: existing.content_hash,
                    incomingHash: contentHash,
                });
            }

            const replaced: PaperRow = {
                ...existing,
                raw_content: rawContent,
                content_hash: contentHash,
                fetched_at: new Date().toISOString(),
            };
            this.raw
                .prepare('UPDATE papers SET raw_content = @raw_content, content_hash = @content_hash, fetched_at = @fetched_at WHERE paper_id = @paper_id')
                .run(replaced);
            getLogger().info({ paperId: id, externalId }, 'Paper content overwritten');
            return { record: toRecord(replaced), outcome: 'overwritten' };
        });
    }

    get(paperId: string): PaperRecord {
        const row = this.selectById.get(paperId);
        if (!row) throw new NotFoundError('paper', paperId);
        return toRecord(row);
    }

    findByExternalId(externalId: string): PaperRecord | undefined {
        const row = this.selectById.get(derivePaperId(externalId));
        return row ? toRecord(row) : undefined;
    }

    count(): number {
        return this.raw.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM papers').get()?.count ?? 0;
    }

    /**
     * Delete a paper together with its index entry and ledger.
     * Refused while any artifact still references the paper.
     */
    purge(paperId: string): void {
        this.db.transaction(() => {
            if (!this.selectById.get(paperId)) {
                throw new NotFoundError('paper', paperId);
            }

            const referencing = this.raw
                .prepare<[string, string, string, string], { count: number }>(`
          SELECT
            (SELECT COUNT(*) FROM query_artifacts WHERE paper_id = ?) +
            (SELECT COUNT(*) FROM synthesis_artifacts WHERE paper_id = ?) +
            (SELECT COUNT(*) FROM label_artifacts WHERE paper_id = ?) +
            (SELECT COUNT(*) FROM synthesis_refs WHERE paper_id = ?) AS count
        `)
                .get(paperId, paperId, paperId, paperId);

            if ((referencing?.count ?? 0) > 0) {
                throw new ConflictError(`Paper ${paperId} is still referenced by artifacts`, {
                    paperId,
                    references: referencing?.count,
                });
            }

            // ledger rows cascade with the index entry
            this.raw.prepare('DELETE FROM index_entries WHERE paper_id = ?').run(paperId);
            this.raw.prepare('DELETE FROM papers WHERE paper_id = ?').run(paperId);
        });

        getLogger().info({ paperId }, 'Paper purged');
    }
}
