import type Database from 'better-sqlite3';
import type { ArtifactRecord, ArtifactStage, PayloadByStage } from '../types/index.js';
import { ARTIFACT_TABLES, type CorpusDatabase } from './database.js';

interface ArtifactRow {
    artifact_id: string;
    paper_id: string;
    sequence_index: number;
    payload_json: string;
    generator_version: string;
    generated_at: string;
    run_id: number | null;
}

export interface WriteResult {
    written: number;
    /** Records skipped because the same artifact id already existed (non-force) */
    unchanged: number;
    /** Stale records of a previous, longer generation removed under force */
    removed: number;
}

/**
 * The three derived stores. Rows are keyed by a deterministic artifact id, so writing the
 * same logical output twice is a no-op unless the caller forces replacement.
 */
export class ArtifactStore {
    private readonly raw: Database.Database;

    constructor(private readonly db: CorpusDatabase) {
        this.raw = db.getRawDb();
    }

    /**
     * Write one paper's (or one batch's) output for a stage.
     * Without `force`, existing artifact ids are left untouched.
     */
    write<S extends ArtifactStage>(stage: S, records: ArtifactRecord<S>[], options: { force?: boolean } = {}): WriteResult {
        const table = ARTIFACT_TABLES[stage];
        const verb = options.force ? 'INSERT OR REPLACE' : 'INSERT OR IGNORE';
        const insert = this.raw.prepare(`
      ${verb} INTO ${table} (artifact_id, paper_id, sequence_index, payload_json, generator_version, generated_at, run_id)
      VALUES (@artifact_id, @paper_id, @sequence_index, @payload_json, @generator_version, @generated_at, @run_id)
    `);
        const clearRefs = this.raw.prepare('DELETE FROM synthesis_refs WHERE artifact_id = ?');
        const insertRef = this.raw.prepare('INSERT INTO synthesis_refs (artifact_id, paper_id, position) VALUES (?, ?, ?)');

        return this.db.transaction((): WriteResult => {
            const result: WriteResult = { written: 0, unchanged: 0, removed: 0 };

            for (const record of records) {
                const changes = insert.run({
                    artifact_id: record.artifactId,
                    paper_id: record.paperId,
                    sequence_index: record.sequenceIndex,
                    payload_json: JSON.stringify(record.payload),
                    generator_version: record.generatorVersion,
                    generated_at: record.generatedAt,
                    run_id: record.runId,
                }).changes;

                if (changes === 0) {
                    result.unchanged++;
                    continue;
                }
                result.written++;

                if (stage === 'synthesis') {
                    clearRefs.run(record.artifactId);
                    record.references.forEach((paperId, position) => insertRef.run(record.artifactId, paperId, position));
                }
            }

            if (options.force) {
                const anchors = new Map<string, number>();
                for (const record of records) {
                    anchors.set(record.paperId, Math.max(anchors.get(record.paperId) ?? -1, record.sequenceIndex));
                }
                for (const [paperId, maxIndex] of anchors) {
                    result.removed += this.raw
                        .prepare(`DELETE FROM ${table} WHERE paper_id = ? AND sequence_index > ?`)
                        .run(paperId, maxIndex).changes;
                }
            }

            return result;
        });
    }

    /**
     * Remove every synthesis record anchored on, or referencing, one of `paperIds`, so a
     * new batch over them leaves each paper in at most one record. `orphaned` lists the
     * other papers those records referenced, which no longer belong to any record.
     */
    supersedeSynthesis(paperIds: readonly string[]): { removed: number; orphaned: string[] } {
        const selectAffected = this.raw.prepare<[string, string], { artifact_id: string }>(`
      SELECT artifact_id FROM synthesis_artifacts WHERE paper_id = ?
      UNION
      SELECT artifact_id FROM synthesis_refs WHERE paper_id = ?
    `);
        const selectRefs = this.raw.prepare<[string], { paper_id: string }>('SELECT paper_id FROM synthesis_refs WHERE artifact_id = ?');
        const clearRefs = this.raw.prepare('DELETE FROM synthesis_refs WHERE artifact_id = ?');
        const remove = this.raw.prepare('DELETE FROM synthesis_artifacts WHERE artifact_id = ?');

        return this.db.transaction(() => {
            const members = new Set(paperIds);
            const affected = new Set<string>();
            for (const paperId of paperIds) {
                for (const row of selectAffected.all(paperId, paperId)) affected.add(row.artifact_id);
            }

            const orphaned = new Set<string>();
            for (const artifactId of affected) {
                for (const ref of selectRefs.all(artifactId)) {
                    if (!members.has(ref.paper_id)) orphaned.add(ref.paper_id);
                }
                clearRefs.run(artifactId);
                remove.run(artifactId);
            }

            return { removed: affected.size, orphaned: [...orphaned] };
        });
    }

    /**
     * Papers that share a synthesis record with `paperId`, excluding itself.
     */
    synthesisPeers(paperId: string): string[] {
        return this.raw
            .prepare<[string, string], { paper_id: string }>(`
        SELECT DISTINCT r.paper_id FROM synthesis_refs r
        WHERE r.artifact_id IN (SELECT artifact_id FROM synthesis_refs WHERE paper_id = ?) AND r.paper_id != ?
        ORDER BY r.paper_id
      `)
            .all(paperId, paperId)
            .map((row) => row.paper_id);
    }

    /**
     * Artifacts of a stage, optionally for one anchor paper, ordered by paper then sequence.
     */
    list<S extends ArtifactStage>(stage: S, paperId?: string): ArtifactRecord<S>[] {
        const table = ARTIFACT_TABLES[stage];
        const rows = paperId
            ? this.raw
                  .prepare<[string], ArtifactRow>(`SELECT * FROM ${table} WHERE paper_id = ? ORDER BY sequence_index`)
                  .all(paperId)
            : this.raw
                  .prepare<[], ArtifactRow>(`SELECT * FROM ${table} ORDER BY paper_id, sequence_index`)
                  .all();

        return rows.map((row) => this.toRecord(stage, row));
    }

    count(stage: ArtifactStage, paperId?: string): number {
        const table = ARTIFACT_TABLES[stage];
        const row = paperId
            ? this.raw.prepare<[string], { count: number }>(`SELECT COUNT(*) as count FROM ${table} WHERE paper_id = ?`).get(paperId)
            : this.raw.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`).get();
        return row?.count ?? 0;
    }

    private references(stage: ArtifactStage, row: ArtifactRow): string[] {
        if (stage !== 'synthesis') return [row.paper_id];
        return this.raw
            .prepare<[string], { paper_id: string }>('SELECT paper_id FROM synthesis_refs WHERE artifact_id = ? ORDER BY position')
            .all(row.artifact_id)
            .map((ref) => ref.paper_id);
    }

    private toRecord<S extends ArtifactStage>(stage: S, row: ArtifactRow): ArtifactRecord<S> {
        // payload_json is only ever written by write() for the same stage
        const payload = JSON.parse(row.payload_json) as PayloadByStage[S];
        return {
            artifactId: row.artifact_id,
            stage,
            paperId: row.paper_id,
            sequenceIndex: row.sequence_index,
            payload,
            references: this.references(stage, row),
            generatorVersion: row.generator_version,
            generatedAt: row.generated_at,
            runId: row.run_id,
        };
    }
}
