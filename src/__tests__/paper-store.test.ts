import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PaperStore } from '../storage/paper-store.js';
import { IndexCatalog } from '../storage/index-catalog.js';
import { ArtifactStore } from '../storage/artifact-store.js';
import type { MetadataExtractor } from '../types/index.js';
import { ConflictError, NotFoundError } from '../utils/errors.js';
import { derivePaperId, sha256Hex } from '../utils/hash.js';
import { createTempDb, type TempDb } from './helpers.js';

const titleOnly: MetadataExtractor = (raw) => ({ title: raw, abstract: null, sourceMetadata: {} });

describe('CorpusDatabase', () => {
    let temp: TempDb;

    beforeEach(() => {
        temp = createTempDb();
    });

    afterEach(() => {
        temp.cleanup();
    });

    it('should create the corpus tables', () => {
        const tables = temp.db
            .getRawDb()
            .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
            .all()
            .map((t) => t.name);

        expect(tables).toEqual([
            'index_entries',
            'label_artifacts',
            'ledger',
            'papers',
            'query_artifacts',
            'runs',
            'synthesis_artifacts',
            'synthesis_refs',
        ]);
    });

    it('should set PRAGMA user_version = 2 and WAL mode', () => {
        const raw = temp.db.getRawDb();
        expect(raw.pragma('user_version', { simple: true })).toBe(2);
        expect(raw.pragma('journal_mode', { simple: true })).toBe('wal');
        expect(raw.pragma('foreign_keys', { simple: true })).toBe(1);
    });

    it('should record and finish runs', () => {
        const runId = temp.db.insertRun({
            created_at: '2024-01-01T00:00:00.000Z',
            hecorpus_version: '1.0.0',
            stage: 'query',
            config_json: '{}',
            stats_json: '{}',
        });
        temp.db.finishRun(runId, { done: 3 });

        const run = temp.db.getRun(runId);
        expect(run?.stage).toBe('query');
        expect(run?.finished_at).not.toBeNull();
        expect(JSON.parse(run?.stats_json ?? '{}')).toEqual({ done: 3 });
    });

    it('should roll back a failing transaction', () => {
        const papers = new PaperStore(temp.db);
        expect(() =>
            temp.db.transaction(() => {
                papers.put('PMC1', 'content');
                throw new Error('boom');
            })
        ).toThrow('boom');
        expect(papers.count()).toBe(0);
    });
});

describe('PaperStore', () => {
    let temp: TempDb;
    let papers: PaperStore;

    beforeEach(() => {
        temp = createTempDb();
        papers = new PaperStore(temp.db);
    });

    afterEach(() => {
        temp.cleanup();
    });

    it('should create a paper with a derived id and content hash', () => {
        const { record, outcome } = papers.put(' PMC123 ', 'raw payload');

        expect(outcome).toBe('created');
        expect(record.id).toBe(derivePaperId('PMC123'));
        expect(record.externalId).toBe('PMC123');
        expect(record.contentHash).toBe(sha256Hex('raw payload'));
        expect(papers.get(record.id)).toEqual(record);
    });

    it('should no-op on an identical re-fetch', () => {
        const first = papers.put('PMC123', 'raw payload');
        const second = papers.put('pmc123', 'raw payload');

        expect(second.outcome).toBe('unchanged');
        expect(second.record).toEqual(first.record);
        expect(papers.count()).toBe(1);
    });

    it('should refuse changed content without overwrite', () => {
        papers.put('PMC123', 'raw payload');

        expect(() => papers.put('PMC123', 'edited payload')).toThrow(ConflictError);
        expect(papers.get(derivePaperId('PMC123')).rawContent).toBe('raw payload');
    });

    it('should overwrite changed content when allowed', () => {
        papers.put('PMC123', 'raw payload');
        const { record, outcome } = papers.put('PMC123', 'edited payload', { overwrite: true });

        expect(outcome).toBe('overwritten');
        expect(record.rawContent).toBe('edited payload');
        expect(record.contentHash).toBe(sha256Hex('edited payload'));
        expect(papers.count()).toBe(1);
    });

    it('should keep identical content under two external ids as two papers', () => {
        const a = papers.put('PMC1', 'same content');
        const b = papers.put('PMC2', 'same content');

        expect(a.record.id).not.toBe(b.record.id);
        expect(papers.count()).toBe(2);
    });

    it('should find papers by any spelling of the external id', () => {
        const { record } = papers.put('PMC77', 'content');
        expect(papers.findByExternalId('77')).toEqual(record);
        expect(papers.findByExternalId('PMC78')).toBeUndefined();
    });

    it('should throw NotFoundError for an unknown id', () => {
        expect(() => papers.get('p_missing')).toThrow(NotFoundError);
        expect(() => papers.get('p_missing')).toThrow('Paper not found: p_missing');
    });

    describe('purge', () => {
        it('should delete the paper with its index entry and ledger', () => {
            const catalog = new IndexCatalog(temp.db);
            const { record } = papers.put('PMC5', 'content');
            catalog.index(record, titleOnly);

            papers.purge(record.id);

            expect(papers.count()).toBe(0);
            expect(catalog.find(record.id)).toBeUndefined();
            expect(temp.db.getStats().ledger).toEqual({});
        });

        it('should refuse while an artifact references the paper', () => {
            const catalog = new IndexCatalog(temp.db);
            const artifacts = new ArtifactStore(temp.db);
            const { record } = papers.put('PMC5', 'content');
            catalog.index(record, titleOnly);
            artifacts.write('label', [
                {
                    artifactId: 'label_test',
                    stage: 'label',
                    paperId: record.id,
                    sequenceIndex: 0,
                    payload: { task: 'section-labeling', snippet: 'x', candidates: ['A', 'B'], answer: 'A' },
                    references: [record.id],
                    generatorVersion: '1',
                    generatedAt: '2024-01-01T00:00:00.000Z',
                    runId: null,
                },
            ]);

            expect(() => papers.purge(record.id)).toThrow(ConflictError);
            expect(papers.count()).toBe(1);
        });

        it('should throw NotFoundError for an unknown paper', () => {
            expect(() => papers.purge('p_missing')).toThrow(NotFoundError);
        });
    });
});
