import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type pino from 'pino';
import type {
    ArtifactRecord,
    ArtifactStage,
    FetchedPaper,
    GeneratedArtifact,
    IndexEntry,
    MetadataExtractor,
} from '../types/index.js';
import { ARTIFACT_STAGES, DEFAULT_CONFIG } from '../types/index.js';
import type { GeneratorInput, GeneratorSet } from '../generators/index.js';
import type { CorpusDatabase } from '../storage/database.js';
import { PaperStore } from '../storage/paper-store.js';
import { IndexCatalog } from '../storage/index-catalog.js';
import { ArtifactStore } from '../storage/artifact-store.js';
import { extractPmcMetadata } from '../sources/pmc-payload.js';
import { groupByMetadataField, validatePartition, type BatchGrouper } from './grouping.js';
import { ConflictError, GenerationError, LedgerWriteError, errorMessage } from '../utils/errors.js';
import { deriveArtifactId } from '../utils/hash.js';
import { getLogger, getRunLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

export interface OrchestratorOptions {
    generators: GeneratorSet;
    /** Defaults to the PMC payload extractor */
    extractor?: MetadataExtractor;
    /** Leases older than this are reclaimed from crashed runs */
    staleLeaseMs?: number;
    /** Synthesis partition policy when no explicit batches are given */
    grouper?: BatchGrouper;
    /** Recorded in the runs table */
    config?: object;
}

export interface MetadataFilter {
    field: string;
    value: string;
}

export interface StageRunOptions {
    /** Regenerate entries already done, replacing their artifacts */
    force?: boolean;
    /** Re-attempt entries that failed in an earlier run */
    retryFailed?: boolean;
    /** Only entries whose source metadata field equals the value (e.g., type = slr_cem) */
    filter?: MetadataFilter;
    /** Explicit synthesis partition (paper ids); overrides the grouper */
    batches?: string[][];
    signal?: AbortSignal;
}

export interface UnitFailure {
    paperIds: string[];
    error: string;
}

export interface StageRunSummary {
    runId: number;
    stage: ArtifactStage;
    /** Units (papers, or batches for synthesis) claimed and attempted */
    considered: number;
    done: number;
    failed: number;
    /** Units not claimable: failed without retry, or held by another live run */
    skipped: number;
    /** Papers skipped because another run's lease on them is not yet stale */
    held: string[];
    cancelled: boolean;
    allFailed: boolean;
    failures: UnitFailure[];
}

export interface IngestSummary {
    created: number;
    unchanged: number;
    overwritten: number;
    conflicts: number;
    indexFailed: number;
    errors: Array<{ externalId: string; error: string }>;
}

export interface RunAllResult {
    summaries: StageRunSummary[];
    errors: Array<{ stage: ArtifactStage; error: string }>;
}

function matchesFilter(entry: IndexEntry, filter: MetadataFilter | undefined): boolean {
    if (!filter) return true;
    return entry.sourceMetadata[filter.field]?.toLowerCase() === filter.value.trim().toLowerCase();
}

/**
 * Drives paper store → index catalog → the three artifact stages.
 *
 * Per (paper, stage): pending → running → done | failed. The running claim is committed
 * before generation starts; done/failed is committed in the same transaction as the
 * artifact write (or its absence), so a crash leaves either nothing or a complete unit.
 * Stages are independent: one stage failing never blocks another.
 */
export class PipelineOrchestrator {
    readonly papers: PaperStore;
    readonly catalog: IndexCatalog;
    readonly artifacts: ArtifactStore;

    private readonly extractor: MetadataExtractor;
    private readonly staleLeaseMs: number;
    private readonly grouper: BatchGrouper;

    constructor(
        private readonly db: CorpusDatabase,
        private readonly options: OrchestratorOptions
    ) {
        this.papers = new PaperStore(db);
        this.catalog = new IndexCatalog(db);
        this.artifacts = new ArtifactStore(db);
        this.extractor = options.extractor ?? extractPmcMetadata;
        this.staleLeaseMs = options.staleLeaseMs ?? DEFAULT_CONFIG.staleLeaseMs;
        this.grouper = options.grouper ?? groupByMetadataField(DEFAULT_CONFIG.synthesis.groupBy);
    }

    // ─── Ingestion ────────────────────────────────────────────

    /**
     * Store and index fetched papers. The paper row and its index entry are written in
     * one transaction, so neither exists without the other.
     */
    ingest(papers: FetchedPaper[], options: { overwrite?: boolean } = {}): IngestSummary {
        const summary: IngestSummary = { created: 0, unchanged: 0, overwritten: 0, conflicts: 0, indexFailed: 0, errors: [] };

        for (const { externalId, rawContent } of papers) {
            try {
                const { outcome, entry } = this.db.transaction(() => {
                    const { record, outcome } = this.papers.put(externalId, rawContent, options);
                    const existing = outcome === 'unchanged' ? this.catalog.find(record.id) : undefined;
                    if (existing) return { outcome, entry: existing };

                    // a changed paper reopens its stages; its synthesis batch is regrouped with it
                    const entry = this.catalog.index(record, this.extractor);
                    if (outcome === 'overwritten') {
                        for (const peer of this.artifacts.synthesisPeers(record.id)) this.catalog.reopen(peer, 'synthesis');
                    }
                    return { outcome, entry };
                });

                summary[outcome]++;
                if (outcome !== 'unchanged' && entry.ledger.indexing?.status === 'failed') {
                    summary.indexFailed++;
                }
            } catch (error) {
                if (error instanceof ConflictError) {
                    summary.conflicts++;
                } else {
                    getLogger().warn({ externalId, error: errorMessage(error) }, 'Failed to ingest paper');
                }
                summary.errors.push({ externalId, error: errorMessage(error) });
            }
        }

        getLogger().info(
            {
                created: summary.created,
                unchanged: summary.unchanged,
                overwritten: summary.overwritten,
                conflicts: summary.conflicts,
                indexFailed: summary.indexFailed,
            },
            'Ingestion complete'
        );
        return summary;
    }

    // ─── Stages ───────────────────────────────────────────────

    /**
     * Run one stage over every entry not yet done for it.
     */
    async runStage(stage: ArtifactStage, options: StageRunOptions = {}): Promise<StageRunSummary> {
        const runId = this.db.insertRun({
            created_at: new Date().toISOString(),
            hecorpus_version: VERSION,
            stage,
            config_json: JSON.stringify({
                force: options.force ?? false,
                retryFailed: options.retryFailed ?? false,
                filter: options.filter ?? null,
                batches: options.batches?.length ?? null,
                config: this.options.config ?? null,
            }),
            stats_json: '{}',
        });
        const log = getRunLogger(stage, runId);
        const summary: StageRunSummary = {
            runId,
            stage,
            considered: 0,
            done: 0,
            failed: 0,
            skipped: 0,
            held: [],
            cancelled: false,
            allFailed: false,
            failures: [],
        };

        log.info({ force: options.force ?? false, retryFailed: options.retryFailed ?? false, filter: options.filter }, 'Stage started');
        const startTime = Date.now();

        try {
            if (stage === 'synthesis') {
                await this.runBatches(runId, options, summary, log);
            } else {
                await this.runPerPaper(stage, runId, options, summary, log);
            }
        } finally {
            summary.allFailed = summary.considered > 0 && summary.failed === summary.considered;
            this.db.finishRun(runId, summary);
        }

        if (summary.held.length > 0) {
            log.warn({ paperIds: summary.held, staleLeaseMs: this.staleLeaseMs }, 'Entries held by another run were not processed');
        }

        const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
        log.info(
            { considered: summary.considered, done: summary.done, failed: summary.failed, skipped: summary.skipped, elapsed: `${elapsed}s` },
            summary.cancelled ? 'Stage cancelled' : 'Stage complete'
        );
        return summary;
    }

    /**
     * Run all three stages in turn. A stage that throws is reported and the rest still run.
     */
    async runAll(options: StageRunOptions = {}): Promise<RunAllResult> {
        const result: RunAllResult = { summaries: [], errors: [] };

        for (const stage of ARTIFACT_STAGES) {
            if (options.signal?.aborted) break;
            try {
                result.summaries.push(await this.runStage(stage, options));
            } catch (error) {
                getLogger().error({ stage, error: errorMessage(error) }, 'Stage aborted');
                result.errors.push({ stage, error: errorMessage(error) });
            }
        }

        return result;
    }

    // ─── Internal helpers ─────────────────────────────────────

    private claimOptions(options: StageRunOptions) {
        return {
            retryFailed: options.retryFailed ?? false,
            force: options.force ?? false,
            staleBefore: new Date(Date.now() - this.staleLeaseMs).toISOString(),
        };
    }

    private candidates(stage: ArtifactStage, options: StageRunOptions): Iterable<IndexEntry> {
        return options.force ? this.catalog.entries() : this.catalog.pendingFor(stage);
    }

    private async runPerPaper(
        stage: 'query' | 'label',
        runId: number,
        options: StageRunOptions,
        summary: StageRunSummary,
        log: pino.Logger
    ): Promise<void> {
        const owner = `run-${runId}`;
        const claimOptions = this.claimOptions(options);

        for (const entry of this.candidates(stage, options)) {
            if (options.signal?.aborted) {
                summary.cancelled = true;
                break;
            }
            if (!matchesFilter(entry, options.filter)) continue;

            if (!this.catalog.claim(entry.paperId, stage, owner, claimOptions)) {
                this.skip(stage, [entry.paperId], summary, log);
                continue;
            }

            summary.considered++;
            this.processUnit(stage, [entry], [entry.paperId], runId, options.force ?? false, summary, log);
            await yieldToEventLoop();
        }
    }

    private async runBatches(
        runId: number,
        options: StageRunOptions,
        summary: StageRunSummary,
        log: pino.Logger
    ): Promise<void> {
        const owner = `run-${runId}`;
        const claimOptions = this.claimOptions(options);

        const partition = options.batches
            ? validatePartition(options.batches)
            : this.grouper([...this.candidates('synthesis', options)].filter((entry) => matchesFilter(entry, options.filter)));

        for (const batch of partition) {
            if (options.signal?.aborted) {
                summary.cancelled = true;
                break;
            }

            const entries: IndexEntry[] = [];
            const missing: string[] = [];
            for (const paperId of batch) {
                const entry = this.catalog.find(paperId);
                if (entry) entries.push(entry);
                else missing.push(paperId);
            }

            if (missing.length > 0) {
                summary.considered++;
                summary.failed++;
                summary.failures.push({ paperIds: batch, error: `Unknown papers in batch: ${missing.join(', ')}` });
                log.warn({ batch, missing }, 'Synthesis batch references unknown papers');
                continue;
            }

            const open = entries.filter((entry) => options.force || this.catalog.statusOf(entry.paperId, 'synthesis') !== 'done');
            if (open.length === 0) continue;

            const claimed: string[] = [];
            const refused: string[] = [];
            for (const entry of open) {
                if (refused.length === 0 && this.catalog.claim(entry.paperId, 'synthesis', owner, claimOptions)) {
                    claimed.push(entry.paperId);
                } else {
                    refused.push(entry.paperId);
                }
            }

            if (refused.length > 0) {
                for (const paperId of claimed) this.catalog.release(paperId, 'synthesis', owner);
                this.skip('synthesis', refused, summary, log);
                continue;
            }

            summary.considered++;
            this.processUnit('synthesis', entries, claimed, runId, options.force ?? false, summary, log);
            await yieldToEventLoop();
        }
    }

    /**
     * Count a unit that could not be claimed. Members still running under another
     * run's fresh lease are recorded as held.
     */
    private skip(stage: ArtifactStage, paperIds: string[], summary: StageRunSummary, log: pino.Logger): void {
        summary.skipped++;
        for (const paperId of paperIds) {
            const status = this.catalog.statusOf(paperId, stage);
            if (status === 'running') summary.held.push(paperId);
            log.debug({ paperId, status }, 'Entry not claimable');
        }
    }

    /**
     * Generate and commit one unit. `entries` are the generator's inputs; `claimed` are the
     * ledger rows this run holds and must resolve to done or failed.
     *
     * Existing records at the anchor are replaced. For synthesis, every earlier record over
     * any member is removed first, and members those records leave behind go back to pending.
     */
    private processUnit(
        stage: ArtifactStage,
        entries: IndexEntry[],
        claimed: string[],
        runId: number,
        force: boolean,
        summary: StageRunSummary,
        log: pino.Logger
    ): void {
        const owner = `run-${runId}`;
        const anchor = entries[0]?.paperId;
        const paperIds = entries.map((entry) => entry.paperId);

        let generated: GeneratedArtifact[];
        try {
            if (!anchor) throw new GenerationError('Nothing to generate from');
            const inputs: GeneratorInput[] = entries.map((entry) => ({ entry, paper: this.papers.get(entry.paperId) }));
            generated = this.generate(stage, inputs);
            generated.forEach((artifact, index) => {
                if (artifact.sequenceIndex !== index) {
                    throw new GenerationError('Generator returned out-of-order sequence indices', {
                        expected: index,
                        received: artifact.sequenceIndex,
                    });
                }
            });
        } catch (error) {
            this.failUnit(stage, claimed, owner, error, summary, paperIds, log);
            return;
        }

        const generatedAt = new Date().toISOString();
        const version = this.options.generators[stage].version;
        const records: ArtifactRecord[] = generated.map((artifact) => ({
            artifactId: deriveArtifactId(anchor, stage, artifact.sequenceIndex),
            stage,
            paperId: anchor,
            sequenceIndex: artifact.sequenceIndex,
            payload: artifact.payload,
            references: artifact.references,
            generatorVersion: version,
            generatedAt,
            runId,
        }));

        try {
            const { written, reopened } = this.db.transaction(() => {
                let dropped: string[] = [];
                if (stage === 'synthesis') {
                    const { orphaned } = this.artifacts.supersedeSynthesis(paperIds);
                    dropped = orphaned.filter((paperId) => this.catalog.reopen(paperId, 'synthesis'));
                }
                const replace = force || this.artifacts.count(stage, anchor) > 0;
                const result = this.artifacts.write(stage, records, { force: replace });
                for (const paperId of claimed) this.catalog.complete(paperId, stage, owner);
                return { written: result, reopened: dropped };
            });
            summary.done++;
            if (reopened.length > 0) {
                log.info({ paperIds, reopened }, 'Members left out of the new batch are pending again');
            }
            log.debug({ paperIds, artifacts: records.length, ...written }, 'Unit committed');
        } catch (error) {
            log.error({ paperIds, error: errorMessage(error) }, 'Commit failed, unit rolled back');
            this.failUnit(stage, claimed, owner, error, summary, paperIds, log);
        }
    }

    private generate(stage: ArtifactStage, inputs: GeneratorInput[]): GeneratedArtifact[] {
        const { generators } = this.options;
        switch (stage) {
            case 'query':
                return generators.query.generate(this.single(inputs));
            case 'label':
                return generators.label.generate(this.single(inputs));
            case 'synthesis':
                return generators.synthesis.generate(inputs);
        }
    }

    private single(inputs: GeneratorInput[]): GeneratorInput {
        const [input] = inputs;
        if (!input || inputs.length !== 1) {
            throw new Error(`Per-paper generators take exactly one paper, got ${inputs.length}`);
        }
        return input;
    }

    /**
     * Record a unit as failed. A row whose lease was taken over by another run is left to
     * that run; the failure still counts in this run's summary.
     */
    private failUnit(
        stage: ArtifactStage,
        claimed: string[],
        owner: string,
        error: unknown,
        summary: StageRunSummary,
        paperIds: string[],
        log: pino.Logger
    ): void {
        const message = errorMessage(error);
        summary.failed++;
        summary.failures.push({ paperIds, error: message });
        log.warn({ paperIds, error: message }, 'Unit failed');

        for (const paperId of claimed) {
            try {
                this.catalog.fail(paperId, stage, owner, message);
            } catch (ledgerError) {
                if (!(ledgerError instanceof LedgerWriteError)) throw ledgerError;
                log.warn({ paperId, error: ledgerError.message }, 'Lease lost before failure could be recorded');
            }
        }
    }
}
