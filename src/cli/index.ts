#!/usr/bin/env node

import { Command } from 'commander';
import { resolveConfig, type CorpusConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { CorpusDatabase } from '../storage/database.js';
import { PipelineOrchestrator, type StageRunOptions, type StageRunSummary } from '../pipeline/orchestrator.js';
import { groupByMetadataField, readBatchesFile } from '../pipeline/grouping.js';
import { createGenerators } from '../generators/index.js';
import { readPayloadDirectory } from '../sources/pmc-payload.js';
import { exportArtifacts, isExportFormat, EXPORT_FORMATS } from '../exporters/export.js';
import { ARTIFACT_STAGES, isArtifactStage, type CorpusConfig, type LogLevel } from '../types/index.js';
import { VERSION } from '../version.js';

interface CommonOptions {
    db?: string;
    logLevel?: string;
    jsonLogs?: boolean;
}

interface IngestOptions extends CommonOptions {
    overwrite: boolean;
}

interface RunOptions extends CommonOptions {
    force: boolean;
    retryFailed: boolean;
    type?: string;
    groupBy?: string;
    batches?: string;
}

interface ExportOptions extends CommonOptions {
    format: string;
    out?: string;
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function parseLogLevel(value: string | undefined): LogLevel | undefined {
    return LOG_LEVELS.find((level) => level === value);
}

/**
 * Resolve configuration, initialize logging and open the database.
 */
async function setup(opts: CommonOptions, extra: CorpusConfigOverrides = {}): Promise<{ config: CorpusConfig; db: CorpusDatabase }> {
    if (opts.logLevel !== undefined && !parseLogLevel(opts.logLevel)) {
        throw new Error(`Invalid log level: ${opts.logLevel}. Valid: ${LOG_LEVELS.join(', ')}`);
    }

    const config = await resolveConfig({
        ...extra,
        db: opts.db,
        logLevel: parseLogLevel(opts.logLevel),
        jsonLogs: opts.jsonLogs,
    });
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

    return { config, db: new CorpusDatabase(config.db) };
}

function withCommonOptions(command: Command): Command {
    return command
        .option('--db <path>', 'Corpus database path (default ./hecorpus.db)')
        .option('--log-level <level>', 'Log level: debug | info | warn | error')
        .option('--json-logs', 'Output JSON logs');
}

function fail(message: string): never {
    console.error(message);
    process.exit(1);
}

function printSummary(summary: StageRunSummary): void {
    console.log(
        `  ${summary.stage.padEnd(9)} run ${summary.runId}: ${summary.done} done, ${summary.failed} failed, ` +
        `${summary.skipped} skipped${summary.cancelled ? ' (cancelled)' : ''}`
    );
    for (const failure of summary.failures) {
        console.log(`    ✗ ${failure.paperIds.join(', ')}: ${failure.error}`);
    }
    if (summary.held.length > 0) {
        console.log(`    held by another run, not processed: ${summary.held.join(', ')}`);
    }
}

function incomplete(summary: StageRunSummary): boolean {
    return summary.failed > 0 || summary.cancelled || summary.held.length > 0;
}

const program = new Command();

program
    .name('hecorpus')
    .description('Curate a health-economics benchmark corpus: index fetched papers and derive extraction, synthesis and labeling queries.')
    .version(VERSION);

// ─── INGEST command ───────────────────────────────────────

withCommonOptions(
    program
        .command('ingest')
        .description('Store and index a directory of fetched PMC payload files')
        .argument('<dir>', 'Directory of JSON payloads, one paper per file')
        .option('--overwrite', 'Replace stored papers whose content changed', false)
).action(async (dir: string, opts: IngestOptions) => {
    const { config, db } = await setup(opts);

    try {
        const orchestrator = new PipelineOrchestrator(db, {
            generators: createGenerators(config),
            staleLeaseMs: config.staleLeaseMs,
        });
        const summary = orchestrator.ingest(readPayloadDirectory(dir), { overwrite: opts.overwrite });

        console.log(
            `Ingested: ${summary.created} new, ${summary.overwritten} overwritten, ${summary.unchanged} unchanged, ` +
            `${summary.conflicts} conflicts, ${summary.indexFailed} with incomplete metadata`
        );
        for (const { externalId, error } of summary.errors) {
            console.log(`  ✗ ${externalId}: ${error}`);
        }
        if (summary.errors.length > 0) process.exitCode = 1;
    } catch (error) {
        getLogger().error({ error: errorMessage(error) }, 'Ingestion failed');
        process.exitCode = 1;
    } finally {
        db.close();
    }
});

// ─── RUN command ──────────────────────────────────────────

withCommonOptions(
    program
        .command('run')
        .description('Run one artifact stage, or all of them, over every entry not yet done')
        .argument('<stage>', `Stage: ${ARTIFACT_STAGES.join(' | ')} | all`)
        .option('--force', 'Regenerate entries already done, replacing their artifacts', false)
        .option('--retry-failed', 'Re-attempt entries that failed in an earlier run', false)
        .option('--type <type>', 'Only papers whose metadata type matches')
        .option('--group-by <field>', 'Metadata field that partitions synthesis batches')
        .option('--batches <file>', 'JSON file with an explicit synthesis partition')
).action(async (stage: string, opts: RunOptions) => {
    if (stage !== 'all' && !isArtifactStage(stage)) {
        fail(`Invalid stage: ${stage}. Valid: ${ARTIFACT_STAGES.join(', ')}, all`);
    }

    const { config, db } = await setup(opts, { synthesis: { groupBy: opts.groupBy } });
    const controller = new AbortController();
    const onSignal = () => {
        getLogger().warn('Interrupted, finishing the current entry');
        controller.abort();
    };
    process.once('SIGINT', onSignal);

    try {
        const orchestrator = new PipelineOrchestrator(db, {
            generators: createGenerators(config),
            staleLeaseMs: config.staleLeaseMs,
            grouper: groupByMetadataField(config.synthesis.groupBy),
            config,
        });
        const runOptions: StageRunOptions = {
            force: opts.force,
            retryFailed: opts.retryFailed,
            filter: opts.type ? { field: 'type', value: opts.type } : undefined,
            batches: opts.batches ? readBatchesFile(opts.batches) : undefined,
            signal: controller.signal,
        };

        console.log('');
        if (isArtifactStage(stage)) {
            const summary = await orchestrator.runStage(stage, runOptions);
            printSummary(summary);
            if (incomplete(summary)) process.exitCode = 1;
        } else {
            const { summaries, errors } = await orchestrator.runAll(runOptions);
            summaries.forEach(printSummary);
            for (const { stage: failedStage, error } of errors) {
                console.log(`  ${failedStage.padEnd(9)} aborted: ${error}`);
            }
            if (errors.length > 0 || summaries.some(incomplete)) process.exitCode = 1;
        }
        console.log('');
    } catch (error) {
        getLogger().error({ stage, error: errorMessage(error) }, 'Run failed');
        process.exitCode = 1;
    } finally {
        process.removeListener('SIGINT', onSignal);
        db.close();
    }
});

// ─── EXPORT command ───────────────────────────────────────

withCommonOptions(
    program
        .command('export')
        .description('Export one stage\'s artifacts to JSON or CSV')
        .argument('<stage>', `Stage: ${ARTIFACT_STAGES.join(' | ')}`)
        .option('-f, --format <format>', `Export format: ${EXPORT_FORMATS.join(' | ')}`, 'json')
        .option('-o, --out <path>', 'Output file path')
).action(async (stage: string, opts: ExportOptions) => {
    const format = opts.format.toLowerCase();
    if (!isArtifactStage(stage)) {
        fail(`Invalid stage: ${stage}. Valid: ${ARTIFACT_STAGES.join(', ')}`);
    }
    if (!isExportFormat(format)) {
        fail(`Invalid format: ${format}. Valid: ${EXPORT_FORMATS.join(', ')}`);
    }

    const config = await resolveConfig({ db: opts.db, logLevel: parseLogLevel(opts.logLevel), jsonLogs: opts.jsonLogs });
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    const outputPath = opts.out ?? `${stage}_artifacts.${format}`;

    try {
        const count = exportArtifacts(config.db, stage, outputPath, format);
        console.log(`Exported ${count} ${stage} artifacts to ${outputPath}`);
    } catch (error) {
        fail(`Export failed: ${errorMessage(error)}`);
    }
});

// ─── INSPECT command ──────────────────────────────────────

withCommonOptions(
    program
        .command('inspect')
        .description('Show corpus statistics and ledger status per stage')
).action(async (opts: CommonOptions) => {
    const { db } = await setup(opts);

    try {
        const stats = db.getStats();

        console.log('\n📊 Corpus Database Statistics\n');
        console.log(`  Papers:    ${stats.papers}`);
        console.log(`  Indexed:   ${stats.entries}`);
        console.log(`  Runs:      ${stats.runs}`);

        console.log('\n  Artifacts:');
        for (const stage of ARTIFACT_STAGES) {
            console.log(`    ${stage}: ${stats.artifacts[stage]}`);
        }

        if (Object.keys(stats.ledger).length > 0) {
            console.log('\n  Ledger:');
            for (const [stage, byStatus] of Object.entries(stats.ledger)) {
                const counts = Object.entries(byStatus ?? {}).map(([status, count]) => `${status} ${count}`).join(', ');
                console.log(`    ${stage}: ${counts}`);
            }
        }

        console.log('');
    } catch (error) {
        fail(`Inspect failed: ${errorMessage(error)}`);
    } finally {
        db.close();
    }
});

// ─── PURGE command ────────────────────────────────────────

withCommonOptions(
    program
        .command('purge')
        .description('Delete papers and their index entries (refused while artifacts reference them)')
        .argument('<ids...>', 'Paper ids or external ids')
).action(async (ids: string[], opts: CommonOptions) => {
    const { config, db } = await setup(opts);

    try {
        const orchestrator = new PipelineOrchestrator(db, { generators: createGenerators(config) });
        for (const id of ids) {
            const paperId = orchestrator.papers.findByExternalId(id)?.id ?? id;
            try {
                orchestrator.papers.purge(paperId);
                console.log(`Purged ${id}`);
            } catch (error) {
                console.log(`  ✗ ${id}: ${errorMessage(error)}`);
                process.exitCode = 1;
            }
        }
    } finally {
        db.close();
    }
});

program.parseAsync().catch((error: unknown) => {
    fail(errorMessage(error));
});
