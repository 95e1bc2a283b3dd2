import { writeFileSync } from 'node:fs';
import { CorpusDatabase } from '../storage/database.js';
import { ArtifactStore } from '../storage/artifact-store.js';
import type { ArtifactRecord, ArtifactStage } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

// ─── Types ───────────────────────────────────────────────

export type ExportFormat = 'json' | 'csv';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'csv'];

export const CSV_COLUMNS = ['artifact_id', 'paper_id', 'sequence_index', 'generator_version', 'generated_at', 'payload'] as const;

export function isExportFormat(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some((format) => format === value);
}

// ─── Main Export Function ────────────────────────────────

/**
 * Export one stage's artifacts from a corpus database.
 * Returns the number of records written.
 */
export function exportArtifacts(
    dbPath: string,
    stage: ArtifactStage,
    outputPath: string,
    format: ExportFormat
): number {
    const db = new CorpusDatabase(dbPath);

    try {
        const records = new ArtifactStore(db).list(stage);
        const content = format === 'json' ? exportJson(stage, records) : exportCsv(records);

        writeFileSync(outputPath, content, 'utf-8');
        getLogger().info({ stage, format, outputPath, records: records.length }, 'Artifacts exported');
        return records.length;
    } finally {
        db.close();
    }
}

// ─── Format Implementations ─────────────────────────────

export function exportJson(stage: ArtifactStage, records: ArtifactRecord[]): string {
    return JSON.stringify({
        hecorpus: {
            version: VERSION,
            stage,
            exported_at: new Date().toISOString(),
        },
        artifacts: records.map((r) => ({
            artifact_id: r.artifactId,
            paper_id: r.paperId,
            sequence_index: r.sequenceIndex,
            references: r.references,
            generator_version: r.generatorVersion,
            generated_at: r.generatedAt,
            run_id: r.runId,
            payload: r.payload,
        })),
    }, null, 2);
}

/**
 * Quote a CSV field when it holds a comma, quote or line break.
 */
export function csvField(value: string | number): string {
    const text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function exportCsv(records: ArtifactRecord[]): string {
    let csv = CSV_COLUMNS.join(',') + '\n';
    for (const r of records) {
        csv += [
            r.artifactId,
            r.paperId,
            r.sequenceIndex,
            r.generatorVersion,
            r.generatedAt,
            JSON.stringify(r.payload),
        ].map(csvField).join(',') + '\n';
    }
    return csv;
}
