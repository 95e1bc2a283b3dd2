import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { IndexEntry } from '../types/index.js';
import { derivePaperId } from '../utils/hash.js';

/**
 * Partition policy for evidence synthesis: candidate entries in, batches of paper ids out.
 * Which papers belong together is decided outside the pipeline; these policies only
 * apply a grouping that already exists in the metadata.
 */
export type BatchGrouper = (entries: IndexEntry[]) => string[][];

/**
 * One batch per distinct value of a metadata field, in order of first appearance.
 * Entries without the field become single-paper batches.
 */
export function groupByMetadataField(field: string): BatchGrouper {
    return (entries) => {
        const groups = new Map<string, string[]>();
        const batches: string[][] = [];

        for (const entry of entries) {
            const value = entry.sourceMetadata[field];
            if (value === undefined) {
                batches.push([entry.paperId]);
                continue;
            }

            let group = groups.get(value);
            if (!group) {
                group = [];
                groups.set(value, group);
                batches.push(group);
            }
            group.push(entry.paperId);
        }

        return batches;
    };
}

/**
 * Every entry on its own.
 */
export const singletonBatches: BatchGrouper = (entries) => entries.map((entry) => [entry.paperId]);

/**
 * Check a supplied partition: non-empty batches, no paper in two batches.
 */
export function validatePartition(batches: string[][]): string[][] {
    const seen = new Set<string>();
    for (const batch of batches) {
        if (batch.length === 0) {
            throw new Error('Synthesis batches must not be empty');
        }
        for (const paperId of batch) {
            if (seen.has(paperId)) {
                throw new Error(`Paper ${paperId} appears in more than one synthesis batch`);
            }
            seen.add(paperId);
        }
    }
    return batches;
}

const batchesFileSchema = z.array(z.array(z.string().min(1)));

/**
 * Read an explicit synthesis partition: a JSON array of arrays of paper ids or
 * external ids. External ids are mapped to their stable paper ids.
 */
export function readBatchesFile(path: string): string[][] {
    const parsed = batchesFileSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
    if (!parsed.success) {
        throw new Error(`Batches file ${path} must hold an array of arrays of ids`);
    }
    return validatePartition(parsed.data.map((batch) => batch.map(toPaperId)));
}

function toPaperId(id: string): string {
    return /^p_[0-9a-f]{16}$/.test(id) ? id : derivePaperId(id);
}
