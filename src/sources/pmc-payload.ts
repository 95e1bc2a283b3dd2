import { readdirSync, readFileSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import { z } from 'zod';
import type { ExtractedMetadata, FetchedPaper, MetadataExtractor } from '../types/index.js';
import { ExtractionError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Paper payload as written by the PMC fetch step: article details plus the JATS full text.
 * Unknown keys are kept and end up in the entry's source metadata.
 */
export const pmcPayloadSchema = z
    .object({
        pmcid: z.union([z.string(), z.number()]).nullish(),
        title: z.string().nullish(),
        abstract: z.string().nullish(),
        first_author: z.string().nullish(),
        source: z.string().nullish(),
        year: z.union([z.string(), z.number()]).nullish(),
        type: z.string().nullish(),
        full_text: z.string().nullish(),
    })
    .passthrough();

export type PmcPayload = z.infer<typeof pmcPayloadSchema>;

/** Payload keys that become IndexEntry fields (or stay in the paper store) instead of source metadata */
const NON_METADATA_KEYS = new Set(['title', 'abstract', 'full_text']);

const EMPTY_METADATA: ExtractedMetadata = { title: null, abstract: null, sourceMetadata: {} };

function cleanText(value: string | null | undefined): string | null {
    if (!value) return null;
    return value.replace(/\s+/g, ' ').trim() || null;
}

/**
 * Parse raw content as a PMC payload, or null when it is not one.
 */
export function readPmcPayload(rawContent: string): PmcPayload | null {
    try {
        const parsed = pmcPayloadSchema.safeParse(JSON.parse(rawContent));
        return parsed.success ? parsed.data : null;
    } catch {
        return null;
    }
}

/**
 * Default metadata extractor for PMC payloads. `title` is required.
 */
export const extractPmcMetadata: MetadataExtractor = (rawContent) => {
    let json: unknown;
    try {
        json = JSON.parse(rawContent);
    } catch (error) {
        throw new ExtractionError('Payload is not valid JSON', EMPTY_METADATA, { cause: errorMessage(error) });
    }

    const parsed = pmcPayloadSchema.safeParse(json);
    if (!parsed.success) {
        throw new ExtractionError('Payload does not match the PMC payload shape', EMPTY_METADATA, {
            issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
    }

    const payload = parsed.data;
    const sourceMetadata: Record<string, string> = {};
    for (const [key, value] of Object.entries(payload)) {
        if (NON_METADATA_KEYS.has(key)) continue;
        if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') continue;
        const text = String(value).trim();
        if (text) sourceMetadata[key] = key === 'type' ? text.toLowerCase() : text;
    }

    const metadata: ExtractedMetadata = {
        title: cleanText(payload.title),
        abstract: cleanText(payload.abstract),
        sourceMetadata,
    };

    if (!metadata.title) {
        throw new ExtractionError('Payload has no title', metadata);
    }

    return metadata;
};

/**
 * Read the fetch step's output directory: one JSON payload per paper.
 * The external id is the payload's pmcid, falling back to the file name stem.
 * Files are read in name order so ingestion order is reproducible.
 */
export function readPayloadDirectory(dir: string): FetchedPaper[] {
    const files = readdirSync(dir)
        .filter((name) => extname(name).toLowerCase() === '.json')
        .sort();

    const papers: FetchedPaper[] = [];
    for (const name of files) {
        const rawContent = readFileSync(join(dir, name), 'utf-8');
        const pmcid = readPmcPayload(rawContent)?.pmcid;
        const externalId = pmcid !== undefined && pmcid !== null && String(pmcid).trim()
            ? String(pmcid).trim()
            : basename(name, extname(name));
        papers.push({ externalId, rawContent });
    }

    getLogger().debug({ dir, files: papers.length }, 'Payload directory read');
    return papers;
}
