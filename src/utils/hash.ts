import { createHash } from 'node:crypto';
import { CorpusError } from './errors.js';

export function sha256Hex(text: string): string {
    return createHash('sha256').update(text).digest('hex');
}

/**
 * Normalize an external source identifier.
 * "PMC7654321", "pmc7654321" and "7654321" all map to "PMC7654321";
 * other identifiers are trimmed and lower-cased.
 */
export function normalizeExternalId(externalId: string): string {
    const trimmed = externalId.trim();
    const pmc = /^(?:pmc)?(\d+)$/i.exec(trimmed);
    if (pmc) return `PMC${pmc[1]}`;
    return trimmed.toLowerCase();
}

/**
 * Stable paper identifier: a prefix of the SHA-256 of the normalized external id.
 * Never depends on content or insertion order.
 */
export function derivePaperId(externalId: string): string {
    const normalized = normalizeExternalId(externalId);
    if (!normalized) {
        throw new CorpusError('External id must not be empty', { externalId });
    }
    return `p_${sha256Hex(normalized).slice(0, 16)}`;
}

/**
 * Stable artifact identifier for (paperId, stage, sequenceIndex).
 */
export function deriveArtifactId(paperId: string, stage: string, sequenceIndex: number): string {
    return `${stage}_${sha256Hex(`${paperId}\u0000${stage}\u0000${sequenceIndex}`).slice(0, 20)}`;
}

/**
 * Deterministic pseudo-shuffle: order items by the hash of `salt` plus each item's key.
 * Ties (identical keys) keep their input order.
 */
export function hashOrder<T>(items: readonly T[], salt: string, key: (item: T) => string): T[] {
    return items
        .map((item, index) => ({ item, index, rank: sha256Hex(`${salt}\u0000${key(item)}`) }))
        .sort((a, b) => (a.rank < b.rank ? -1 : a.rank > b.rank ? 1 : a.index - b.index))
        .map(({ item }) => item);
}
