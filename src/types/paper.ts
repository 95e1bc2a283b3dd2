/**
 * PaperRecord — one fetched paper as stored in the paper store.
 * Immutable once written; only an explicit overwrite replaces it.
 */
export interface PaperRecord {
    /** Stable identifier derived from the normalized external id */
    id: string;

    /** Identifier used by the fetch step (e.g., "PMC7654321") */
    externalId: string;

    /** Opaque payload exactly as fetched (PMC payload JSON for the default extractor) */
    rawContent: string;

    /** SHA-256 of rawContent, used to detect changed re-fetches */
    contentHash: string;

    /** ISO timestamp of the fetch that produced this content */
    fetchedAt: string;
}

/**
 * A fetched paper handed over by the fetch collaborator.
 */
export interface FetchedPaper {
    externalId: string;
    rawContent: string;
}

export type PutOutcome = 'created' | 'unchanged' | 'overwritten';

export interface PutResult {
    record: PaperRecord;
    outcome: PutOutcome;
}

/**
 * Structured fields pulled out of a paper's raw content.
 */
export interface ExtractedMetadata {
    title: string | null;
    abstract: string | null;
    /** Remaining scalar fields (first author, journal, year, type, ...) as strings */
    sourceMetadata: Record<string, string>;
}

/**
 * Pluggable capability mapping raw content to metadata.
 * Throws ExtractionError (carrying whatever was recovered) when required fields are missing.
 */
export type MetadataExtractor = (rawContent: string) => ExtractedMetadata;
