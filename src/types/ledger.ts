/**
 * Stages that write to an artifact store.
 */
export const ARTIFACT_STAGES = ['query', 'synthesis', 'label'] as const;

export type ArtifactStage = (typeof ARTIFACT_STAGES)[number];

/**
 * Ledger stages: the artifact stages plus the catalog's own indexing step.
 */
export type LedgerStage = ArtifactStage | 'indexing';

export type LedgerStatus = 'pending' | 'running' | 'done' | 'failed';

export interface LedgerRecord {
    status: LedgerStatus;
    /** Number of claims taken for this (paper, stage) */
    attempts: number;
    /** Last failure message, cleared on success */
    error: string | null;
    /** Lease owner while running (e.g., "run-12") */
    owner: string | null;
    updatedAt: string;
}

export type Ledger = Partial<Record<LedgerStage, LedgerRecord>>;

/**
 * IndexEntry — one row of the metadata index plus its processing ledger.
 */
export interface IndexEntry {
    paperId: string;
    title: string | null;
    abstract: string | null;
    sourceMetadata: Record<string, string>;
    ledger: Ledger;
    indexedAt: string;
    updatedAt: string;
}

export function isArtifactStage(value: string): value is ArtifactStage {
    return (ARTIFACT_STAGES as readonly string[]).includes(value);
}
