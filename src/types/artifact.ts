import type { ArtifactStage } from './ledger.js';

/**
 * Health-economic fields the extraction task targets.
 */
export type EconomicField =
    | 'treatment'
    | 'comparator'
    | 'cost'
    | 'qaly'
    | 'icer'
    | 'perspective'
    | 'timeHorizon';

export type EconomicFields = Partial<Record<EconomicField, string>>;

export interface QueryPayload {
    task: 'data-extraction';
    window: {
        text: string;
        /** 1-based position of the sentence among the kept abstract sentences */
        sentenceIndex: number;
    };
    targetSchema: EconomicField[];
    fields: EconomicFields;
    abstractHash: string;
}

export interface StudyTable {
    id: string;
    headers: string[];
    rows: string[][];
}

export interface SynthesisMember {
    paperId: string;
    title: string | null;
    firstAuthor: string | null;
    year: string | null;
    fields: EconomicFields;
    /** Full-text tables with an author column and a date column */
    tables: StudyTable[];
}

export interface SynthesisPayload {
    task: 'evidence-synthesis';
    members: SynthesisMember[];
    /** Union of fields reported by at least one member, in schema order */
    targetSchema: EconomicField[];
}

export interface LabelPayload {
    task: 'section-labeling';
    snippet: string;
    candidates: string[];
    answer: string;
}

export interface PayloadByStage {
    query: QueryPayload;
    synthesis: SynthesisPayload;
    label: LabelPayload;
}

/**
 * Generator output before the orchestrator stamps identity and timestamps.
 */
export interface GeneratedArtifact<S extends ArtifactStage = ArtifactStage> {
    sequenceIndex: number;
    payload: PayloadByStage[S];
    /** Paper ids the artifact draws on */
    references: string[];
}

/**
 * ArtifactRecord — one row in a derived store.
 */
export interface ArtifactRecord<S extends ArtifactStage = ArtifactStage> {
    artifactId: string;
    stage: S;
    /** Anchor paper (the batch's first member for synthesis) */
    paperId: string;
    sequenceIndex: number;
    payload: PayloadByStage[S];
    references: string[];
    generatorVersion: string;
    generatedAt: string;
    runId: number | null;
}
