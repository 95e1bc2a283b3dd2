import type { GeneratedArtifact, IndexEntry, PaperRecord } from '../types/index.js';

/**
 * What a generator sees for one paper: its index entry and stored raw content.
 */
export interface GeneratorInput {
    entry: IndexEntry;
    paper: PaperRecord;
}

/**
 * One paper in, zero or more records out.
 * Throws GenerationError when the paper lacks what the stage needs.
 */
export interface PerPaperGenerator<S extends 'query' | 'label'> {
    readonly stage: S;
    readonly version: string;
    generate(input: GeneratorInput): GeneratedArtifact<S>[];
}

/**
 * A pre-grouped batch of papers in, one synthesis record out.
 */
export interface BatchGenerator {
    readonly stage: 'synthesis';
    readonly version: string;
    generate(batch: GeneratorInput[]): GeneratedArtifact<'synthesis'>[];
}

/**
 * Closed set of generator variants, discriminated by `stage`.
 */
export type ArtifactGenerator = PerPaperGenerator<'query'> | BatchGenerator | PerPaperGenerator<'label'>;

/**
 * One generator per stage; the orchestrator dispatches on the stage name.
 */
export interface GeneratorSet {
    query: PerPaperGenerator<'query'>;
    synthesis: BatchGenerator;
    label: PerPaperGenerator<'label'>;
}
