/**
 * Barrel export for all shared types.
 */
export type {
    PaperRecord,
    FetchedPaper,
    PutOutcome,
    PutResult,
    ExtractedMetadata,
    MetadataExtractor,
} from './paper.js';
export { ARTIFACT_STAGES, isArtifactStage } from './ledger.js';
export type {
    ArtifactStage,
    LedgerStage,
    LedgerStatus,
    LedgerRecord,
    Ledger,
    IndexEntry,
} from './ledger.js';
export type {
    EconomicField,
    EconomicFields,
    QueryPayload,
    StudyTable,
    SynthesisMember,
    SynthesisPayload,
    LabelPayload,
    PayloadByStage,
    GeneratedArtifact,
    ArtifactRecord,
} from './artifact.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    CorpusConfig,
    LogLevel,
    QueryConfig,
    LabelConfig,
    SynthesisConfig,
    RunRecord,
} from './config.js';
