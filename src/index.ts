export * from './types/index.js';
export { CorpusDatabase, type CorpusStats } from './storage/database.js';
export { PaperStore } from './storage/paper-store.js';
export { IndexCatalog, type ClaimOptions } from './storage/index-catalog.js';
export { ArtifactStore, type WriteResult } from './storage/artifact-store.js';
export {
    PipelineOrchestrator,
    type OrchestratorOptions,
    type StageRunOptions,
    type StageRunSummary,
    type IngestSummary,
    type RunAllResult,
    type MetadataFilter,
} from './pipeline/orchestrator.js';
export { groupByMetadataField, singletonBatches, validatePartition, readBatchesFile, type BatchGrouper } from './pipeline/grouping.js';
export * from './generators/index.js';
export { extractPmcMetadata, readPmcPayload, readPayloadDirectory, pmcPayloadSchema, type PmcPayload } from './sources/pmc-payload.js';
export { exportArtifacts, type ExportFormat } from './exporters/export.js';
export { initLogger, getLogger } from './utils/logger.js';
export { resolveConfig, type CorpusConfigOverrides } from './utils/config.js';
export * from './utils/errors.js';
export { derivePaperId, deriveArtifactId, normalizeExternalId } from './utils/hash.js';
export { VERSION } from './version.js';
