/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Extraction-query generation settings.
 */
export interface QueryConfig {
    /** Sentences of this length or shorter are not used as windows */
    minSentenceLength: number;
}

/**
 * Section-labeling generation settings.
 */
export interface LabelConfig {
    snippetsPerPaper: number;
    distractors: number;
    minSections: number;
}

/**
 * Evidence-synthesis batching settings.
 */
export interface SynthesisConfig {
    /** Metadata field used to partition papers into batches */
    groupBy: string;
}

/**
 * Full configuration merged from CLI flags and config file.
 */
export interface CorpusConfig {
    // Storage
    db: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    // Ledger leases older than this are treated as abandoned by a crashed run
    staleLeaseMs: number;

    // Recorded on every artifact; bump when generator output changes
    generatorVersion: string;

    query: QueryConfig;
    label: LabelConfig;
    synthesis: SynthesisConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: CorpusConfig = {
    db: './hecorpus.db',
    logLevel: 'info',
    jsonLogs: false,
    staleLeaseMs: 10 * 60 * 1000,
    generatorVersion: '1',
    query: {
        minSentenceLength: 10,
    },
    label: {
        snippetsPerPaper: 2,
        distractors: 4,
        minSections: 5,
    },
    synthesis: {
        groupBy: 'type',
    },
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    finished_at: string | null;
    hecorpus_version: string;
    stage: string;
    config_json: string;
    stats_json: string;
}
