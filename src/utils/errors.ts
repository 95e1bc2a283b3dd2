/**
 * Base class for every failure the corpus pipeline reports.
 */
export class CorpusError extends Error {
    constructor(message: string, public readonly details?: Record<string, unknown>) {
        super(message);
        this.name = 'CorpusError';
    }
}

/**
 * Same identifier, different content, and no permission to overwrite.
 * Also raised when a purge would orphan artifacts.
 */
export class ConflictError extends CorpusError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, details);
        this.name = 'ConflictError';
    }
}

export class NotFoundError extends CorpusError {
    constructor(kind: 'paper' | 'index entry', id: string) {
        super(`${kind === 'paper' ? 'Paper' : 'Index entry'} not found: ${id}`, { kind, id });
        this.name = 'NotFoundError';
    }
}

/**
 * Metadata extraction could not populate the required fields.
 * `partial` holds whatever was recovered so the paper can still be indexed.
 */
export class ExtractionError extends CorpusError {
    constructor(
        message: string,
        public readonly partial: {
            title: string | null;
            abstract: string | null;
            sourceMetadata: Record<string, string>;
        },
        details?: Record<string, unknown>
    ) {
        super(message, details);
        this.name = 'ExtractionError';
    }
}

/**
 * A generator's preconditions were not met (missing abstract, too few sections, ...).
 */
export class GenerationError extends CorpusError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, details);
        this.name = 'GenerationError';
    }
}

/**
 * The ledger row was not in the state the caller expected when committing.
 */
export class LedgerWriteError extends CorpusError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, details);
        this.name = 'LedgerWriteError';
    }
}

/**
 * Render an unknown thrown value as a single message line.
 */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) return `${error.name}: ${error.message}`;
    return String(error);
}
