import type { GeneratedArtifact, QueryConfig } from '../types/index.js';
import type { GeneratorInput, PerPaperGenerator } from './types.js';
import { splitSentences } from '../nlp/sentences.js';
import { extractEconomicFields, schemaOf } from '../nlp/economic-fields.js';
import { GenerationError } from '../utils/errors.js';
import { sha256Hex } from '../utils/hash.js';

/**
 * Data-extraction queries: one record per abstract sentence that states at least one
 * health-economic field, pairing the fields found (the target schema) with the sentence.
 */
export class QueryGenerator implements PerPaperGenerator<'query'> {
    readonly stage = 'query' as const;

    constructor(
        readonly version: string,
        private readonly config: QueryConfig
    ) {}

    generate({ entry }: GeneratorInput): GeneratedArtifact<'query'>[] {
        if (!entry.abstract) {
            throw new GenerationError('Extraction queries need an abstract', { paperId: entry.paperId });
        }

        const abstractHash = sha256Hex(entry.abstract);
        const sentences = splitSentences(entry.abstract, this.config.minSentenceLength);
        const artifacts: GeneratedArtifact<'query'>[] = [];

        sentences.forEach((text, index) => {
            const fields = extractEconomicFields(text);
            const targetSchema = schemaOf(fields);
            if (targetSchema.length === 0) return;

            artifacts.push({
                sequenceIndex: artifacts.length,
                payload: {
                    task: 'data-extraction',
                    window: { text, sentenceIndex: index + 1 },
                    targetSchema,
                    fields,
                    abstractHash,
                },
                references: [entry.paperId],
            });
        });

        if (artifacts.length === 0) {
            throw new GenerationError('No abstract sentence states an extractable field', {
                paperId: entry.paperId,
                sentences: sentences.length,
            });
        }

        return artifacts;
    }
}
