import type { GeneratedArtifact, PaperRecord, StudyTable, SynthesisMember } from '../types/index.js';
import type { BatchGenerator, GeneratorInput } from './types.js';
import { splitSentences } from '../nlp/sentences.js';
import { extractEconomicFields, mergeFields, schemaOf } from '../nlp/economic-fields.js';
import { extractJatsTables, hasAuthorAndDate } from '../nlp/jats-tables.js';
import { readPmcPayload } from '../sources/pmc-payload.js';
import { GenerationError } from '../utils/errors.js';

/**
 * Pulls the tables of a paper. Pluggable; the default reads the JATS full text carried
 * in a PMC payload and yields nothing when there is none.
 */
export type TableSource = (paper: PaperRecord) => StudyTable[];

export const pmcTableSource: TableSource = (paper) => {
    const fullText = readPmcPayload(paper.rawContent)?.full_text;
    return fullText ? extractJatsTables(fullText) : [];
};

/**
 * Evidence-synthesis queries: one record per batch, anchored on the first member and
 * referencing every member, listing what each paper reports.
 *
 * Each member also carries its study-characteristics tables (those with both an author
 * and a date column); other tables are dropped.
 */
export class EvidenceSynthesisGenerator implements BatchGenerator {
    readonly stage = 'synthesis' as const;

    constructor(
        readonly version: string,
        private readonly tables: TableSource = pmcTableSource
    ) {}

    generate(batch: GeneratorInput[]): GeneratedArtifact<'synthesis'>[] {
        if (batch.length === 0) {
            throw new GenerationError('Synthesis batch is empty');
        }

        const missing = batch.filter(({ entry }) => !entry.abstract).map(({ entry }) => entry.paperId);
        if (missing.length > 0) {
            throw new GenerationError('Every paper in a synthesis batch needs an abstract', { missing });
        }

        const members: SynthesisMember[] = batch.map(({ entry, paper }) => ({
            paperId: entry.paperId,
            title: entry.title,
            firstAuthor: entry.sourceMetadata['first_author'] ?? null,
            year: entry.sourceMetadata['year'] ?? null,
            fields: mergeFields(splitSentences(entry.abstract ?? '').map(extractEconomicFields)),
            tables: this.tables(paper).filter((table) => hasAuthorAndDate(table.headers)),
        }));

        return [
            {
                sequenceIndex: 0,
                payload: {
                    task: 'evidence-synthesis',
                    members,
                    targetSchema: schemaOf(mergeFields(members.map((member) => member.fields))),
                },
                references: members.map((member) => member.paperId),
            },
        ];
    }
}
