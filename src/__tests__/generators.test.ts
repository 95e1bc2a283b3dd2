import { describe, it, expect } from 'vitest';
import { QueryGenerator } from '../generators/query-generator.js';
import { EvidenceSynthesisGenerator } from '../generators/synthesis-generator.js';
import { LabelGenerator, pmcFullTextSegmenter, type SnippetSegmenter } from '../generators/label-generator.js';
import { createGenerators } from '../generators/index.js';
import { segmentJats } from '../nlp/jats-sections.js';
import { DEFAULT_CONFIG, type IndexEntry, type PaperRecord } from '../types/index.js';
import type { GeneratorInput } from '../generators/types.js';
import { GenerationError } from '../utils/errors.js';
import { sha256Hex } from '../utils/hash.js';
import { SCENARIO_ABSTRACT, SECTION_TITLES, STUDY_TABLES, jatsDocument, pmcPayload } from './helpers.js';

function input(paperId: string, overrides: Partial<IndexEntry> = {}, rawContent = pmcPayload('PMC1')): GeneratorInput {
    const entry: IndexEntry = {
        paperId,
        title: `Title ${paperId}`,
        abstract: SCENARIO_ABSTRACT,
        sourceMetadata: {},
        ledger: {},
        indexedAt: '2024-01-01T00:00:00.000Z',
        updatedAt: '2024-01-01T00:00:00.000Z',
        ...overrides,
    };
    const paper: PaperRecord = {
        id: paperId,
        externalId: paperId,
        rawContent,
        contentHash: sha256Hex(rawContent),
        fetchedAt: '2024-01-01T00:00:00.000Z',
    };
    return { entry, paper };
}

describe('QueryGenerator', () => {
    const generator = new QueryGenerator('1', DEFAULT_CONFIG.query);

    it('should emit one record for a single-claim abstract', () => {
        const records = generator.generate(input('p_a'));

        expect(records).toEqual([
            {
                sequenceIndex: 0,
                payload: {
                    task: 'data-extraction',
                    window: { text: SCENARIO_ABSTRACT, sentenceIndex: 1 },
                    targetSchema: ['treatment', 'cost', 'qaly'],
                    fields: { treatment: 'Drug X', cost: '$500', qaly: '0.2' },
                    abstractHash: sha256Hex(SCENARIO_ABSTRACT),
                },
                references: ['p_a'],
            },
        ]);
    });

    it('should skip sentences without fields but keep their position', () => {
        const abstract = `Background matters here. ${SCENARIO_ABSTRACT}.`;
        const records = generator.generate(input('p_a', { abstract }));

        expect(records).toHaveLength(1);
        expect(records[0]?.sequenceIndex).toBe(0);
        expect(records[0]?.payload.window).toEqual({ text: `${SCENARIO_ABSTRACT}.`, sentenceIndex: 2 });
    });

    it('should be deterministic', () => {
        expect(generator.generate(input('p_a'))).toEqual(generator.generate(input('p_a')));
    });

    it('should require an abstract', () => {
        expect(() => generator.generate(input('p_a', { abstract: null }))).toThrow('Extraction queries need an abstract');
    });

    it('should fail when no sentence states a field', () => {
        expect(() => generator.generate(input('p_a', { abstract: 'Background matters here.' }))).toThrow(GenerationError);
    });
});

describe('EvidenceSynthesisGenerator', () => {
    const generator = new EvidenceSynthesisGenerator('1');

    it('should emit one record referencing every member', () => {
        const records = generator.generate([
            input('p_1', { sourceMetadata: { first_author: 'Tester', year: '2020' } }),
            input('p_2', { abstract: 'Screening versus No Screening was studied over a 5-year horizon.' }),
        ]);

        expect(records).toHaveLength(1);
        const [record] = records;
        expect(record?.sequenceIndex).toBe(0);
        expect(record?.references).toEqual(['p_1', 'p_2']);
        expect(record?.payload.members).toEqual([
            {
                paperId: 'p_1',
                title: 'Title p_1',
                firstAuthor: 'Tester',
                year: '2020',
                fields: { treatment: 'Drug X', cost: '$500', qaly: '0.2' },
                tables: [],
            },
            {
                paperId: 'p_2',
                title: 'Title p_2',
                firstAuthor: null,
                year: null,
                fields: { comparator: 'No Screening', timeHorizon: '5-year' },
                tables: [],
            },
        ]);
        expect(record?.payload.targetSchema).toEqual(['treatment', 'comparator', 'cost', 'qaly', 'timeHorizon']);
    });

    it('should keep only the tables with author and date columns', () => {
        const rawContent = pmcPayload('PMC1', { full_text: jatsDocument(SECTION_TITLES, STUDY_TABLES) });
        const [record] = generator.generate([input('p_1', {}, rawContent), input('p_2', {}, pmcPayload('PMC2', { full_text: null }))]);

        expect(record?.payload.members.map((member) => member.tables)).toEqual([
            [
                {
                    id: 'Table_1',
                    headers: ['First Author', 'Publication year', 'Country'],
                    rows: [
                        ['Tester', '2019', 'Testland'],
                        ['Other', '2020', 'Elsewhere'],
                    ],
                },
            ],
            [],
        ]);
    });

    it('should take tables from the given source', () => {
        const source = (paper: PaperRecord) => [{ id: paper.id, headers: ['Author', 'Year'], rows: [] }];
        const [record] = new EvidenceSynthesisGenerator('1', source).generate([input('p_1')]);

        expect(record?.payload.members[0]?.tables).toEqual([{ id: 'p_1', headers: ['Author', 'Year'], rows: [] }]);
    });

    it('should reject an empty batch', () => {
        expect(() => generator.generate([])).toThrow('Synthesis batch is empty');
    });

    it('should reject a batch with a member lacking an abstract', () => {
        expect(() => generator.generate([input('p_1'), input('p_2', { abstract: null })])).toThrow(GenerationError);
    });
});

describe('LabelGenerator', () => {
    const generator = new LabelGenerator('1', DEFAULT_CONFIG.label);

    it('should emit labeling queries whose answer is among the candidates', () => {
        const records = generator.generate(input('p_a'));

        expect(records).toHaveLength(DEFAULT_CONFIG.label.snippetsPerPaper);
        records.forEach((record, index) => {
            const { snippet, candidates, answer } = record.payload;
            expect(record.sequenceIndex).toBe(index);
            expect(candidates).toHaveLength(DEFAULT_CONFIG.label.distractors + 1);
            expect(new Set(candidates).size).toBe(candidates.length);
            expect(candidates).toContain(answer);
            expect(candidates).not.toContain('References');
            expect(snippet).toBe(`Paragraph ${SECTION_TITLES.indexOf(answer) + 1} of the ${answer.toLowerCase()} section.`);
        });
    });

    it('should keep selected snippets in document order', () => {
        const answers = generator.generate(input('p_a')).map((r) => SECTION_TITLES.indexOf(r.payload.answer));
        expect(answers).toEqual([...answers].sort((a, b) => a - b));
    });

    it('should select the same snippets and candidate order every time', () => {
        expect(generator.generate(input('p_a'))).toEqual(generator.generate(input('p_a')));
    });

    it('should fail on papers with too few sections', () => {
        const raw = pmcPayload('PMC1', { full_text: jatsDocument(['Introduction', 'Methods', 'Results']) });
        expect(() => generator.generate(input('p_a', {}, raw))).toThrow('Too few usable sections for labeling');
    });

    it('should fail without full text', () => {
        const raw = pmcPayload('PMC1', { full_text: null });
        expect(() => generator.generate(input('p_a', {}, raw))).toThrow('Section labels need the paper full text');
    });

    it('should accept a custom segmenter', () => {
        const titles = ['A', 'B', 'C'];
        const segmenter: SnippetSegmenter = () => ({
            titles,
            snippets: titles.map((section) => ({ text: `text under ${section}`, section })),
        });
        const small = new LabelGenerator('1', { snippetsPerPaper: 1, distractors: 2, minSections: 3 }, segmenter);

        const [record] = small.generate(input('p_a'));
        expect(record?.payload.candidates).toHaveLength(3);
        expect(record?.payload.snippet).toBe(`text under ${record?.payload.answer}`);
    });

    it('should read sections from the payload full text by default', () => {
        const { paper } = input('p_a');
        expect(pmcFullTextSegmenter(paper)).toEqual(segmentJats(jatsDocument()));
    });
});

describe('createGenerators', () => {
    it('should build one generator per stage stamped with the configured version', () => {
        const generators = createGenerators({ ...DEFAULT_CONFIG, generatorVersion: '7' });
        expect(generators.query.stage).toBe('query');
        expect(generators.synthesis.stage).toBe('synthesis');
        expect(generators.label.stage).toBe('label');
        expect(generators.label.version).toBe('7');
    });
});
