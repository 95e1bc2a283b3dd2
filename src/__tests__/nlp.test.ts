import { describe, it, expect } from 'vitest';
import { splitSentences } from '../nlp/sentences.js';
import { extractEconomicFields, mergeFields, schemaOf, ECONOMIC_FIELD_ORDER } from '../nlp/economic-fields.js';
import { segmentJats } from '../nlp/jats-sections.js';
import { extractJatsTables, hasAuthorAndDate } from '../nlp/jats-tables.js';
import { SCENARIO_ABSTRACT, STUDY_TABLES } from './helpers.js';

describe('splitSentences', () => {
    it('should split after periods and on blank lines, dropping short pieces', () => {
        const text = 'Aim. The model compared two strategies.\n\nResults: costs fell.';
        expect(splitSentences(text)).toEqual(['The model compared two strategies.', 'Results: costs fell.']);
    });

    it('should honour a custom minimum length', () => {
        expect(splitSentences('Aim. Costs fell.', 3)).toEqual(['Aim.', 'Costs fell.']);
    });

    it('should return nothing for empty text', () => {
        expect(splitSentences('')).toEqual([]);
    });
});

describe('extractEconomicFields', () => {
    it('should extract treatment, cost and QALY from a single claim', () => {
        expect(extractEconomicFields(SCENARIO_ABSTRACT)).toEqual({
            treatment: 'Drug X',
            cost: '$500',
            qaly: '0.2',
        });
    });

    it('should extract comparator, ICER, perspective and time horizon', () => {
        const sentence = 'Screening versus No Screening yielded an ICER of $12,000 per QALY from the payer perspective over a 10-year horizon.';
        expect(extractEconomicFields(sentence)).toEqual({
            comparator: 'No Screening',
            cost: '$12,000',
            icer: '$12,000',
            perspective: 'payer',
            timeHorizon: '10-year',
        });
    });

    it('should find nothing in a sentence without economic content', () => {
        expect(extractEconomicFields('the cohort was followed for several visits.')).toEqual({});
    });
});

describe('schemaOf', () => {
    it('should list present fields in schema order', () => {
        expect(schemaOf({ qaly: '1', treatment: 'A' })).toEqual(['treatment', 'qaly']);
        expect(ECONOMIC_FIELD_ORDER[0]).toBe('treatment');
    });
});

describe('mergeFields', () => {
    it('should keep the first value seen for each field', () => {
        expect(mergeFields([{ cost: '$1' }, { cost: '$2', qaly: '0.1' }])).toEqual({ cost: '$1', qaly: '0.1' });
    });
});

describe('segmentJats', () => {
    it('should pair paragraphs with the nearest section title', () => {
        const xml = [
            '<article><front><article-meta><title-group><article-title>Not a section</article-title></title-group></article-meta></front>',
            '<body><p>Orphan paragraph.</p>',
            '<sec><title>Introduction</title><p>First   para\n text.</p></sec>',
            '<sec><title>Methods</title><p>Second.</p><p>Third.</p></sec>',
            '<sec><title></title><p>Fourth.</p></sec>',
            '</body></article>',
        ].join('');

        expect(segmentJats(xml)).toEqual({
            titles: ['Introduction', 'Methods'],
            snippets: [
                { text: 'First para text.', section: 'Introduction' },
                { text: 'Second.', section: 'Methods' },
                { text: 'Third.', section: 'Methods' },
                { text: 'Fourth.', section: 'Methods' },
            ],
        });
    });

    it('should keep duplicate titles in document order', () => {
        const xml = '<body><sec><title>Results</title><p>A.</p></sec><sec><title>Results</title><p>B.</p></sec></body>';
        expect(segmentJats(xml).titles).toEqual(['Results', 'Results']);
    });
});

describe('extractJatsTables', () => {
    it('should read headers and body rows of every table-wrap', () => {
        expect(extractJatsTables(`<article><body>${STUDY_TABLES}</body></article>`)).toEqual([
            {
                id: 'Table_1',
                headers: ['First Author', 'Publication year', 'Country'],
                rows: [
                    ['Tester', '2019', 'Testland'],
                    ['Other', '2020', 'Elsewhere'],
                ],
            },
            { id: 'T2', headers: ['Item', 'Cost'], rows: [['Drug', '$500']] },
        ]);
    });

    it('should skip a table-wrap without a table', () => {
        expect(extractJatsTables('<body><table-wrap><label>Table 1</label><graphic/></table-wrap></body>')).toEqual([]);
    });
});

describe('hasAuthorAndDate', () => {
    it('should need both an author column and a date column', () => {
        expect(hasAuthorAndDate(['Study (Citation)', 'Year'])).toBe(true);
        expect(hasAuthorAndDate(['AUTHORS', 'Date published'])).toBe(true);
        expect(hasAuthorAndDate(['First Author', 'Country'])).toBe(false);
        expect(hasAuthorAndDate(['Item', 'Cost'])).toBe(false);
    });
});
