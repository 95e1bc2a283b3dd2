import type { GeneratedArtifact, LabelConfig, PaperRecord } from '../types/index.js';
import type { GeneratorInput, PerPaperGenerator } from './types.js';
import { segmentJats, type SectionedText, type Snippet } from '../nlp/jats-sections.js';
import { readPmcPayload } from '../sources/pmc-payload.js';
import { GenerationError } from '../utils/errors.js';
import { hashOrder } from '../utils/hash.js';

/**
 * Splits a paper's text into (snippet, section) pairs. Pluggable; the default reads
 * the JATS full text carried in a PMC payload.
 */
export type SnippetSegmenter = (paper: PaperRecord) => SectionedText;

const EXCLUDED_SECTION = /supplementary|reference/i;

export const pmcFullTextSegmenter: SnippetSegmenter = (paper) => {
    const fullText = readPmcPayload(paper.rawContent)?.full_text;
    if (!fullText) {
        throw new GenerationError('Section labels need the paper full text', { paperId: paper.id });
    }
    return segmentJats(fullText);
};

/**
 * Section-labeling queries: a snippet of the paper, the section it came from, and
 * distractor sections from the same paper.
 *
 * Selection is by hash order rather than random sampling, so the same content always
 * yields the same snippets, candidates and candidate order.
 */
export class LabelGenerator implements PerPaperGenerator<'label'> {
    readonly stage = 'label' as const;

    constructor(
        readonly version: string,
        private readonly config: LabelConfig,
        private readonly segmenter: SnippetSegmenter = pmcFullTextSegmenter
    ) {}

    generate({ entry, paper }: GeneratorInput): GeneratedArtifact<'label'>[] {
        const { titles, snippets } = this.segmenter(paper);
        const { snippetsPerPaper, distractors, minSections } = this.config;

        const sections = [...new Set(titles.filter((title) => !EXCLUDED_SECTION.test(title)))];
        if (sections.length < Math.max(minSections, distractors + 1)) {
            throw new GenerationError('Too few usable sections for labeling', {
                paperId: entry.paperId,
                sections: sections.length,
                required: Math.max(minSections, distractors + 1),
            });
        }

        const eligible = snippets.filter((snippet) => sections.includes(snippet.section));
        if (eligible.length < snippetsPerPaper) {
            throw new GenerationError('Too few paragraphs for labeling', {
                paperId: entry.paperId,
                paragraphs: eligible.length,
                required: snippetsPerPaper,
            });
        }

        const picked = new Set(
            hashOrder(eligible, paper.id, (snippet) => `${snippet.section}\n${snippet.text}`).slice(0, snippetsPerPaper)
        );
        const selected: Snippet[] = eligible.filter((snippet) => picked.has(snippet));

        const artifacts: GeneratedArtifact<'label'>[] = [];
        for (const snippet of selected) {
            const wrong = sections.filter((section) => section !== snippet.section);
            if (wrong.length < distractors) continue;

            const chosen = hashOrder(wrong, `${paper.id}\u0000${snippet.text}`, (section) => section).slice(0, distractors);
            const candidates = hashOrder(
                [...chosen, snippet.section],
                `${paper.id}\u0000${snippet.text}\u0000candidates`,
                (section) => section
            );

            artifacts.push({
                sequenceIndex: artifacts.length,
                payload: {
                    task: 'section-labeling',
                    snippet: snippet.text,
                    candidates,
                    answer: snippet.section,
                },
                references: [entry.paperId],
            });
        }

        if (artifacts.length === 0) {
            throw new GenerationError('No snippet had enough distractor sections', { paperId: entry.paperId });
        }

        return artifacts;
    }
}
