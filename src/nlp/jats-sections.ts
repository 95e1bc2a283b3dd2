import { load } from 'cheerio';

const TEXT_WHITESPACE = /\s+/g;

const normalizeText = (value: string): string => value.replace(TEXT_WHITESPACE, ' ').trim();

export interface Snippet {
    text: string;
    /** Title of the section the snippet appears under */
    section: string;
}

export interface SectionedText {
    /** Section titles in document order, duplicates kept */
    titles: string[];
    snippets: Snippet[];
}

/**
 * Walk a JATS full-text document in order, pairing every paragraph with the most
 * recent non-empty <title> above it. Paragraphs before the first title are dropped.
 */
export function segmentJats(xml: string): SectionedText {
    const $ = load(xml, { xml: true });
    const titles: string[] = [];
    const snippets: Snippet[] = [];
    let currentTitle: string | null = null;

    $('title, p').each((_, element) => {
        const node = $(element);
        const text = normalizeText(node.text());

        if (node.is('title')) {
            if (text) {
                currentTitle = text;
                titles.push(text);
            }
            return;
        }

        if (text && currentTitle) {
            snippets.push({ text, section: currentTitle });
        }
    });

    return { titles, snippets };
}
