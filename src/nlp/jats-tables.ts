import { load } from 'cheerio';
import type { StudyTable } from '../types/index.js';

const TEXT_WHITESPACE = /\s+/g;

const normalizeText = (value: string): string => value.replace(TEXT_WHITESPACE, ' ').trim();

/** Header substrings that mark a study-citation column */
export const AUTHOR_KEYS = ['author', 'authors', 'first author', 'citation'] as const;

/** Header substrings that mark a publication-date column */
export const DATE_KEYS = ['year', 'date', 'publication', 'published'] as const;

/**
 * Every <table-wrap> of a JATS document that holds a <table>, in document order.
 * Headers come from <thead> cells, rows from the <td> cells of each <tbody> row.
 * The id is the table's <label> with spaces replaced by underscores, else T1, T2, ...
 */
export function extractJatsTables(xml: string): StudyTable[] {
    const $ = load(xml, { xml: true });
    const tables: StudyTable[] = [];

    $('table-wrap').each((index, element) => {
        const wrap = $(element);
        const table = wrap.find('table').first();
        if (table.length === 0) return;

        const label = normalizeText(wrap.children('label').first().text());
        const headers = table
            .find('thead th')
            .toArray()
            .map((cell) => normalizeText($(cell).text()));
        const rows = table
            .find('tbody tr')
            .toArray()
            .map((row) =>
                $(row)
                    .children('td')
                    .toArray()
                    .map((cell) => normalizeText($(cell).text()))
            );

        tables.push({ id: label ? label.replace(/ /g, '_') : `T${index + 1}`, headers, rows });
    });

    return tables;
}

/**
 * A study-characteristics table: some header names an author and some header a date.
 */
export function hasAuthorAndDate(headers: readonly string[]): boolean {
    const lowered = headers.map((header) => header.toLowerCase());
    const has = (keys: readonly string[]) => lowered.some((header) => keys.some((key) => header.includes(key)));
    return has(AUTHOR_KEYS) && has(DATE_KEYS);
}
