import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { CorpusDatabase } from '../storage/database.js';
import { initLogger } from '../utils/logger.js';

export interface TempDb {
    db: CorpusDatabase;
    dir: string;
    dbPath: string;
    cleanup: () => void;
}

/**
 * Fresh corpus database in its own temp directory.
 */
export function createTempDb(): TempDb {
    initLogger({ level: 'error', jsonLogs: true });
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'hecorpus-test-'));
    const dbPath = path.join(dir, 'corpus.db');
    const db = new CorpusDatabase(dbPath);

    return {
        db,
        dir,
        dbPath,
        cleanup: () => {
            if (db.getRawDb().open) db.close();
            fs.rmSync(dir, { recursive: true, force: true });
        },
    };
}

export const SECTION_TITLES = ['Introduction', 'Methods', 'Model Structure', 'Results', 'Discussion', 'Conclusions'];

/**
 * JATS body with one paragraph per section plus a reference list.
 */
export function jatsDocument(titles: string[] = SECTION_TITLES, tables = ''): string {
    const secs = titles
        .map((title, i) => `<sec><title>${title}</title><p>Paragraph ${i + 1} of the ${title.toLowerCase()} section.</p></sec>`)
        .join('');
    return `<article><body>${secs}${tables}<ref-list><title>References</title><p>Placeholder reference.</p></ref-list></body></article>`;
}

/**
 * Two table-wraps: a labelled study-characteristics table and an unlabelled cost table.
 */
export const STUDY_TABLES = [
    '<table-wrap><label>Table 1</label><table>',
    '<thead><tr><th>First Author</th><th>Publication <italic>year</italic></th><th>Country</th></tr></thead>',
    '<tbody><tr><td>Tester</td><td>2019</td><td>Testland</td></tr><tr><td>Other</td><td>2020</td><td>Elsewhere</td></tr></tbody>',
    '</table></table-wrap>',
    '<table-wrap><table>',
    '<thead><tr><th>Item</th><th>Cost</th></tr></thead>',
    '<tbody><tr><td>Drug</td><td>$500</td></tr></tbody>',
    '</table></table-wrap>',
].join('');

export const SCENARIO_ABSTRACT = 'Drug X reduced cost by $500 and improved QALY by 0.2';

/**
 * A PMC payload as the fetch step writes it.
 */
export function pmcPayload(pmcid: string, overrides: Record<string, unknown> = {}): string {
    return JSON.stringify({
        pmcid,
        title: `Test paper ${pmcid}`,
        abstract: SCENARIO_ABSTRACT,
        first_author: 'Tester',
        source: 'Test Journal',
        year: 2021,
        type: 'slr_cem',
        full_text: jatsDocument(),
        ...overrides,
    });
}
