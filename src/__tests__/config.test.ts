import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { resolveConfig } from '../utils/config.js';
import { DEFAULT_CONFIG } from '../types/index.js';

describe('resolveConfig', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'hecorpus-config-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    const writeConfig = (config: object) =>
        fs.writeFileSync(path.join(dir, 'hecorpus.config.json'), JSON.stringify(config));

    it('should fall back to defaults without a config file', async () => {
        expect(await resolveConfig({}, dir)).toEqual(DEFAULT_CONFIG);
    });

    it('should apply the config file over defaults', async () => {
        writeConfig({ db: 'from-file.db', logLevel: 'debug', label: { distractors: 3 }, synthesis: { groupBy: 'source' } });

        const config = await resolveConfig({}, dir);

        expect(config.db).toBe('from-file.db');
        expect(config.logLevel).toBe('debug');
        expect(config.label).toEqual({ snippetsPerPaper: 2, distractors: 3, minSections: 5 });
        expect(config.synthesis.groupBy).toBe('source');
    });

    it('should ignore values of the wrong type', async () => {
        writeConfig({ staleLeaseMs: 'soon', query: { minSentenceLength: '20' } });

        const config = await resolveConfig({}, dir);

        expect(config.staleLeaseMs).toBe(DEFAULT_CONFIG.staleLeaseMs);
        expect(config.query.minSentenceLength).toBe(10);
    });

    it('should let CLI flags win over the file', async () => {
        writeConfig({ db: 'from-file.db', label: { distractors: 3 } });

        const config = await resolveConfig({ db: 'from-cli.db', jsonLogs: undefined, label: { minSections: 7 } }, dir);

        expect(config.db).toBe('from-cli.db');
        expect(config.jsonLogs).toBe(false);
        expect(config.label).toEqual({ snippetsPerPaper: 2, distractors: 3, minSections: 7 });
    });
});
