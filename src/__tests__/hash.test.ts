import { describe, it, expect } from 'vitest';
import { deriveArtifactId, derivePaperId, hashOrder, normalizeExternalId, sha256Hex } from '../utils/hash.js';
import { CorpusError } from '../utils/errors.js';

describe('normalizeExternalId', () => {
    it('should map every spelling of a PMC id to the same key', () => {
        expect(normalizeExternalId('PMC123')).toBe('PMC123');
        expect(normalizeExternalId('pmc123')).toBe('PMC123');
        expect(normalizeExternalId(' 123 ')).toBe('PMC123');
    });

    it('should trim and lower-case other identifiers', () => {
        expect(normalizeExternalId('  DOI:10.1000/ABC ')).toBe('doi:10.1000/abc');
    });
});

describe('derivePaperId', () => {
    it('should derive the same id for equivalent external ids', () => {
        const id = derivePaperId('PMC123');
        expect(id).toMatch(/^p_[0-9a-f]{16}$/);
        expect(derivePaperId('pmc123')).toBe(id);
        expect(derivePaperId('123')).toBe(id);
        expect(id).toBe(`p_${sha256Hex('PMC123').slice(0, 16)}`);
    });

    it('should derive different ids for different papers', () => {
        expect(derivePaperId('PMC123')).not.toBe(derivePaperId('PMC124'));
    });

    it('should reject an empty id', () => {
        expect(() => derivePaperId('   ')).toThrow('External id must not be empty');
        expect(() => derivePaperId('')).toThrow(CorpusError);
    });
});

describe('deriveArtifactId', () => {
    it('should be stable and prefixed with the stage', () => {
        const id = deriveArtifactId('p_0123456789abcdef', 'query', 0);
        expect(id).toMatch(/^query_[0-9a-f]{20}$/);
        expect(deriveArtifactId('p_0123456789abcdef', 'query', 0)).toBe(id);
    });

    it('should differ per sequence index and per stage', () => {
        const base = deriveArtifactId('p_0123456789abcdef', 'query', 0);
        expect(deriveArtifactId('p_0123456789abcdef', 'query', 1)).not.toBe(base);
        expect(deriveArtifactId('p_0123456789abcdef', 'label', 0).slice(6)).not.toBe(base.slice(6));
    });
});

describe('hashOrder', () => {
    const items = ['alpha', 'beta', 'gamma', 'delta', 'epsilon'];

    it('should return a permutation of the input', () => {
        const ordered = hashOrder(items, 'salt', (item) => item);
        expect([...ordered].sort()).toEqual([...items].sort());
    });

    it('should give the same order for the same salt', () => {
        expect(hashOrder(items, 'salt', (item) => item)).toEqual(hashOrder(items, 'salt', (item) => item));
    });

    it('should order by the hash of salt and key', () => {
        const ordered = hashOrder(items, 'salt', (item) => item);
        const ranks = ordered.map((item) => sha256Hex(`salt\u0000${item}`));
        expect(ranks).toEqual([...ranks].sort());
    });

    it('should keep input order for identical keys', () => {
        const first = { key: 'same', n: 1 };
        const second = { key: 'same', n: 2 };
        expect(hashOrder([first, second], 'salt', (item) => item.key)).toEqual([first, second]);
    });
});
