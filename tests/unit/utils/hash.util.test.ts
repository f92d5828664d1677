import { describe, it, expect } from 'vitest';
import {
    canonicalJson,
    generateRunId,
    hashText,
    normalizeWhitespace,
    slugify,
    stableRequirementId
} from '../../../src/utils/hash.util';

describe('hash utilities', () => {
    describe('hashText', () => {
        it('should return the SHA-256 hex digest of UTF-8 text', () => {
            expect(hashText('hello')).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
            expect(hashText('héllo')).toBe('3c48591d8d098a4538f5e013dfcf406e948eac4d3277b10bf614e295d6068179');
            expect(hashText('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
        });
    });

    describe('slugify', () => {
        it('should lowercase and join words with underscores', () => {
            expect(slugify('Machine Learning')).toBe('machine_learning');
            expect(slugify('C++ / Rust')).toBe('c_rust');
            expect(slugify('__Node.js__')).toBe('node_js');
        });

        it('should return "unknown" when nothing is left', () => {
            expect(slugify('')).toBe('unknown');
            expect(slugify('***')).toBe('unknown');
        });
    });

    describe('stableRequirementId', () => {
        it('should hash key, category and importance', () => {
            expect(stableRequirementId('python', 'Technical', true)).toBe('REQ-45356e988b');
            expect(stableRequirementId('python', 'Technical', false)).toBe('REQ-dff7982d0e');
            expect(stableRequirementId('python', 'AI', true)).toBe('REQ-62bdb36281');
            expect(stableRequirementId('machine_learning', 'AI', true)).toBe('REQ-bfc5e37f38');
        });

        it('should render the must-have flag as True or False', () => {
            expect(stableRequirementId('python_3', 'Technical', true)).toBe('REQ-10a3707f08');
            expect(stableRequirementId('python_3', 'Technical', true))
                .toBe(`REQ-${hashText('python_3|Technical|True').slice(0, 10)}`);
            expect(stableRequirementId('kubernetes', 'Infrastructure', false))
                .toBe(`REQ-${hashText('kubernetes|Infrastructure|False').slice(0, 10)}`);
        });
    });

    describe('normalizeWhitespace', () => {
        it('should collapse whitespace runs and trim', () => {
            expect(normalizeWhitespace('  Built\tAPIs \n\n in  Python ')).toBe('Built APIs in Python');
        });
    });

    describe('canonicalJson', () => {
        it('should sort object keys at every depth and keep array order', () => {
            const value = { b: 1, a: { d: [3, { z: 1, y: 2 }], c: null } };

            expect(canonicalJson(value)).toBe('{"a":{"c":null,"d":[3,{"y":2,"z":1}]},"b":1}');
        });

        it('should not depend on insertion order', () => {
            expect(canonicalJson({ x: 1, y: 2 })).toBe(canonicalJson({ y: 2, x: 1 }));
        });
    });

    describe('generateRunId', () => {
        it('should return eight hex characters', () => {
            expect(generateRunId()).toMatch(/^[0-9a-f]{8}$/);
        });

        it('should differ between calls', () => {
            expect(generateRunId()).not.toBe(generateRunId());
        });
    });
});
