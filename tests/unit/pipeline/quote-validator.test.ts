import { describe, it, expect } from 'vitest';
import { validateEvidenceQuotes } from '../../../src/pipeline/quote-validator';
import type { EvidenceMap, EvidenceMatch } from '../../../src/types/evidence';

const RESUME = 'Built APIs in Python 3.10 for scale.';

function match(overrides: Partial<EvidenceMatch>): EvidenceMatch {
    return {
        requirement_id: 'REQ-45356e988b',
        requirement_key: 'python',
        matched: true,
        evidence: [],
        notes: '',
        ...overrides
    };
}

function evidenceMap(matches: EvidenceMatch[]): EvidenceMap {
    return {
        role_id: 'backend_engineer',
        jd_hash: '2ba68055a12549bb2d4cde7a1d9b89c676765a15bef57e0922a75bca7a52a760',
        resume_hash: '1c3fcd649bb72103f090a956a80bb3f4c88b5f98d23d07291690f78b2abb9afc',
        requirements_version: '2.0.0',
        prompt_version: 'MATCH_EVIDENCE_V2',
        model_id: 'test-match-model',
        run_id: 'run00001',
        matches
    };
}

describe('Quote Validator', () => {
    it('should reject a quote that is not in the resume', () => {
        const result = validateEvidenceQuotes(RESUME, evidenceMap([
            match({ evidence: [{ quote: 'Built APIs in Java' }] })
        ]));

        expect(result.matches[0]).toEqual(match({
            matched: false,
            evidence: [],
            invalid_quote: true
        }));
    });

    it('should accept a verbatim quote', () => {
        const result = validateEvidenceQuotes(RESUME, evidenceMap([
            match({ evidence: [{ quote: 'Built APIs in Python 3.10' }] })
        ]));

        expect(result.matches[0].matched).toBe(true);
        expect(result.matches[0].invalid_quote).toBe(false);
        expect(result.matches[0].evidence).toEqual([{ quote: 'Built APIs in Python 3.10' }]);
    });

    it('should void the whole match when any quote is fabricated', () => {
        const result = validateEvidenceQuotes(RESUME, evidenceMap([
            match({
                evidence: [
                    { quote: 'Built APIs in Python 3.10' },
                    { quote: 'Led a team of twenty engineers' }
                ]
            })
        ]));

        expect(result.matches[0].matched).toBe(false);
        expect(result.matches[0].evidence).toEqual([]);
        expect(result.matches[0].invalid_quote).toBe(true);
    });

    it('should reject quotes shorter than the minimum length', () => {
        const result = validateEvidenceQuotes(RESUME, evidenceMap([
            match({ evidence: [{ quote: 'Python 3.10' }] })
        ]));

        expect(result.matches[0].matched).toBe(false);
        expect(result.matches[0].invalid_quote).toBe(true);
    });

    it('should count length in characters, not UTF-16 units', () => {
        const styledResume = '𝐏𝐲𝐭𝐡𝐨𝐧 𝐀𝐏𝐈 𝐚𝐭 𝐬𝐜𝐚𝐥𝐞';

        const tooShort = validateEvidenceQuotes(styledResume, evidenceMap([
            match({ evidence: [{ quote: '𝐏𝐲𝐭𝐡𝐨𝐧 𝐀𝐏𝐈' }] })
        ]));
        const longEnough = validateEvidenceQuotes(styledResume, evidenceMap([
            match({ evidence: [{ quote: '𝐏𝐲𝐭𝐡𝐨𝐧 𝐀𝐏𝐈 𝐚𝐭' }] })
        ]));

        expect(tooShort.matches[0]).toMatchObject({ matched: false, invalid_quote: true });
        expect(longEnough.matches[0]).toMatchObject({ matched: true, invalid_quote: false });
    });

    it('should honor a custom minimum length', () => {
        const result = validateEvidenceQuotes(RESUME, evidenceMap([
            match({ evidence: [{ quote: 'Python 3.10' }] })
        ]), 5);

        expect(result.matches[0].matched).toBe(true);
    });

    it('should compare after collapsing whitespace', () => {
        const resume = 'Built  APIs\nin\tPython 3.10\n\nfor scale.';
        const result = validateEvidenceQuotes(resume, evidenceMap([
            match({ evidence: [{ quote: '  Built APIs in   Python 3.10 ' }] })
        ]));

        expect(result.matches[0].matched).toBe(true);
        expect(result.matches[0].evidence).toEqual([{ quote: '  Built APIs in   Python 3.10 ' }]);
    });

    it('should be case-sensitive', () => {
        const result = validateEvidenceQuotes(RESUME, evidenceMap([
            match({ evidence: [{ quote: 'built apis in python 3.10' }] })
        ]));

        expect(result.matches[0].matched).toBe(false);
    });

    it('should pass unmatched entries through untouched', () => {
        const unmatched = match({ matched: false, evidence: [{ quote: 'Built APIs in Java' }], notes: 'no Java' });
        const result = validateEvidenceQuotes(RESUME, evidenceMap([unmatched]));

        expect(result.matches[0]).toEqual({ ...unmatched, invalid_quote: false });
    });

    it('should keep matched entries without quotes by default', () => {
        const result = validateEvidenceQuotes(RESUME, evidenceMap([match({ evidence: [] })]));

        expect(result.matches[0].matched).toBe(true);
        expect(result.matches[0].invalid_quote).toBe(false);
        expect(result.validation?.empty_evidence_count).toBe(1);
    });

    it('should downgrade matched entries without quotes when asked to', () => {
        const result = validateEvidenceQuotes(RESUME, evidenceMap([
            match({ evidence: [{ quote: '' }] })
        ]), 12, { rejectEmptyEvidence: true });

        expect(result.matches[0].matched).toBe(false);
        expect(result.matches[0].evidence).toEqual([]);
        expect(result.matches[0].invalid_quote).toBe(false);
    });

    it('should report validation counts', () => {
        const result = validateEvidenceQuotes(RESUME, evidenceMap([
            match({ requirement_id: 'REQ-0000000001', evidence: [{ quote: 'Built APIs in Python 3.10' }] }),
            match({ requirement_id: 'REQ-0000000002', evidence: [{ quote: 'Built APIs in Java' }] }),
            match({ requirement_id: 'REQ-0000000003', evidence: [] }),
            match({ requirement_id: 'REQ-0000000004', matched: false })
        ]));

        expect(result.validation).toEqual({
            invalid_quote_count: 1,
            empty_evidence_count: 1,
            matched_count_raw: 3,
            matched_count_validated: 2
        });
    });

    it('should not modify the input map', () => {
        const input = evidenceMap([match({ evidence: [{ quote: 'Built APIs in Java' }] })]);
        const before = structuredClone(input);

        const result = validateEvidenceQuotes(RESUME, input);

        expect(input).toEqual(before);
        expect(result).not.toBe(input);
        expect(result.run_id).toBe('run00001');
    });
});
