import type { EvidenceMap, EvidenceMatch, QuoteValidationStats } from '../types/evidence';
import { normalizeWhitespace } from '../utils/hash.util';

/**
 * Quote Validator
 *
 * The validator, not the matching call, decides whether a match stands.
 * A matched entry keeps its status only when every quote it cites is a
 * verbatim substring of the resume (after whitespace normalization) and at
 * least `minQuoteLength` characters long. One bad quote voids the whole
 * entry: no partial credit.
 */

export const DEFAULT_MIN_QUOTE_LENGTH = 12;

export interface QuoteValidationOptions {
    /** Downgrade matched entries that cite no quote at all. Off by default. */
    rejectEmptyEvidence?: boolean;
}

type QuoteVerdict = 'valid' | 'invalid' | 'empty';

// Code points, so a letter outside the BMP counts once
function characterCount(text: string): number {
    return [...text].length;
}

function judgeQuotes(match: EvidenceMatch, normalizedResume: string, minQuoteLength: number): QuoteVerdict {
    const quotes = match.evidence
        .map(item => item.quote)
        .filter(quote => quote.length > 0);

    if (quotes.length === 0) {
        return 'empty';
    }

    for (const quote of quotes) {
        const normalizedQuote = normalizeWhitespace(quote);
        if (characterCount(normalizedQuote) < minQuoteLength || !normalizedResume.includes(normalizedQuote)) {
            return 'invalid';
        }
    }
    return 'valid';
}

export function validateEvidenceQuotes(
    resumeText: string,
    evidenceMap: EvidenceMap,
    minQuoteLength: number = DEFAULT_MIN_QUOTE_LENGTH,
    options: QuoteValidationOptions = {}
): EvidenceMap {
    const normalizedResume = normalizeWhitespace(resumeText);
    let invalidQuoteCount = 0;
    let emptyEvidenceCount = 0;

    const matches = evidenceMap.matches.map((match): EvidenceMatch => {
        if (match.matched !== true) {
            return { ...match, invalid_quote: false };
        }

        const verdict = judgeQuotes(match, normalizedResume, minQuoteLength);

        if (verdict === 'invalid') {
            invalidQuoteCount++;
            return { ...match, matched: false, evidence: [], invalid_quote: true };
        }

        if (verdict === 'empty') {
            emptyEvidenceCount++;
            if (options.rejectEmptyEvidence) {
                return { ...match, matched: false, evidence: [], invalid_quote: false };
            }
            return { ...match, invalid_quote: false };
        }

        return { ...match, evidence: match.evidence.map(item => ({ ...item })), invalid_quote: false };
    });

    const validation: QuoteValidationStats = {
        invalid_quote_count: invalidQuoteCount,
        empty_evidence_count: emptyEvidenceCount,
        matched_count_raw: evidenceMap.matches.filter(match => match.matched === true).length,
        matched_count_validated: matches.filter(match => match.matched).length
    };

    return { ...evidenceMap, matches, validation };
}
