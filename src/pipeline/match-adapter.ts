import type { Requirement } from '../types/requirements';
import type { EvidenceMatch, EvidenceQuote } from '../types/evidence';
import { asTrimmedString, isRecord } from '../utils/guards.util';

/**
 * Evidence proposal adapter
 *
 * Maps raw match proposals from the matching call back onto the frozen
 * requirement IDs. Proposals that reference no known requirement are
 * discarded, and so is any second proposal for the same requirement.
 * Unknown fields (confidence scores and the like) are not carried over.
 */

export interface AdaptedEvidence {
    matches: EvidenceMatch[];
    droppedCount: number;
}

function extractProposalList(raw: unknown): unknown[] {
    if (Array.isArray(raw)) {
        return raw;
    }
    if (isRecord(raw) && Array.isArray(raw.matches)) {
        return raw.matches;
    }
    return [];
}

function extractQuotes(value: unknown): EvidenceQuote[] {
    if (!Array.isArray(value)) {
        return [];
    }
    const quotes: EvidenceQuote[] = [];
    for (const item of value) {
        if (isRecord(item) && typeof item.quote === 'string') {
            quotes.push({ quote: item.quote });
        }
    }
    return quotes;
}

export function normalizeEvidenceProposals(raw: unknown, requirements: readonly Requirement[]): AdaptedEvidence {
    const byId = new Map<string, Requirement>();
    const byKey = new Map<string, Requirement>();
    for (const requirement of requirements) {
        byId.set(requirement.id, requirement);
        byKey.set(requirement.requirement_key, requirement);
    }

    const matches: EvidenceMatch[] = [];
    const resolvedIds = new Set<string>();
    let droppedCount = 0;

    for (const proposal of extractProposalList(raw)) {
        if (!isRecord(proposal)) {
            droppedCount++;
            continue;
        }

        const requirement =
            byId.get(asTrimmedString(proposal.requirement_id)) ??
            byKey.get(asTrimmedString(proposal.requirement_key));

        if (!requirement || resolvedIds.has(requirement.id)) {
            droppedCount++;
            continue;
        }
        resolvedIds.add(requirement.id);

        matches.push({
            requirement_id: requirement.id,
            requirement_key: requirement.requirement_key,
            matched: proposal.matched === true,
            evidence: extractQuotes(proposal.evidence),
            notes: typeof proposal.notes === 'string' ? proposal.notes : ''
        });
    }

    return { matches, droppedCount };
}
