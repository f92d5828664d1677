import type { Requirement, RequirementCategory, RequirementsDocument } from '../types/requirements';
import type {
    CategoryScore,
    EvidenceMap,
    EvidenceMatch,
    GapReportEntry,
    ScoreResult
} from '../types/evidence';

/**
 * Scoring Engine
 *
 * Pure arithmetic over a frozen requirements document and a validated
 * evidence map. Matches are looked up by requirement ID only; entries whose
 * ID is not in the document take no part. The requirement weight is carried
 * on the document but not used here.
 */

const NO_EVIDENCE = 'No evidence found.';

export class EvidenceRequiredError extends Error {
    constructor(public readonly requirementId: string) {
        super(`Requirement ${requirementId} has matched=true but no evidence quote`);
        this.name = 'EvidenceRequiredError';
    }
}

/**
 * Round to one decimal, half-to-even on exact ties (6.25 → 6.2, 18.75 → 18.8).
 * A double sits exactly halfway between two tenths only when four times it is
 * an odd integer; every other value goes to the tenth nearest its exact value.
 */
export function roundToTenth(value: number): number {
    const quarters = value * 4;
    if (Number.isInteger(quarters) && Math.abs(quarters % 2) === 1) {
        const lower = Math.floor(value * 10);
        return (lower % 2 === 0 ? lower : lower + 1) / 10;
    }
    return Number(value.toFixed(1));
}

/**
 * First entry per requirement ID wins
 */
function indexMatches(evidenceMap: EvidenceMap): Map<string, EvidenceMatch> {
    const index = new Map<string, EvidenceMatch>();
    for (const match of evidenceMap.matches) {
        if (!index.has(match.requirement_id)) {
            index.set(match.requirement_id, match);
        }
    }
    return index;
}

function countMatched(requirements: readonly Requirement[], index: Map<string, EvidenceMatch>): number {
    return requirements.filter(requirement => index.get(requirement.id)?.matched === true).length;
}

// An empty partition counts as fully covered
function partitionCoverage(matched: number, total: number): number {
    return total === 0 ? 100.0 : roundToTenth((matched / total) * 100);
}

export function computeScore(requirementsDoc: RequirementsDocument, evidenceMap: EvidenceMap): ScoreResult {
    const requirements = requirementsDoc.requirements;
    const index = indexMatches(evidenceMap);

    const mustHave = requirements.filter(requirement => requirement.must_have);
    const niceToHave = requirements.filter(requirement => !requirement.must_have);

    const mustHaveMatched = countMatched(mustHave, index);
    const niceToHaveMatched = countMatched(niceToHave, index);
    const totalMatched = mustHaveMatched + niceToHaveMatched;
    const totalRequirements = requirements.length;

    const categoryCounts = new Map<RequirementCategory, { matched: number; total: number }>();
    for (const requirement of requirements) {
        const counts = categoryCounts.get(requirement.category) ?? { matched: 0, total: 0 };
        counts.total++;
        if (index.get(requirement.id)?.matched === true) {
            counts.matched++;
        }
        categoryCounts.set(requirement.category, counts);
    }

    const perCategory: Partial<Record<RequirementCategory, CategoryScore>> = {};
    for (const [category, { matched, total }] of categoryCounts) {
        perCategory[category] = { matched, total, pct: roundToTenth((matched / total) * 100) };
    }

    return {
        must_have_coverage: partitionCoverage(mustHaveMatched, mustHave.length),
        nice_to_have_coverage: partitionCoverage(niceToHaveMatched, niceToHave.length),
        // No requirements means nothing was shown to be covered
        overall_score: totalRequirements === 0 ? 0 : roundToTenth((totalMatched / totalRequirements) * 100),
        total_matched: totalMatched,
        total_requirements: totalRequirements,
        must_have_matched: mustHaveMatched,
        must_have_total: mustHave.length,
        nice_to_have_matched: niceToHaveMatched,
        nice_to_have_total: niceToHave.length,
        per_category_scores: perCategory
    };
}

/**
 * Strict check for callers that refuse matched entries without a quote
 */
export function assertEvidencePresent(evidenceMap: EvidenceMap): void {
    for (const match of evidenceMap.matches) {
        if (match.matched && !match.evidence.some(item => item.quote.length > 0)) {
            throw new EvidenceRequiredError(match.requirement_id);
        }
    }
}

/**
 * Number of evidence entries that reference no requirement of the document
 */
export function countUnalignedMatches(requirementsDoc: RequirementsDocument, evidenceMap: EvidenceMap): number {
    const ids = new Set(requirementsDoc.requirements.map(requirement => requirement.id));
    return evidenceMap.matches.filter(match => !ids.has(match.requirement_id)).length;
}

export function buildGapReport(requirementsDoc: RequirementsDocument, evidenceMap: EvidenceMap): GapReportEntry[] {
    const index = indexMatches(evidenceMap);

    return requirementsDoc.requirements.map((requirement): GapReportEntry => {
        const match = index.get(requirement.id);
        const matched = match?.matched === true;
        const firstQuote = match?.evidence.find(item => item.quote.length > 0)?.quote;

        return {
            id: requirement.id,
            category: requirement.category,
            name: requirement.name,
            description: requirement.description,
            importance: requirement.must_have ? 'Must-have' : 'Nice-to-have',
            status: matched ? 'MATCH' : requirement.must_have ? 'MISSING' : 'GAP',
            evidence: matched && firstQuote ? firstQuote : NO_EVIDENCE
        };
    });
}
