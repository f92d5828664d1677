import {
    DEFAULT_CATEGORY,
    REQUIREMENT_CATEGORIES,
    type Requirement,
    type RequirementCategory
} from '../types/requirements';
import { slugify, stableRequirementId } from '../utils/hash.util';
import { asTrimmedString, isRecord, uniqueStrings } from '../utils/guards.util';

/**
 * Requirement Normalizer
 *
 * Turns raw requirement proposals (whatever the extraction call returned)
 * into a canonical list with stable, content-derived IDs. Malformed fields are
 * coerced to defaults rather than reported as errors.
 *
 * Pure: same input sequence, same output sequence, in input order.
 */

const DEFAULT_WEIGHT = 3;
const MIN_WEIGHT = 1;
const MAX_WEIGHT = 5;

export interface NormalizationReport {
    requirements: Requirement[];
    skippedCount: number; // not an object, or no name
    duplicateCount: number; // key already taken earlier in the batch
}

function isRequirementCategory(value: string): value is RequirementCategory {
    return REQUIREMENT_CATEGORIES.some(category => category === value);
}

// Exact spelling only; "ai" or "BEHAVIORAL" fall back like any unknown value
export function coerceCategory(value: unknown): RequirementCategory {
    const category = asTrimmedString(value);
    return isRequirementCategory(category) ? category : DEFAULT_CATEGORY;
}

/**
 * "importance" wins over "must_have" when both are present. Free text counts
 * as must-have when it mentions "must" or "required".
 */
export function deriveMustHave(proposal: Record<string, unknown>): boolean {
    const marker = proposal.importance ?? proposal.must_have;
    if (typeof marker === 'boolean') {
        return marker;
    }
    if (typeof marker === 'string') {
        const text = marker.toLowerCase();
        return text.includes('must') || text.includes('required');
    }
    return true;
}

export function coerceWeight(value: unknown): number {
    if (typeof value === 'number' && Number.isInteger(value) && value >= MIN_WEIGHT && value <= MAX_WEIGHT) {
        return value;
    }
    return DEFAULT_WEIGHT;
}

export function normalizeRequirementsWithReport(rawProposals: readonly unknown[]): NormalizationReport {
    const requirements: Requirement[] = [];
    const acceptedKeys = new Set<string>();
    let skippedCount = 0;
    let duplicateCount = 0;

    for (const proposal of rawProposals) {
        if (!isRecord(proposal)) {
            skippedCount++;
            continue;
        }

        const name = asTrimmedString(proposal.name);
        if (!name) {
            skippedCount++;
            continue;
        }

        const proposedKey = asTrimmedString(proposal.requirement_key);
        const requirementKey = slugify(proposedKey || name);
        if (acceptedKeys.has(requirementKey)) {
            duplicateCount++;
            continue;
        }
        acceptedKeys.add(requirementKey);

        const category = coerceCategory(proposal.category);
        const mustHave = deriveMustHave(proposal);

        requirements.push({
            id: stableRequirementId(requirementKey, category, mustHave),
            requirement_key: requirementKey,
            category,
            name,
            description: asTrimmedString(proposal.description),
            must_have: mustHave,
            weight: coerceWeight(proposal.weight),
            aliases: uniqueStrings(proposal.aliases)
        });
    }

    return { requirements, skippedCount, duplicateCount };
}

export function normalizeRequirements(rawProposals: readonly unknown[]): Requirement[] {
    return normalizeRequirementsWithReport(rawProposals).requirements;
}
