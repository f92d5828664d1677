import * as crypto from 'crypto';

/**
 * Hashing and identity helpers shared by the pipeline stages.
 *
 * Identities here are content-derived so that the same text or the same
 * requirement always maps to the same value across runs and processes.
 */

const REQUIREMENT_ID_PREFIX = 'REQ-';
const REQUIREMENT_ID_HASH_LENGTH = 10;

/**
 * SHA-256 hex digest of a UTF-8 string
 */
export function hashText(text: string): string {
    return crypto.createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * Lowercase slug: runs of anything outside [a-z0-9] become one underscore,
 * edge underscores are stripped, and an empty result becomes "unknown".
 */
export function slugify(value: string): string {
    const slug = value
        .trim()
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '_')
        .replace(/^_+|_+$/g, '');
    return slug || 'unknown';
}

/**
 * Stable requirement ID. Not a security boundary; only needs to be
 * collision-free across one corpus of job descriptions.
 *
 * The flag is rendered as "True"/"False" so IDs line up with requirements
 * artifacts frozen by earlier releases.
 */
export function stableRequirementId(requirementKey: string, category: string, mustHave: boolean): string {
    const digest = hashText(`${requirementKey}|${category}|${mustHave ? 'True' : 'False'}`);
    return `${REQUIREMENT_ID_PREFIX}${digest.slice(0, REQUIREMENT_ID_HASH_LENGTH)}`;
}

/**
 * Collapse every whitespace run to one space and trim the ends
 */
export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/**
 * JSON with object keys sorted at every depth, for hashing structured documents
 */
export function canonicalJson(value: unknown): string {
    return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(sortKeys);
    }
    if (value !== null && typeof value === 'object') {
        const entries: Array<[string, unknown]> = Object.entries(value);
        entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        return Object.fromEntries(entries.map(([key, child]) => [key, sortKeys(child)]));
    }
    return value;
}

/**
 * Short random identifier for evaluation runs
 */
export function generateRunId(): string {
    return crypto.randomUUID().slice(0, 8);
}
