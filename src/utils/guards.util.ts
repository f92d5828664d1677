/**
 * Narrowing helpers for loosely-typed data returned by the generation calls.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asTrimmedString(value: unknown): string {
    return typeof value === 'string' ? value.trim() : '';
}

/**
 * Distinct non-empty strings in first-seen order; non-strings are dropped
 */
export function uniqueStrings(value: unknown): string[] {
    if (!Array.isArray(value)) {
        return [];
    }
    const seen = new Set<string>();
    for (const item of value) {
        if (typeof item === 'string' && item.length > 0) {
            seen.add(item);
        }
    }
    return Array.from(seen);
}
