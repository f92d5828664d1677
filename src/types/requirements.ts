/**
 * Requirement types
 *
 * A Requirements Document is created once per job description text and is
 * frozen on disk. It is the only source of truth for "what must be checked".
 */

export const REQUIREMENT_CATEGORIES = [
    'AI',
    'Systems',
    'Infrastructure',
    'Technical',
    'Domain',
    'Collaboration',
    'Behavioral'
] as const;

export type RequirementCategory = typeof REQUIREMENT_CATEGORIES[number];

export const DEFAULT_CATEGORY: RequirementCategory = 'Technical';

export const REQUIREMENTS_VERSION = '2.0.0';

export interface Requirement {
    id: string; // REQ-<sha256(key|category|must_have)[:10]>
    requirement_key: string;
    category: RequirementCategory;
    name: string;
    description: string;
    must_have: boolean;
    weight: number; // 1..5, not used by the base score
    aliases: string[];
}

// Parameters of the generation call that proposed a document
export interface GenerationAudit {
    prompt_version: string;
    prompt_hash: string;
    model_id: string;
    model_params: {
        temperature: number;
        top_p: number;
    };
}

export interface RequirementsDocument {
    role_id: string;
    jd_hash: string;
    requirements_version: string;
    created_at: string;
    role_title: string;
    requirements: Requirement[];
    audit?: GenerationAudit;
}

// Locates a frozen requirements artifact without opening it
export interface RequirementsArtifactRef {
    roleId: string;
    jdHash: string;
    path: string;
}
