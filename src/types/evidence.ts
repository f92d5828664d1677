import type { GenerationAudit, RequirementCategory } from './requirements';

/**
 * Evidence and scoring types
 *
 * An Evidence Map is the only source of truth for "what was found" in one
 * resume for one frozen requirements document. Score results are derived views.
 */

export interface EvidenceQuote {
    quote: string;
}

export interface EvidenceMatch {
    requirement_id: string;
    requirement_key: string;
    matched: boolean;
    evidence: EvidenceQuote[];
    notes: string;
    invalid_quote?: boolean; // set by quote validation
}

export interface QuoteValidationStats {
    invalid_quote_count: number;
    empty_evidence_count: number;
    matched_count_raw: number;
    matched_count_validated: number;
}

export interface EvidenceMap {
    role_id: string;
    jd_hash: string;
    resume_hash: string;
    requirements_version: string;
    prompt_version: string;
    model_id: string;
    run_id: string; // distinguishes repeated runs, never used in scoring
    matches: EvidenceMatch[];
    audit?: GenerationAudit;
    validation?: QuoteValidationStats;
}

export interface CategoryScore {
    matched: number;
    total: number;
    pct: number;
}

export interface ScoreResult {
    must_have_coverage: number;
    nice_to_have_coverage: number;
    overall_score: number;
    total_matched: number;
    total_requirements: number;
    must_have_matched: number;
    must_have_total: number;
    nice_to_have_matched: number;
    nice_to_have_total: number;
    per_category_scores: Partial<Record<RequirementCategory, CategoryScore>>;
}

export type GapStatus = 'MATCH' | 'MISSING' | 'GAP';

export interface GapReportEntry {
    id: string;
    category: RequirementCategory;
    name: string;
    description: string;
    importance: 'Must-have' | 'Nice-to-have';
    status: GapStatus;
    evidence: string;
}

// Audit record written next to each evidence map
export interface RunReport {
    run_id: string;
    timestamp: string;
    role_id: string;
    jd_hash: string;
    resume_hash: string;
    requirements_version: string;
    prompt_version: string;
    model_id: string;
    total_requirements: number;
    total_matched: number;
    must_have_coverage: number;
    nice_to_have_coverage: number;
    overall_score: number;
    per_category_scores: ScoreResult['per_category_scores'];
}
