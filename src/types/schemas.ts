import { z } from 'zod';
import {
    REQUIREMENT_CATEGORIES,
    type GenerationAudit,
    type Requirement,
    type RequirementsDocument
} from './requirements';
import type { EvidenceMap, EvidenceMatch, QuoteValidationStats } from './evidence';

/**
 * Artifact schemas
 *
 * Checked on every save and load so that a hand-edited or truncated file
 * never reaches scoring.
 */

const hexHash = z.string().regex(/^[0-9a-f]{64}$/, 'Expected a SHA-256 hex digest');

export const GenerationAuditSchema: z.ZodType<GenerationAudit> = z.object({
    prompt_version: z.string(),
    prompt_hash: z.string(),
    model_id: z.string(),
    model_params: z.object({
        temperature: z.number(),
        top_p: z.number()
    })
});

export const RequirementSchema: z.ZodType<Requirement> = z.object({
    id: z.string().regex(/^REQ-[0-9a-f]{10}$/),
    requirement_key: z.string().regex(/^[a-z0-9_]+$/),
    category: z.enum(REQUIREMENT_CATEGORIES),
    name: z.string().min(1),
    description: z.string(),
    must_have: z.boolean(),
    weight: z.number().int().min(1).max(5),
    aliases: z.array(z.string())
});

export const RequirementsDocumentSchema: z.ZodType<RequirementsDocument> = z.object({
    role_id: z.string().min(1),
    jd_hash: hexHash,
    requirements_version: z.string().min(1),
    created_at: z.string(),
    role_title: z.string(),
    requirements: z.array(RequirementSchema),
    audit: GenerationAuditSchema.optional()
});

export const EvidenceMatchSchema: z.ZodType<EvidenceMatch> = z.object({
    requirement_id: z.string(),
    requirement_key: z.string(),
    matched: z.boolean(),
    evidence: z.array(z.object({ quote: z.string() })),
    notes: z.string(),
    invalid_quote: z.boolean().optional()
});

const QuoteValidationStatsSchema: z.ZodType<QuoteValidationStats> = z.object({
    invalid_quote_count: z.number().int().min(0),
    empty_evidence_count: z.number().int().min(0),
    matched_count_raw: z.number().int().min(0),
    matched_count_validated: z.number().int().min(0)
});

export const EvidenceMapSchema: z.ZodType<EvidenceMap> = z.object({
    role_id: z.string(),
    jd_hash: hexHash,
    resume_hash: hexHash,
    requirements_version: z.string(),
    prompt_version: z.string(),
    model_id: z.string(),
    run_id: z.string().min(1),
    matches: z.array(EvidenceMatchSchema),
    audit: GenerationAuditSchema.optional(),
    validation: QuoteValidationStatsSchema.optional()
});
