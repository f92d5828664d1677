import { logger, type ILogger } from '../config/logger';
import { getConfig, type ModelSettings } from '../config/env';
import { getOpenAIService, type ChatMessage, type IOpenAIService } from './openai.service';
import { normalizeRequirementsWithReport } from '../pipeline/normalizer';
import {
    REQUIREMENT_CATEGORIES,
    REQUIREMENTS_VERSION,
    type GenerationAudit,
    type Requirement,
    type RequirementsDocument
} from '../types/requirements';
import { hashText } from '../utils/hash.util';
import { asTrimmedString, isRecord } from '../utils/guards.util';

export const EXTRACT_PROMPT_VERSION = 'EXTRACT_REQ_V2';

const EXTRACTION_SYSTEM_PROMPT = `You extract hiring requirements from a job description.
Return a JSON object with this shape:
{
    "role_title": string,
    "requirements": [
        {
            "requirement_key": string (short snake_case identifier, e.g. "python", "distributed_systems"),
            "name": string,
            "category": ${REQUIREMENT_CATEGORIES.map(category => `"${category}"`).join(' | ')},
            "description": string,
            "importance": "Must-have" | "Nice-to-have",
            "weight": integer 1-5,
            "aliases": string[]
        }
    ]
}
Rules:
- One entry per distinct skill, technology, qualification or responsibility.
- Use the wording of the job description; never add requirements it does not state.
- Use "Must-have" only when the text presents the requirement as mandatory.
- Do not include commentary outside the JSON object.`;

export function buildExtractionMessages(jdText: string): ChatMessage[] {
    return [
        { role: 'system', content: EXTRACTION_SYSTEM_PROMPT },
        { role: 'user', content: `Job description:\n---\n${jdText}\n---` }
    ];
}

export function defaultRoleId(jdHash: string): string {
    return `role_${jdHash.slice(0, 12)}`;
}

export interface RequirementsDocumentInput {
    jdText: string;
    roleId?: string;
    roleTitle: string;
    requirements: Requirement[];
    createdAt: Date;
    audit?: GenerationAudit;
}

export function buildRequirementsDocument(input: RequirementsDocumentInput): RequirementsDocument {
    const jdHash = hashText(input.jdText);
    return {
        role_id: input.roleId || defaultRoleId(jdHash),
        jd_hash: jdHash,
        requirements_version: REQUIREMENTS_VERSION,
        created_at: input.createdAt.toISOString(),
        role_title: input.roleTitle,
        requirements: input.requirements,
        ...(input.audit ? { audit: input.audit } : {})
    };
}

/**
 * Requirement Extractor Service with Dependency Injection
 *
 * Asks the extraction model for requirement proposals and turns them into a
 * Requirements Document. The model output is only ever a proposal: the
 * normalizer decides keys, categories and IDs.
 */
export class RequirementExtractorService {
    constructor(
        private openai: IOpenAIService,
        private logger: ILogger,
        private settings: ModelSettings,
        private clock: () => Date = () => new Date()
    ) { }

    /**
     * Factory method for production use
     */
    static create(): RequirementExtractorService {
        return new RequirementExtractorService(
            getOpenAIService(),
            logger,
            getConfig().extraction
        );
    }

    async extract(jdText: string, roleId?: string): Promise<RequirementsDocument> {
        if (!jdText.trim()) {
            throw new Error('Job description text is empty');
        }

        const messages = buildExtractionMessages(jdText);
        const raw = await this.openai.generateStructuredCompletion(messages, {
            model: this.settings.modelId,
            temperature: this.settings.temperature,
            topP: this.settings.topP
        });

        const proposals = isRecord(raw) && Array.isArray(raw.requirements)
            ? raw.requirements
            : Array.isArray(raw) ? raw : [];
        const roleTitle = isRecord(raw) ? asTrimmedString(raw.role_title) : '';

        const { requirements, skippedCount, duplicateCount } = normalizeRequirementsWithReport(proposals);

        const document = buildRequirementsDocument({
            jdText,
            roleId,
            roleTitle,
            requirements,
            createdAt: this.clock(),
            audit: {
                prompt_version: EXTRACT_PROMPT_VERSION,
                prompt_hash: hashText(EXTRACTION_SYSTEM_PROMPT),
                model_id: this.settings.modelId,
                model_params: {
                    temperature: this.settings.temperature,
                    top_p: this.settings.topP
                }
            }
        });

        this.logger.info({
            roleId: document.role_id,
            jdHash: document.jd_hash,
            proposedCount: proposals.length,
            requirementsCount: requirements.length,
            skippedCount,
            duplicateCount
        }, 'Requirements extracted and normalized');

        return document;
    }
}

// Singleton instance
let requirementExtractorService: RequirementExtractorService | null = null;

export function getRequirementExtractorService(): RequirementExtractorService {
    if (!requirementExtractorService) {
        requirementExtractorService = RequirementExtractorService.create();
    }
    return requirementExtractorService;
}
