import { logger, type ILogger } from '../config/logger';
import { getConfig, type ModelSettings } from '../config/env';
import { getOpenAIService, type ChatMessage, type IOpenAIService } from './openai.service';
import { normalizeEvidenceProposals } from '../pipeline/match-adapter';
import type { Requirement, RequirementsDocument } from '../types/requirements';
import type { EvidenceMap } from '../types/evidence';
import { generateRunId, hashText } from '../utils/hash.util';

export const MATCH_PROMPT_VERSION = 'MATCH_EVIDENCE_V2';

const MATCHING_SYSTEM_PROMPT = `You check a resume against a fixed list of requirements.
Return a JSON object with this shape:
{
    "matches": [
        {
            "requirement_id": string (copied from the list),
            "requirement_key": string (copied from the list),
            "matched": boolean,
            "evidence": [{ "quote": string }],
            "notes": string
        }
    ]
}
Rules:
- Return exactly one entry per requirement in the list, and no others.
- Every quote must be copied verbatim from the resume, at least one full phrase long.
- Set "matched" to true only when a quote directly shows the requirement.
- When nothing in the resume shows the requirement, set "matched" to false and "evidence" to [].
- Do not paraphrase, summarize or infer.`;

// The description is derived from the job description and stays out of the matching call
function describeRequirement(requirement: Requirement) {
    return {
        id: requirement.id,
        requirement_key: requirement.requirement_key,
        name: requirement.name,
        aliases: requirement.aliases
    };
}

export function buildMatchingMessages(resumeText: string, requirements: readonly Requirement[]): ChatMessage[] {
    return [
        { role: 'system', content: MATCHING_SYSTEM_PROMPT },
        {
            role: 'user',
            content: `Requirements:\n${JSON.stringify(requirements.map(describeRequirement), null, 2)}\n\nResume:\n---\n${resumeText}\n---`
        }
    ];
}

/**
 * Evidence Matcher Service with Dependency Injection
 */
export class EvidenceMatcherService {
    constructor(
        private openai: IOpenAIService,
        private logger: ILogger,
        private settings: ModelSettings,
        private runIdGenerator: () => string = generateRunId
    ) { }

    /**
     * Factory method for production use
     */
    static create(): EvidenceMatcherService {
        return new EvidenceMatcherService(
            getOpenAIService(),
            logger,
            getConfig().matching
        );
    }

    /**
     * Propose evidence for every requirement of a frozen document.
     * The result is unvalidated; quotes still have to pass the quote validator.
     */
    async match(resumeText: string, requirementsDoc: RequirementsDocument): Promise<EvidenceMap> {
        if (!resumeText.trim()) {
            throw new Error('Resume text is empty');
        }

        const runId = this.runIdGenerator();
        const messages = buildMatchingMessages(resumeText, requirementsDoc.requirements);

        const raw = await this.openai.generateStructuredCompletion(messages, {
            model: this.settings.modelId,
            temperature: this.settings.temperature,
            topP: this.settings.topP
        });

        const { matches, droppedCount } = normalizeEvidenceProposals(raw, requirementsDoc.requirements);

        if (droppedCount > 0) {
            this.logger.warn({
                runId,
                droppedCount
            }, 'Discarded evidence proposals that reference no requirement');
        }

        this.logger.info({
            runId,
            roleId: requirementsDoc.role_id,
            requirementsCount: requirementsDoc.requirements.length,
            matchesCount: matches.length,
            proposedMatched: matches.filter(match => match.matched).length
        }, 'Evidence proposals collected');

        return {
            role_id: requirementsDoc.role_id,
            jd_hash: requirementsDoc.jd_hash,
            resume_hash: hashText(resumeText),
            requirements_version: requirementsDoc.requirements_version,
            prompt_version: MATCH_PROMPT_VERSION,
            model_id: this.settings.modelId,
            run_id: runId,
            matches,
            audit: {
                prompt_version: MATCH_PROMPT_VERSION,
                prompt_hash: hashText(MATCHING_SYSTEM_PROMPT),
                model_id: this.settings.modelId,
                model_params: {
                    temperature: this.settings.temperature,
                    top_p: this.settings.topP
                }
            }
        };
    }
}

// Singleton instance
let evidenceMatcherService: EvidenceMatcherService | null = null;

export function getEvidenceMatcherService(): EvidenceMatcherService {
    if (!evidenceMatcherService) {
        evidenceMatcherService = EvidenceMatcherService.create();
    }
    return evidenceMatcherService;
}
