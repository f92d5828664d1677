import { logger, type ILogger } from '../config/logger';
import { getConfig } from '../config/env';
import { getArtifactStoreService, type IArtifactStore } from './artifact-store.service';
import { getEvidenceMatcherService } from './evidence-matcher.service';
import { validateEvidenceQuotes } from '../pipeline/quote-validator';
import {
    assertEvidencePresent,
    buildGapReport,
    computeScore,
    countUnalignedMatches
} from '../pipeline/scoring-engine';
import type { RequirementsDocument } from '../types/requirements';
import type { EvidenceMap, GapReportEntry, RunReport, ScoreResult } from '../types/evidence';
import { canonicalJson, hashText } from '../utils/hash.util';

export interface IEvidenceMatcher {
    match(resumeText: string, requirementsDoc: RequirementsDocument): Promise<EvidenceMap>;
}

export interface EvaluationSettings {
    minQuoteLength: number;
    rejectEmptyEvidence: boolean;
}

export interface EvaluationInput {
    roleId: string;
    jdHash: string;
    resumeText: string;
}

export interface EvaluationOutcome {
    runId: string;
    evidenceMap: EvidenceMap;
    score: ScoreResult;
    gapReport: GapReportEntry[];
    evidencePath: string;
    reportPath: string;
    requirementsHash: string;
}

/**
 * Evaluation Service with Dependency Injection
 *
 * Runs one resume against a frozen requirements document:
 * load, match, validate quotes, persist evidence, score, report.
 * A missing requirements artifact fails the run; it is never regenerated here.
 */
export class EvaluationService {
    constructor(
        private artifactStore: IArtifactStore,
        private matcher: IEvidenceMatcher,
        private settings: EvaluationSettings,
        private logger: ILogger,
        private clock: () => Date = () => new Date()
    ) { }

    /**
     * Factory method for production use
     */
    static create(): EvaluationService {
        const config = getConfig();
        return new EvaluationService(
            getArtifactStoreService(),
            getEvidenceMatcherService(),
            {
                minQuoteLength: config.minQuoteLength,
                rejectEmptyEvidence: config.rejectEmptyEvidence
            },
            logger
        );
    }

    async evaluate(input: EvaluationInput): Promise<EvaluationOutcome> {
        const requirementsDoc = this.artifactStore.loadRequirements(input.roleId, input.jdHash);
        return this.run(requirementsDoc, input.resumeText);
    }

    /**
     * Resolve the frozen document from the job description text, then evaluate
     */
    async evaluateByJdText(jdText: string, resumeText: string): Promise<EvaluationOutcome> {
        const { document } = this.artifactStore.findRequirementsByJdHash(hashText(jdText));
        return this.run(document, resumeText);
    }

    private async run(requirementsDoc: RequirementsDocument, resumeText: string): Promise<EvaluationOutcome> {
        const requirementsHash = hashText(canonicalJson(requirementsDoc));

        this.logger.info({
            roleId: requirementsDoc.role_id,
            jdHash: requirementsDoc.jd_hash,
            requirementsCount: requirementsDoc.requirements.length,
            requirementsHash
        }, 'Starting evaluation against frozen requirements');

        const proposed = await this.matcher.match(resumeText, requirementsDoc);

        const evidenceMap = validateEvidenceQuotes(resumeText, proposed, this.settings.minQuoteLength, {
            rejectEmptyEvidence: this.settings.rejectEmptyEvidence
        });
        if (!this.settings.rejectEmptyEvidence) {
            assertEvidencePresent(evidenceMap);
        }

        const unalignedCount = countUnalignedMatches(requirementsDoc, evidenceMap);
        if (unalignedCount > 0) {
            this.logger.warn({
                runId: evidenceMap.run_id,
                unalignedCount
            }, 'Evidence entries reference requirements outside the frozen document');
        }

        this.logger.info({
            runId: evidenceMap.run_id,
            invalidQuoteCount: evidenceMap.validation?.invalid_quote_count ?? 0,
            emptyEvidenceCount: evidenceMap.validation?.empty_evidence_count ?? 0,
            matchedRaw: evidenceMap.validation?.matched_count_raw ?? 0,
            matchedValidated: evidenceMap.validation?.matched_count_validated ?? 0
        }, 'Evidence quotes validated');

        const evidencePath = this.artifactStore.saveEvidenceMap(evidenceMap);

        const score = computeScore(requirementsDoc, evidenceMap);
        const gapReport = buildGapReport(requirementsDoc, evidenceMap);

        const report: RunReport = {
            run_id: evidenceMap.run_id,
            timestamp: this.clock().toISOString(),
            role_id: requirementsDoc.role_id,
            jd_hash: requirementsDoc.jd_hash,
            resume_hash: evidenceMap.resume_hash,
            requirements_version: requirementsDoc.requirements_version,
            prompt_version: evidenceMap.prompt_version,
            model_id: evidenceMap.model_id,
            total_requirements: score.total_requirements,
            total_matched: score.total_matched,
            must_have_coverage: score.must_have_coverage,
            nice_to_have_coverage: score.nice_to_have_coverage,
            overall_score: score.overall_score,
            per_category_scores: score.per_category_scores
        };
        const reportPath = this.artifactStore.saveRunReport(report);

        this.logger.info({
            runId: evidenceMap.run_id,
            overallScore: score.overall_score,
            mustHaveCoverage: score.must_have_coverage,
            niceToHaveCoverage: score.nice_to_have_coverage,
            evidencePath,
            reportPath
        }, 'Evaluation completed');

        return {
            runId: evidenceMap.run_id,
            evidenceMap,
            score,
            gapReport,
            evidencePath,
            reportPath,
            requirementsHash
        };
    }
}

// Singleton instance
let evaluationService: EvaluationService | null = null;

export function getEvaluationService(): EvaluationService {
    if (!evaluationService) {
        evaluationService = EvaluationService.create();
    }
    return evaluationService;
}
