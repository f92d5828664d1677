import { Router, Request, Response } from "express";
import { AppDataSource } from "../db/data-source";
import { Job } from "../db/entities/job.entity";
import { JobArtifact } from "../db/entities/job-artifact.entity";
import { logger, toErrorMessage } from "../config/logger";
import { ERROR_REQUIREMENTS_MISSING } from "../workers/evaluation-worker";
import type {
    ArtifactPayload,
    EvaluationResult,
    EvidenceArtifactPayload,
    ScoreArtifactPayload
} from "../types/evaluation";

const router = Router();

function isEvidencePayload(payload: ArtifactPayload): payload is EvidenceArtifactPayload {
    return payload.stage === 'evidence';
}

function isScorePayload(payload: ArtifactPayload): payload is ScoreArtifactPayload {
    return payload.stage === 'score';
}

/**
 * GET /result/:id
 *
 * Get evaluation results for a specific job.
 * Returns job status and results (if completed).
 *
 * Params: id (job ID)
 * Returns: { id: number, status: string, result?: EvaluationResult }
 */
router.get('/:id', async (req: Request, res: Response) => {
    try {
        const jobId = parseInt(req.params.id);

        if (isNaN(jobId)) {
            return res.status(400).json({
                error: 'Invalid job ID'
            });
        }

        const jobRepository = AppDataSource.getRepository(Job);
        const job = await jobRepository.findOne({ where: { id: jobId } });

        if (!job) {
            return res.status(404).json({
                error: 'Job not found'
            });
        }

        // If job is still processing or queued, return status only
        if (job.status === 'queued' || job.status === 'processing') {
            return res.json({
                id: job.id,
                status: job.status
            });
        }

        if (job.status === 'failed') {
            const requirementsMissing = job.error_code === ERROR_REQUIREMENTS_MISSING;
            return res.status(requirementsMissing ? 409 : 500).json({
                id: job.id,
                status: job.status,
                error_code: job.error_code,
                attempts: job.attempts,
                message: requirementsMissing
                    ? `Requirements artifact missing for role_id=${job.role_id}, jd_hash=${job.jd_hash}. Create it with POST /requirements using the same job description text, then evaluate again.`
                    : 'The evaluation could not be completed. Please try again later.'
            });
        }

        const artifactRepository = AppDataSource.getRepository(JobArtifact);
        const artifacts = await artifactRepository.find({
            where: { jobId: job.id },
            order: { created_at: 'ASC' }
        });

        const payloads = artifacts.map(artifact => artifact.payload_json);
        const evidence = payloads.find(isEvidencePayload);
        const scored = payloads.find(isScorePayload);

        if (!evidence || !scored) {
            return res.status(500).json({
                error: 'Incomplete evaluation results'
            });
        }

        const result: EvaluationResult = {
            run_id: scored.run_id,
            score: scored.score,
            gap_report: scored.gap_report,
            requirements_hash: evidence.requirements_hash,
            evidence_path: evidence.evidence_path,
            report_path: scored.report_path,
            validation: evidence.evidence_map.validation
        };

        logger.info({
            jobId: job.id,
            runId: result.run_id,
            status: 'completed'
        }, 'Results retrieved');

        return res.json({
            id: job.id,
            status: job.status,
            role_id: job.role_id,
            jd_hash: job.jd_hash,
            result
        });

    } catch (error: unknown) {
        logger.error({ error: toErrorMessage(error) }, 'Result retrieval failed');
        res.status(500).json({
            error: 'Result retrieval failed',
            message: toErrorMessage(error)
        });
    }
});

export { router as resultRoutes };
