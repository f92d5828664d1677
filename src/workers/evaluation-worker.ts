import { UnrecoverableError, type Job } from 'bullmq';
import { AppDataSource } from '../db/data-source';
import { Job as JobEntity, type JobStatus } from '../db/entities/job.entity';
import { JobArtifact } from '../db/entities/job-artifact.entity';
import { File } from '../db/entities/file.entity';
import { logger, toErrorMessage, type ILogger } from '../config/logger';
import type { IRepository } from '../db/interfaces';
import { RequirementsNotFoundError } from '../services/artifact-store.service';
import { getEvaluationService, type EvaluationInput, type EvaluationOutcome } from '../services/evaluation.service';
import { getTextExtractorService, type ITextExtractor } from '../services/text-extractor.service';
import type { ArtifactPayload, EvaluationJobData, EvaluationJobResult } from '../types/evaluation';

// Interfaces for better testability
export interface IEvaluationRunner {
    evaluate(input: EvaluationInput): Promise<EvaluationOutcome>;
}

export type EvaluationJob = Pick<Job<EvaluationJobData, EvaluationJobResult>, 'id' | 'data'>;

export interface IEvaluationWorker {
    processEvaluation(job: EvaluationJob): Promise<EvaluationJobResult>;
}

export const ERROR_REQUIREMENTS_MISSING = 'requirements_missing';
export const ERROR_PROCESSING = 'processing_error';

/**
 * Evaluation Worker with Dependency Injection
 *
 * Processes evaluation jobs asynchronously:
 * resume file → text → frozen evaluation → job artifacts.
 * A missing requirements artifact fails the job without retries.
 */
export class EvaluationWorker implements IEvaluationWorker {
    constructor(
        private jobRepository: IRepository<JobEntity>,
        private artifactRepository: IRepository<JobArtifact>,
        private fileRepository: IRepository<File>,
        private textExtractor: ITextExtractor,
        private evaluation: IEvaluationRunner,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): EvaluationWorker {
        return new EvaluationWorker(
            AppDataSource.getRepository(JobEntity),
            AppDataSource.getRepository(JobArtifact),
            AppDataSource.getRepository(File),
            getTextExtractorService(),
            getEvaluationService(),
            logger
        );
    }

    /**
     * Process evaluation job
     */
    async processEvaluation(job: EvaluationJob): Promise<EvaluationJobResult> {
        const { jobId, roleId, jdHash, resumeFileId } = job.data;

        this.logger.info({
            jobId,
            roleId,
            jdHash,
            resumeFileId,
            queueJobId: job.id
        }, 'Starting evaluation processing');

        try {
            await this.updateJobStatus(jobId, 'processing');

            const resumeFile = await this.fileRepository.findOne({
                where: { id: resumeFileId, type: 'resume' }
            });
            if (!resumeFile) {
                throw new Error(`Resume file ${resumeFileId} not found`);
            }

            const resumeText = await this.textExtractor.extract(resumeFile.storage_uri, resumeFile.mime_type);
            const outcome = await this.evaluation.evaluate({ roleId, jdHash, resumeText });

            await this.saveArtifact(jobId, outcome.evidenceMap.requirements_version, {
                stage: 'evidence',
                run_id: outcome.runId,
                evidence_path: outcome.evidencePath,
                requirements_hash: outcome.requirementsHash,
                evidence_map: outcome.evidenceMap
            });
            await this.saveArtifact(jobId, outcome.evidenceMap.requirements_version, {
                stage: 'score',
                run_id: outcome.runId,
                report_path: outcome.reportPath,
                score: outcome.score,
                gap_report: outcome.gapReport
            });

            await this.updateJobStatus(jobId, 'completed');

            this.logger.info({
                jobId,
                runId: outcome.runId,
                overallScore: outcome.score.overall_score,
                status: 'completed'
            }, 'Evaluation processing completed');

            return { success: true, jobId, runId: outcome.runId };

        } catch (error: unknown) {
            this.logger.error({
                jobId,
                error: toErrorMessage(error)
            }, 'Evaluation processing failed');

            if (error instanceof RequirementsNotFoundError) {
                await this.updateJobStatus(jobId, 'failed', ERROR_REQUIREMENTS_MISSING, true);
                // Retrying cannot create the artifact
                throw new UnrecoverableError(error.message);
            }

            await this.updateJobStatus(jobId, 'failed', ERROR_PROCESSING, true);
            throw error;
        }
    }

    private async saveArtifact(jobId: number, version: string, payload: ArtifactPayload): Promise<void> {
        await this.artifactRepository.save(this.artifactRepository.create({
            jobId,
            stage: payload.stage,
            payload_json: payload,
            version
        }));
    }

    /**
     * Update job status
     */
    private async updateJobStatus(jobId: number, status: JobStatus, errorCode?: string, incrementAttempts: boolean = false): Promise<void> {
        const job = await this.jobRepository.findOne({ where: { id: jobId } });
        if (job) {
            job.status = status;
            if (errorCode) {
                job.error_code = errorCode;
            }
            if (incrementAttempts) {
                job.attempts = (job.attempts || 0) + 1;
            }
            await this.jobRepository.save(job);
        }
    }
}

// Export worker function for BullMQ
export async function evaluationProcessor(job: Job<EvaluationJobData, EvaluationJobResult>): Promise<EvaluationJobResult> {
    const worker = EvaluationWorker.create();
    return await worker.processEvaluation(job);
}
