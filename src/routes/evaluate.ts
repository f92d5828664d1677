import { Router, Request, Response } from "express";
import { z } from "zod";
import { AppDataSource } from "../db/data-source";
import { Job } from "../db/entities/job.entity";
import { File } from "../db/entities/file.entity";
import { logger, toErrorMessage } from "../config/logger";
import { getQueueConfig } from "../queue/queue-config";
import { RequirementsNotFoundError, getArtifactStoreService } from "../services/artifact-store.service";

const router = Router();

// Validation schema for evaluate request
const evaluateSchema = z.object({
    roleId: z.string().regex(/^[A-Za-z0-9_-]+$/, "Role ID may only contain letters, digits, '_' and '-'"),
    jdHash: z.string().regex(/^[0-9a-f]{64}$/, "jdHash must be a SHA-256 hex digest"),
    resumeFileId: z.number().int().positive("Resume file ID must be a positive integer")
});

/**
 * POST /evaluate
 *
 * Queue an evaluation of an uploaded resume against frozen requirements.
 * The requirements artifact must already exist; it is never created here.
 *
 * Body: { roleId: string, jdHash: string, resumeFileId: number }
 * Returns: { id: number, status: string }
 */
router.post('/', async (req: Request, res: Response) => {
    try {
        const { roleId, jdHash, resumeFileId } = evaluateSchema.parse(req.body);

        if (!getArtifactStoreService().hasRequirements(roleId, jdHash)) {
            const missing = new RequirementsNotFoundError(roleId, jdHash);
            logger.warn({ roleId, jdHash }, 'Evaluation requested without frozen requirements');
            return res.status(409).json({
                error: 'Requirements not frozen',
                message: missing.message
            });
        }

        // Verify file exists
        const fileRepository = AppDataSource.getRepository(File);
        const resumeFile = await fileRepository.findOne({ where: { id: resumeFileId, type: 'resume' } });
        if (!resumeFile) {
            return res.status(404).json({ error: 'Resume file not found' });
        }

        // Create job
        const jobRepository = AppDataSource.getRepository(Job);
        const job = await jobRepository.save(jobRepository.create({
            status: 'queued',
            role_id: roleId,
            jd_hash: jdHash,
            resume_file_id: resumeFileId
        }));

        logger.info({
            jobId: job.id,
            roleId,
            jdHash,
            resumeFileId
        }, 'Evaluation job created');

        // Add job to queue for async processing
        try {
            await getQueueConfig().getEvaluationQueue().add('evaluate', {
                jobId: job.id,
                roleId,
                jdHash,
                resumeFileId
            });

            logger.info({
                jobId: job.id,
                queueName: 'evaluation'
            }, 'Evaluation job added to queue');

        } catch (error: unknown) {
            // Mark as failed if queue operation fails
            job.status = 'failed';
            job.error_code = 'queue_error';
            await jobRepository.save(job);

            logger.error({
                jobId: job.id,
                error: toErrorMessage(error)
            }, 'Failed to add job to queue');
        }

        res.json({
            id: job.id,
            status: job.status
        });

    } catch (error: unknown) {
        if (error instanceof z.ZodError) {
            return res.status(400).json({
                error: 'Validation failed',
                details: error.errors
            });
        }

        logger.error({ error: toErrorMessage(error) }, 'Evaluation request failed');
        res.status(500).json({
            error: 'Evaluation request failed',
            message: toErrorMessage(error)
        });
    }
});

export { router as evaluateRoutes };
