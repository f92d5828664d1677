import { Router, Request, Response } from "express";
import { z } from "zod";
import { logger, toErrorMessage } from "../config/logger";
import {
    ArtifactKeyError,
    ArtifactValidationError,
    RequirementsNotFoundError,
    getArtifactStoreService
} from "../services/artifact-store.service";
import { defaultRoleId, getRequirementExtractorService } from "../services/requirement-extractor.service";
import { hashText } from "../utils/hash.util";

const router = Router();

// Validation schema for requirements creation
const createRequirementsSchema = z.object({
    jdText: z.string().refine(value => value.trim().length > 0, "Job description text is required"),
    roleId: z.string().regex(/^[A-Za-z0-9_-]+$/, "Role ID may only contain letters, digits, '_' and '-'").optional()
});

/**
 * POST /requirements
 *
 * Extract, normalize and freeze the requirements of a job description.
 * An existing artifact for the same (role_id, jd_hash) is returned as is,
 * never regenerated.
 *
 * Body: { jdText: string, roleId?: string }
 * Returns: { role_id, jd_hash, requirements_count, path, created }
 */
router.post('/', async (req: Request, res: Response) => {
    try {
        const { jdText, roleId } = createRequirementsSchema.parse(req.body);
        const store = getArtifactStoreService();

        const jdHash = hashText(jdText);
        const resolvedRoleId = roleId ?? defaultRoleId(jdHash);

        if (store.hasRequirements(resolvedRoleId, jdHash)) {
            const existing = store.loadRequirements(resolvedRoleId, jdHash);
            logger.info({ roleId: resolvedRoleId, jdHash }, 'Requirements already frozen, returning existing artifact');
            return res.json({
                role_id: existing.role_id,
                jd_hash: existing.jd_hash,
                requirements_count: existing.requirements.length,
                path: store.requirementsPath(resolvedRoleId, jdHash),
                created: false
            });
        }

        const document = await getRequirementExtractorService().extract(jdText, resolvedRoleId);
        const location = store.saveRequirements(document);

        res.status(201).json({
            role_id: document.role_id,
            jd_hash: document.jd_hash,
            requirements_count: document.requirements.length,
            path: location,
            created: true
        });

    } catch (error: unknown) {
        if (error instanceof z.ZodError) {
            return res.status(400).json({
                error: 'Validation failed',
                details: error.errors
            });
        }

        logger.error({ error: toErrorMessage(error) }, 'Requirements creation failed');
        res.status(500).json({
            error: 'Requirements creation failed',
            message: toErrorMessage(error)
        });
    }
});

/**
 * GET /requirements
 *
 * List frozen requirements artifacts.
 */
router.get('/', (req: Request, res: Response) => {
    try {
        const artifacts = getArtifactStoreService().listRequirements();
        res.json({
            count: artifacts.length,
            artifacts: artifacts.map(ref => ({
                role_id: ref.roleId,
                jd_hash: ref.jdHash,
                path: ref.path
            }))
        });
    } catch (error: unknown) {
        logger.error({ error: toErrorMessage(error) }, 'Failed to list requirements');
        res.status(500).json({
            error: 'Failed to list requirements',
            message: toErrorMessage(error)
        });
    }
});

/**
 * GET /requirements/:roleId/:jdHash
 *
 * Fetch one frozen requirements document.
 */
router.get('/:roleId/:jdHash', (req: Request, res: Response) => {
    try {
        const document = getArtifactStoreService().loadRequirements(req.params.roleId, req.params.jdHash);
        res.json(document);
    } catch (error: unknown) {
        if (error instanceof RequirementsNotFoundError) {
            return res.status(404).json({
                error: 'Requirements not found',
                message: error.message
            });
        }
        if (error instanceof ArtifactKeyError) {
            return res.status(400).json({
                error: 'Invalid artifact key',
                message: error.message
            });
        }

        logger.error({
            roleId: req.params.roleId,
            jdHash: req.params.jdHash,
            error: toErrorMessage(error),
            invalidArtifact: error instanceof ArtifactValidationError
        }, 'Failed to load requirements');
        res.status(500).json({
            error: 'Failed to load requirements',
            message: toErrorMessage(error)
        });
    }
});

export { router as requirementsRoutes };
