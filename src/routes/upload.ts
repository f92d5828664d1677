import { Router, Request, Response } from "express";
import multer from "multer";
import path from "path";
import fs from "fs";
import crypto from "crypto";
import { AppDataSource } from "../db/data-source";
import { File } from "../db/entities/file.entity";
import { getConfig } from "../config/env";
import { logger, toErrorMessage } from "../config/logger";

const router = Router();

const ACCEPTED_MIME_TYPES = new Set(['application/pdf', 'text/plain', 'text/markdown']);
const ACCEPTED_EXTENSIONS = new Set(['.pdf', '.txt', '.md']);

// Create storage directory if it doesn't exist
const storageDir = getConfig().storageDir;
if (!fs.existsSync(storageDir)) {
    fs.mkdirSync(storageDir, { recursive: true });
}

// Configure multer for file uploads
const storage = multer.diskStorage({
    destination: (req, file, cb) => {
        cb(null, storageDir);
    },
    filename: (req, file, cb) => {
        const uniqueSuffix = Date.now() + '-' + Math.round(Math.random() * 1E9);
        cb(null, `${file.fieldname}-${uniqueSuffix}${path.extname(file.originalname).toLowerCase()}`);
    }
});

const upload = multer({
    storage: storage,
    limits: {
        fileSize: 10 * 1024 * 1024, // 10MB limit
    },
    fileFilter: (req, file, cb) => {
        const extension = path.extname(file.originalname).toLowerCase();
        if (ACCEPTED_MIME_TYPES.has(file.mimetype) || ACCEPTED_EXTENSIONS.has(extension)) {
            cb(null, true);
        } else {
            cb(new Error('Only PDF, .txt and .md resumes are allowed'));
        }
    }
});

/**
 * POST /upload
 *
 * Upload a resume (PDF or plain text).
 * Returns the file ID for use in evaluation requests.
 */
router.post('/', upload.single('resume'), async (req: Request, res: Response) => {
    try {
        const resume = req.file;

        if (!resume) {
            return res.status(400).json({
                error: 'A resume file is required (multipart field "resume")'
            });
        }

        const checksum = crypto.createHash('sha256')
            .update(fs.readFileSync(resume.path))
            .digest('hex');

        const fileRepository = AppDataSource.getRepository(File);
        const fileRecord = await fileRepository.save(fileRepository.create({
            type: 'resume',
            storage_uri: resume.path,
            original_name: resume.originalname,
            mime_type: resume.mimetype,
            checksum
        }));

        logger.info({
            resumeFileId: fileRecord.id,
            size: resume.size,
            mimeType: resume.mimetype
        }, 'Resume uploaded successfully');

        res.json({
            resumeFileId: fileRecord.id,
            checksum
        });

    } catch (error: unknown) {
        logger.error({ error: toErrorMessage(error) }, 'File upload failed');
        res.status(500).json({
            error: 'File upload failed',
            message: toErrorMessage(error)
        });
    }
});

export { router as uploadRoutes };
