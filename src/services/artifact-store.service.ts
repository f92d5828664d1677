import * as fs from 'fs';
import * as path from 'path';
import type { z } from 'zod';
import { logger, type ILogger } from '../config/logger';
import { getConfig } from '../config/env';
import type { RequirementsArtifactRef, RequirementsDocument } from '../types/requirements';
import type { EvidenceMap, RunReport } from '../types/evidence';
import { EvidenceMapSchema, RequirementsDocumentSchema } from '../types/schemas';

// Interfaces for better testability
export interface IArtifactFileSystem {
    existsSync(path: string): boolean;
    mkdirSync(path: string, options: { recursive: true }): unknown;
    readFileSync(path: string, encoding: 'utf8'): string;
    writeFileSync(path: string, data: string, encoding: 'utf8'): void;
    readdirSync(path: string): string[];
}

export interface IArtifactStore {
    saveRequirements(document: RequirementsDocument): string;
    loadRequirements(roleId: string, jdHash: string): RequirementsDocument;
    hasRequirements(roleId: string, jdHash: string): boolean;
    requirementsPath(roleId: string, jdHash: string): string;
    findRequirementsByJdHash(jdHash: string): { document: RequirementsDocument; path: string };
    listRequirements(): RequirementsArtifactRef[];
    saveEvidenceMap(evidenceMap: EvidenceMap): string;
    loadEvidenceMap(jdHash: string, resumeHash: string, runId: string): EvidenceMap;
    saveRunReport(report: RunReport): string;
}

const REQUIREMENTS_PREFIX = 'job_requirements';
const REQUIREMENTS_SUFFIX = 'v1.json';
const EVIDENCE_HASH_LENGTH = 16;

/**
 * Raised when a frozen requirements artifact does not exist.
 * Requirements are never regenerated implicitly; the caller must create them.
 */
export class RequirementsNotFoundError extends Error {
    constructor(
        public readonly roleId: string | undefined,
        public readonly jdHash: string
    ) {
        const key = roleId === undefined ? `jd_hash=${jdHash}` : `role_id=${roleId}, jd_hash=${jdHash}`;
        super(
            `Requirements artifact not found for ${key}. ` +
            'Create it first with POST /requirements using the same job description text; ' +
            'frozen requirements are never regenerated automatically.'
        );
        this.name = 'RequirementsNotFoundError';
    }
}

export class EvidenceMapNotFoundError extends Error {
    constructor(public readonly location: string) {
        super(`Evidence map not found: ${location}`);
        this.name = 'EvidenceMapNotFoundError';
    }
}

export class ArtifactKeyError extends Error {
    constructor(public readonly field: string, public readonly value: string) {
        super(`Artifact key "${field}" has no usable characters: ${JSON.stringify(value)}`);
        this.name = 'ArtifactKeyError';
    }
}

export class ArtifactValidationError extends Error {
    constructor(public readonly location: string, details: string) {
        super(`Artifact ${location} is invalid: ${details}`);
        this.name = 'ArtifactValidationError';
    }
}

/**
 * Keep only [A-Za-z0-9_-] so a key can never escape the artifacts directory
 */
export function sanitizeKeySegment(value: string, field: string): string {
    const safe = value.replace(/[^A-Za-z0-9_-]/g, '');
    if (!safe) {
        throw new ArtifactKeyError(field, value);
    }
    return safe;
}

export function requirementsFileName(roleId: string, jdHash: string): string {
    const safeRole = sanitizeKeySegment(roleId, 'role_id');
    const safeHash = sanitizeKeySegment(jdHash, 'jd_hash');
    return `${REQUIREMENTS_PREFIX}.${safeRole}.${safeHash}.${REQUIREMENTS_SUFFIX}`;
}

export function evidenceFileName(jdHash: string, resumeHash: string, runId: string): string {
    const safeJd = sanitizeKeySegment(jdHash, 'jd_hash').slice(0, EVIDENCE_HASH_LENGTH);
    const safeResume = sanitizeKeySegment(resumeHash, 'resume_hash').slice(0, EVIDENCE_HASH_LENGTH);
    const safeRun = sanitizeKeySegment(runId, 'run_id');
    return `evidence_${safeJd}_${safeResume}_${safeRun}.json`;
}

function describeIssues(error: z.ZodError): string {
    return error.errors
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
}

/**
 * Artifact Store with Dependency Injection
 *
 * Persists requirements documents, evidence maps and run reports as
 * pretty-printed JSON files. File names carry the storage key, so artifacts
 * are discoverable by role and job-description hash without an index.
 */
export class ArtifactStoreService implements IArtifactStore {
    constructor(
        private baseDir: string,
        private logger: ILogger,
        private fileSystem: IArtifactFileSystem = fs
    ) { }

    /**
     * Factory method for production use
     */
    static create(): ArtifactStoreService {
        return new ArtifactStoreService(path.resolve(getConfig().artifactsDir), logger, fs);
    }

    /**
     * Freeze a requirements document under (role_id, jd_hash)
     */
    saveRequirements(document: RequirementsDocument): string {
        const fileName = requirementsFileName(document.role_id, document.jd_hash);
        const parsed = RequirementsDocumentSchema.safeParse(document);
        if (!parsed.success) {
            throw new ArtifactValidationError(fileName, describeIssues(parsed.error));
        }

        const location = this.writeJson(fileName, document);

        this.logger.info({
            roleId: document.role_id,
            jdHash: document.jd_hash,
            requirementsCount: document.requirements.length,
            location
        }, 'Requirements artifact saved');

        return location;
    }

    /**
     * Load a frozen requirements document. Fails when it does not exist.
     */
    loadRequirements(roleId: string, jdHash: string): RequirementsDocument {
        const location = this.requirementsPath(roleId, jdHash);

        if (!this.fileSystem.existsSync(location)) {
            this.logger.warn({ roleId, jdHash }, 'Requirements artifact missing');
            throw new RequirementsNotFoundError(roleId, jdHash);
        }

        return this.readRequirements(location, sanitizeKeySegment(jdHash, 'jd_hash'));
    }

    hasRequirements(roleId: string, jdHash: string): boolean {
        return this.fileSystem.existsSync(this.requirementsPath(roleId, jdHash));
    }

    requirementsPath(roleId: string, jdHash: string): string {
        return this.resolve(requirementsFileName(roleId, jdHash));
    }

    /**
     * Look a document up by job-description hash alone.
     * With several roles on the same hash, the first file name in sort order wins.
     */
    findRequirementsByJdHash(jdHash: string): { document: RequirementsDocument; path: string } {
        const safeHash = sanitizeKeySegment(jdHash, 'jd_hash');
        const candidates = this.listRequirements().filter(ref => ref.jdHash === safeHash);

        if (candidates.length === 0) {
            this.logger.warn({ jdHash }, 'No requirements artifact for job description hash');
            throw new RequirementsNotFoundError(undefined, jdHash);
        }

        const location = candidates[0].path;
        return { document: this.readRequirements(location, safeHash), path: location };
    }

    listRequirements(): RequirementsArtifactRef[] {
        if (!this.fileSystem.existsSync(this.baseDir)) {
            return [];
        }

        const refs: RequirementsArtifactRef[] = [];
        for (const fileName of [...this.fileSystem.readdirSync(this.baseDir)].sort()) {
            const parts = fileName.split('.');
            if (parts.length !== 5 || parts[0] !== REQUIREMENTS_PREFIX || `${parts[3]}.${parts[4]}` !== REQUIREMENTS_SUFFIX) {
                continue;
            }
            refs.push({ roleId: parts[1], jdHash: parts[2], path: this.resolve(fileName) });
        }
        return refs;
    }

    /**
     * Record an evidence map. The run ID is part of the key, so repeated runs
     * for the same job description and resume never overwrite each other.
     */
    saveEvidenceMap(evidenceMap: EvidenceMap): string {
        const fileName = evidenceFileName(evidenceMap.jd_hash, evidenceMap.resume_hash, evidenceMap.run_id);
        const parsed = EvidenceMapSchema.safeParse(evidenceMap);
        if (!parsed.success) {
            throw new ArtifactValidationError(fileName, describeIssues(parsed.error));
        }

        const location = this.writeJson(fileName, evidenceMap);

        this.logger.info({
            runId: evidenceMap.run_id,
            jdHash: evidenceMap.jd_hash,
            resumeHash: evidenceMap.resume_hash,
            matchesCount: evidenceMap.matches.length,
            location
        }, 'Evidence map saved');

        return location;
    }

    loadEvidenceMap(jdHash: string, resumeHash: string, runId: string): EvidenceMap {
        const location = this.resolve(evidenceFileName(jdHash, resumeHash, runId));
        if (!this.fileSystem.existsSync(location)) {
            throw new EvidenceMapNotFoundError(location);
        }

        const parsed = EvidenceMapSchema.safeParse(this.readJson(location));
        if (!parsed.success) {
            throw new ArtifactValidationError(location, describeIssues(parsed.error));
        }
        return parsed.data;
    }

    saveRunReport(report: RunReport): string {
        const fileName = `run_report_${sanitizeKeySegment(report.run_id, 'run_id')}.json`;
        const location = this.writeJson(fileName, report);

        this.logger.info({ runId: report.run_id, location }, 'Run report saved');

        return location;
    }

    private readRequirements(location: string, expectedJdHash: string): RequirementsDocument {
        const parsed = RequirementsDocumentSchema.safeParse(this.readJson(location));
        if (!parsed.success) {
            throw new ArtifactValidationError(location, describeIssues(parsed.error));
        }
        if (parsed.data.jd_hash !== expectedJdHash) {
            throw new ArtifactValidationError(location, `jd_hash ${parsed.data.jd_hash} does not match file key ${expectedJdHash}`);
        }
        return parsed.data;
    }

    private readJson(location: string): unknown {
        const content = this.fileSystem.readFileSync(location, 'utf8');
        try {
            return JSON.parse(content);
        } catch (error) {
            throw new ArtifactValidationError(location, error instanceof Error ? error.message : 'unparseable JSON');
        }
    }

    private writeJson(fileName: string, data: object): string {
        this.fileSystem.mkdirSync(this.baseDir, { recursive: true });
        const location = this.resolve(fileName);
        this.fileSystem.writeFileSync(location, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
        return location;
    }

    private resolve(fileName: string): string {
        return path.join(this.baseDir, fileName);
    }
}

// Singleton instance
let artifactStoreService: ArtifactStoreService | null = null;

export function getArtifactStoreService(): ArtifactStoreService {
    if (!artifactStoreService) {
        artifactStoreService = ArtifactStoreService.create();
    }
    return artifactStoreService;
}
