import type { EvidenceMap, GapReportEntry, ScoreResult } from './evidence';

/**
 * Evaluation job types
 *
 * Queue payloads, and the data stored in JobArtifact.payload_json for each
 * stage of a completed evaluation job.
 */

// Data carried by a BullMQ evaluation job
export interface EvaluationJobData {
    jobId: number;
    roleId: string;
    jdHash: string;
    resumeFileId: number;
}

export interface EvaluationJobResult {
    success: boolean;
    jobId: number;
    runId: string;
}

export interface EvidenceArtifactPayload {
    stage: 'evidence';
    run_id: string;
    evidence_path: string;
    requirements_hash: string;
    evidence_map: EvidenceMap;
}

export interface ScoreArtifactPayload {
    stage: 'score';
    run_id: string;
    report_path: string;
    score: ScoreResult;
    gap_report: GapReportEntry[];
}

export type ArtifactPayload = EvidenceArtifactPayload | ScoreArtifactPayload;

// Final result structure returned to users
export interface EvaluationResult {
    run_id: string;
    score: ScoreResult;
    gap_report: GapReportEntry[];
    requirements_hash: string;
    evidence_path: string;
    report_path: string;
    validation: EvidenceMap['validation'];
}
