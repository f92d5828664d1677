import { Column, Entity, PrimaryGeneratedColumn, CreateDateColumn, ManyToOne, JoinColumn } from "typeorm";
import { Job } from "./job.entity";
import type { ArtifactPayload } from "../../types/evaluation";

export type ArtifactStage = 'evidence' | 'score';

/**
 * JobArtifact Entity
 *
 * Results of a completed evaluation job:
 * - evidence: validated evidence map plus its artifact path
 * - score: score result, gap report and run report path
 *
 * The JSON artifact files remain the source of truth; these rows let
 * GET /result answer without touching the artifacts directory.
 */
@Entity({ name: "job_artifacts" })
export class JobArtifact {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: "job_id" })
    jobId!: number;

    @ManyToOne(() => Job, { onDelete: "CASCADE" })
    @JoinColumn({ name: "job_id" })
    job!: Job;

    @Column({
        type: "varchar",
        length: 20
    })
    stage!: ArtifactStage;

    @Column({
        type: "jsonb"
    })
    payload_json!: ArtifactPayload;

    @Column({
        type: "varchar",
        length: 20,
        default: "1.0"
    })
    version!: string; // requirements_version the job was scored against

    @CreateDateColumn({ name: "created_at" })
    created_at!: Date;
}
