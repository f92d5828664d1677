import { Column, Entity, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn } from "typeorm";

export type JobStatus = 'queued' | 'processing' | 'completed' | 'failed';

/**
 * Job Entity
 *
 * One evaluation request: a resume file scored against a frozen
 * requirements artifact identified by (role_id, jd_hash).
 *
 * Job Lifecycle:
 * 1. POST /evaluate → status: "queued"
 * 2. Worker picks up job → status: "processing"
 * 3. Evidence matched, validated and scored → status: "completed"
 * 4. Any failure → status: "failed" with error_code
 */
@Entity({ name: "jobs" })
export class Job {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({
        type: "varchar",
        length: 50,
        default: "queued"
    })
    status!: JobStatus;

    @Column({
        type: "varchar",
        length: 100
    })
    role_id!: string;

    @Column({
        type: "varchar",
        length: 64
    })
    jd_hash!: string;

    @Column({ type: "int" })
    resume_file_id!: number;

    @CreateDateColumn()
    created_at!: Date;

    @UpdateDateColumn()
    updated_at!: Date;

    @Column({
        type: "varchar",
        nullable: true
    })
    error_code!: string | null; // requirements_missing, processing_error

    @Column({
        type: "int",
        default: 0
    })
    attempts!: number;
}
