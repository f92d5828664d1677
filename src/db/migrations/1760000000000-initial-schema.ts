import { MigrationInterface, QueryRunner } from "typeorm";

export class InitialSchema1760000000000 implements MigrationInterface {
    name = 'InitialSchema1760000000000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "files" ("id" SERIAL NOT NULL, "type" character varying(20) NOT NULL DEFAULT 'resume', "storage_uri" character varying(500) NOT NULL, "original_name" character varying(255) NOT NULL, "mime_type" character varying(100) NOT NULL, "checksum" character varying(64) NOT NULL, "created_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_files_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE TABLE "jobs" ("id" SERIAL NOT NULL, "status" character varying(50) NOT NULL DEFAULT 'queued', "role_id" character varying(100) NOT NULL, "jd_hash" character varying(64) NOT NULL, "resume_file_id" integer NOT NULL, "created_at" TIMESTAMP NOT NULL DEFAULT now(), "updated_at" TIMESTAMP NOT NULL DEFAULT now(), "error_code" character varying, "attempts" integer NOT NULL DEFAULT '0', CONSTRAINT "PK_jobs_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE TABLE "job_artifacts" ("id" SERIAL NOT NULL, "job_id" integer NOT NULL, "stage" character varying(20) NOT NULL, "payload_json" jsonb NOT NULL, "version" character varying(20) NOT NULL DEFAULT '1.0', "created_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_job_artifacts_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`ALTER TABLE "job_artifacts" ADD CONSTRAINT "FK_job_artifacts_job_id" FOREIGN KEY ("job_id") REFERENCES "jobs"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
        await queryRunner.query(`CREATE INDEX "IDX_jobs_role_jd" ON "jobs" ("role_id", "jd_hash")`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP INDEX "IDX_jobs_role_jd"`);
        await queryRunner.query(`ALTER TABLE "job_artifacts" DROP CONSTRAINT "FK_job_artifacts_job_id"`);
        await queryRunner.query(`DROP TABLE "job_artifacts"`);
        await queryRunner.query(`DROP TABLE "jobs"`);
        await queryRunner.query(`DROP TABLE "files"`);
    }

}
