import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateApplicationTable1760860800000 implements MigrationInterface {
    name = 'CreateApplicationTable1760860800000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "applications" ("id" SERIAL NOT NULL, "job_id" character varying(64) NOT NULL, "candidate_id" character varying(64) NOT NULL, "status" character varying(20) NOT NULL DEFAULT 'NEW', "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "UQ_applications_job_candidate" UNIQUE ("job_id", "candidate_id"), CONSTRAINT "PK_applications" PRIMARY KEY ("id"))`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP TABLE "applications"`);
    }

}
