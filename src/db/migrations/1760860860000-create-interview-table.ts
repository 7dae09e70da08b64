import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateInterviewTable1760860860000 implements MigrationInterface {
    name = 'CreateInterviewTable1760860860000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "interviews" ("id" SERIAL NOT NULL, "candidate_id" character varying(64) NOT NULL, "application_id" integer NOT NULL, "job_id" character varying(64) NOT NULL, "scheduled_by_id" character varying(64) NOT NULL, "type" character varying(20) NOT NULL, "status" character varying(20) NOT NULL DEFAULT 'NOT_SCHEDULED', "scheduled_at" TIMESTAMP WITH TIME ZONE, "duration" integer, "timezone" character varying(64), "join_token" character varying(64), "token_expiry" TIMESTAMP WITH TIME ZONE, "token_consumed_at" TIMESTAMP WITH TIME ZONE, "aggregation_outcome" character varying(32), "feedback" text, "rating" integer, "cancel_reason" text, "started_at" TIMESTAMP WITH TIME ZONE, "completed_at" TIMESTAMP WITH TIME ZONE, "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_interviews" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE UNIQUE INDEX "UQ_interviews_join_token" ON "interviews" ("join_token")`);
        await queryRunner.query(`ALTER TABLE "interviews" ADD CONSTRAINT "FK_interviews_application" FOREIGN KEY ("application_id") REFERENCES "applications"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "interviews" DROP CONSTRAINT "FK_interviews_application"`);
        await queryRunner.query(`DROP INDEX "UQ_interviews_join_token"`);
        await queryRunner.query(`DROP TABLE "interviews"`);
    }

}
