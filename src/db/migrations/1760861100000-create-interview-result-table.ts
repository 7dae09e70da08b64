import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateInterviewResultTable1760861100000 implements MigrationInterface {
    name = 'CreateInterviewResultTable1760861100000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "interview_results" ("interview_id" integer NOT NULL, "candidate_id" character varying(64) NOT NULL, "application_id" integer NOT NULL, "job_id" character varying(64) NOT NULL, "evaluated_count" integer NOT NULL, "total_questions" integer NOT NULL, "average_factual_accuracy" double precision NOT NULL, "average_completeness" double precision NOT NULL, "average_relevance" double precision NOT NULL, "average_coherence" double precision NOT NULL, "average_score" double precision NOT NULL, "pass_status" character varying(8) NOT NULL, "knowledge_level" character varying(16) NOT NULL, "summary_result" text NOT NULL DEFAULT '', "recommendations" text, "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "UQ_interview_results_application" UNIQUE ("application_id"), CONSTRAINT "CHK_interview_results_counts" CHECK ("evaluated_count" <= "total_questions"), CONSTRAINT "PK_interview_results" PRIMARY KEY ("interview_id"))`);
        await queryRunner.query(`ALTER TABLE "interview_results" ADD CONSTRAINT "FK_interview_results_interview" FOREIGN KEY ("interview_id") REFERENCES "interviews"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "interview_results" DROP CONSTRAINT "FK_interview_results_interview"`);
        await queryRunner.query(`DROP TABLE "interview_results"`);
    }

}
