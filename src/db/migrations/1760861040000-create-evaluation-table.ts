import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateEvaluationTable1760861040000 implements MigrationInterface {
    name = 'CreateEvaluationTable1760861040000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "evaluations" ("id" SERIAL NOT NULL, "interview_id" integer NOT NULL, "turn_id" integer, "question" text NOT NULL, "answer" text NOT NULL, "factual_accuracy" double precision, "factual_accuracy_explanation" text, "completeness" double precision, "completeness_explanation" text, "relevance" double precision, "relevance_explanation" text, "coherence" double precision, "coherence_explanation" text, "final_evaluation" text, "score" double precision, "prompt_tokens" integer NOT NULL DEFAULT '0', "completion_tokens" integer NOT NULL DEFAULT '0', "evaluated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_evaluations" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE INDEX "IDX_evaluations_interview" ON "evaluations" ("interview_id")`);
        await queryRunner.query(`CREATE UNIQUE INDEX "UQ_evaluations_turn" ON "evaluations" ("turn_id")`);
        await queryRunner.query(`ALTER TABLE "evaluations" ADD CONSTRAINT "FK_evaluations_interview" FOREIGN KEY ("interview_id") REFERENCES "interviews"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "evaluations" DROP CONSTRAINT "FK_evaluations_interview"`);
        await queryRunner.query(`DROP INDEX "UQ_evaluations_turn"`);
        await queryRunner.query(`DROP INDEX "IDX_evaluations_interview"`);
        await queryRunner.query(`DROP TABLE "evaluations"`);
    }

}
