import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateChatTurnTable1760860980000 implements MigrationInterface {
    name = 'CreateChatTurnTable1760860980000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "chat_turns" ("id" SERIAL NOT NULL, "interview_id" integer NOT NULL, "question" text NOT NULL, "answer" text, "score" integer, "level" integer NOT NULL DEFAULT '1', "asked_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), "answered_at" TIMESTAMP WITH TIME ZONE, CONSTRAINT "UQ_chat_turns_interview_level" UNIQUE ("interview_id", "level"), CONSTRAINT "PK_chat_turns" PRIMARY KEY ("id"))`);
        await queryRunner.query(`ALTER TABLE "chat_turns" ADD CONSTRAINT "FK_chat_turns_session" FOREIGN KEY ("interview_id") REFERENCES "chat_sessions"("interview_id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "chat_turns" DROP CONSTRAINT "FK_chat_turns_session"`);
        await queryRunner.query(`DROP TABLE "chat_turns"`);
    }

}
