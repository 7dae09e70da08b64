import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateChatSessionTable1760860920000 implements MigrationInterface {
    name = 'CreateChatSessionTable1760860920000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "chat_sessions" ("interview_id" integer NOT NULL, "last_level" integer NOT NULL DEFAULT '0', "opened_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_chat_sessions" PRIMARY KEY ("interview_id"))`);
        await queryRunner.query(`ALTER TABLE "chat_sessions" ADD CONSTRAINT "FK_chat_sessions_interview" FOREIGN KEY ("interview_id") REFERENCES "interviews"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "chat_sessions" DROP CONSTRAINT "FK_chat_sessions_interview"`);
        await queryRunner.query(`DROP TABLE "chat_sessions"`);
    }

}
