import { Column, Entity, PrimaryGeneratedColumn, CreateDateColumn, ManyToOne, JoinColumn, Unique } from "typeorm";
import { ChatSession } from "./chat-session.entity";
import type { ChatTurnRecord } from "../../types/interview";

/**
 * ChatTurn Entity
 *
 * One question/answer exchange of an interview's chat session.
 * A turn is created "asked" (answer null) and becomes "answered" exactly once.
 * (interview_id, level) is unique, levels start at 1 and have no gaps.
 */
@Entity({ name: "chat_turns" })
@Unique("UQ_chat_turns_interview_level", ["interviewId", "level"])
export class ChatTurn implements ChatTurnRecord {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: "interview_id", type: "int" })
    interviewId!: number;

    @ManyToOne(() => ChatSession, { onDelete: "CASCADE" })
    @JoinColumn({ name: "interview_id", referencedColumnName: "interviewId" })
    session?: ChatSession;

    @Column({ type: "text" })
    question!: string;

    @Column({ type: "text", nullable: true })
    answer!: string | null;

    @Column({ type: "int", nullable: true })
    score!: number | null; // 0-5 chat score, null until answered

    @Column({ type: "int", default: 1 })
    level!: number;

    @CreateDateColumn({ name: "asked_at", type: "timestamptz" })
    askedAt!: Date;

    @Column({ name: "answered_at", type: "timestamptz", nullable: true })
    answeredAt!: Date | null;
}
