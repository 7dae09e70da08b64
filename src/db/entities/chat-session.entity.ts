import { Column, Entity, PrimaryColumn, CreateDateColumn, OneToOne, JoinColumn } from "typeorm";
import { Interview } from "./interview.entity";
import type { ChatSessionRecord } from "../../types/interview";

/**
 * ChatSession Entity
 *
 * Ledger ownership record. The primary key IS the interview id, so a second
 * session for the same interview cannot exist; a racing insert fails on the
 * primary key instead of creating a duplicate.
 *
 * last_level is the highest turn level handed out so far; the next turn gets
 * last_level + 1 under the session's row lock.
 */
@Entity({ name: "chat_sessions" })
export class ChatSession implements ChatSessionRecord {
    @PrimaryColumn({ name: "interview_id", type: "int" })
    interviewId!: number;

    @OneToOne(() => Interview, { onDelete: "CASCADE" })
    @JoinColumn({ name: "interview_id" })
    interview?: Interview;

    @Column({ name: "last_level", type: "int", default: 0 })
    lastLevel!: number;

    @CreateDateColumn({ name: "opened_at", type: "timestamptz" })
    openedAt!: Date;
}
