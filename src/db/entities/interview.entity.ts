import { Column, Entity, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn, ManyToOne, JoinColumn, Index } from "typeorm";
import { Application } from "./application.entity";
import type { AggregationOutcomeKind, InterviewRecord, InterviewStatus, InterviewType } from "../../types/interview";

/**
 * Interview Entity
 *
 * Scheduling and status envelope of one interview. The row doubles as the
 * lock target for everything owned by the interview: chat turns are appended,
 * evaluations aggregated and transitions applied while holding
 * `SELECT ... FOR UPDATE` on it.
 *
 * Join token lifecycle:
 * 1. SCHEDULE / INVITE / RESCHEDULE → fresh join_token + token_expiry
 * 2. Candidate joins → token_consumed_at set together with status JOINED
 * 3. Consumed or expired tokens are rejected without touching the status
 *
 * aggregation_outcome holds the Aggregator's last outcome; COMPLETE is only
 * accepted when it is AGGREGATED or NO_QUESTIONS.
 */
@Entity({ name: "interviews" })
export class Interview implements InterviewRecord {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: "candidate_id", type: "varchar", length: 64 })
    candidateId!: string;

    @Column({ name: "application_id", type: "int" })
    applicationId!: number;

    @ManyToOne(() => Application, { onDelete: "CASCADE" })
    @JoinColumn({ name: "application_id" })
    application?: Application;

    @Column({ name: "job_id", type: "varchar", length: 64 })
    jobId!: string;

    @Column({ name: "scheduled_by_id", type: "varchar", length: 64 })
    scheduledById!: string;

    @Column({ type: "varchar", length: 20 })
    type!: InterviewType;

    @Column({ type: "varchar", length: 20, default: "NOT_SCHEDULED" })
    status!: InterviewStatus;

    @Column({ name: "scheduled_at", type: "timestamptz", nullable: true })
    scheduledAt!: Date | null;

    @Column({ type: "int", nullable: true })
    duration!: number | null; // minutes

    @Column({ type: "varchar", length: 64, nullable: true })
    timezone!: string | null;

    @Index("UQ_interviews_join_token", { unique: true })
    @Column({ name: "join_token", type: "varchar", length: 64, nullable: true })
    joinToken!: string | null;

    @Column({ name: "token_expiry", type: "timestamptz", nullable: true })
    tokenExpiry!: Date | null;

    @Column({ name: "token_consumed_at", type: "timestamptz", nullable: true })
    tokenConsumedAt!: Date | null;

    @Column({ name: "aggregation_outcome", type: "varchar", length: 32, nullable: true })
    aggregationOutcome!: AggregationOutcomeKind | null;

    @Column({ type: "text", nullable: true })
    feedback!: string | null;

    @Column({ type: "int", nullable: true })
    rating!: number | null;

    @Column({ name: "cancel_reason", type: "text", nullable: true })
    cancelReason!: string | null;

    @Column({ name: "started_at", type: "timestamptz", nullable: true })
    startedAt!: Date | null;

    @Column({ name: "completed_at", type: "timestamptz", nullable: true })
    completedAt!: Date | null;

    @CreateDateColumn({ name: "created_at", type: "timestamptz" })
    createdAt!: Date;

    @UpdateDateColumn({ name: "updated_at", type: "timestamptz" })
    updatedAt!: Date;
}
