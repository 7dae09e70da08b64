import { Column, Entity, PrimaryColumn, UpdateDateColumn, OneToOne, JoinColumn, Unique, Check } from "typeorm";
import { Interview } from "./interview.entity";
import type { InterviewResultRecord, KnowledgeLevel, PassStatus } from "../../types/result";

/**
 * InterviewResult Entity
 *
 * Aggregated verdict of one interview, keyed by the interview id itself.
 * Written only by the Aggregator, always as a whole row
 * (INSERT ... ON CONFLICT (interview_id) DO UPDATE), never patched field by field.
 *
 * candidate_id, application_id and job_id are denormalized for result
 * queries by candidate, application and job.
 */
@Entity({ name: "interview_results" })
@Unique("UQ_interview_results_application", ["applicationId"])
@Check("CHK_interview_results_counts", `"evaluated_count" <= "total_questions"`)
export class InterviewResult implements InterviewResultRecord {
    @PrimaryColumn({ name: "interview_id", type: "int" })
    interviewId!: number;

    @OneToOne(() => Interview, { onDelete: "CASCADE" })
    @JoinColumn({ name: "interview_id" })
    interview?: Interview;

    @Column({ name: "candidate_id", type: "varchar", length: 64 })
    candidateId!: string;

    @Column({ name: "application_id", type: "int" })
    applicationId!: number;

    @Column({ name: "job_id", type: "varchar", length: 64 })
    jobId!: string;

    @Column({ name: "evaluated_count", type: "int" })
    evaluatedCount!: number;

    @Column({ name: "total_questions", type: "int" })
    totalQuestions!: number;

    @Column({ name: "average_factual_accuracy", type: "double precision" })
    averageFactualAccuracy!: number;

    @Column({ name: "average_completeness", type: "double precision" })
    averageCompleteness!: number;

    @Column({ name: "average_relevance", type: "double precision" })
    averageRelevance!: number;

    @Column({ name: "average_coherence", type: "double precision" })
    averageCoherence!: number;

    @Column({ name: "average_score", type: "double precision" })
    averageScore!: number;

    @Column({ name: "pass_status", type: "varchar", length: 8 })
    passStatus!: PassStatus;

    @Column({ name: "knowledge_level", type: "varchar", length: 16 })
    knowledgeLevel!: KnowledgeLevel;

    @Column({ name: "summary_result", type: "text", default: "" })
    summaryResult!: string;

    @Column({ type: "text", nullable: true })
    recommendations!: string | null;

    @UpdateDateColumn({ name: "updated_at", type: "timestamptz" })
    updatedAt!: Date;
}
