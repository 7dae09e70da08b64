import { Column, Entity, PrimaryGeneratedColumn, CreateDateColumn, ManyToOne, JoinColumn, Index } from "typeorm";
import { Interview } from "./interview.entity";
import type { EvaluationRecord } from "../../types/evaluation";

/**
 * Evaluation Entity
 *
 * Judged record of one answered question. Written once by the Evaluation
 * Store and never updated; removed only through the interview cascade.
 *
 * Dimension scores are normalized to [0, 1] (null when the judge gave none).
 * score is the mean of the four dimensions and is null unless all four exist.
 * A chat turn has at most one evaluation.
 */
@Entity({ name: "evaluations" })
@Index("IDX_evaluations_interview", ["interviewId"])
@Index("UQ_evaluations_turn", ["turnId"], { unique: true })
export class Evaluation implements EvaluationRecord {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: "interview_id", type: "int" })
    interviewId!: number;

    @ManyToOne(() => Interview, { onDelete: "CASCADE" })
    @JoinColumn({ name: "interview_id" })
    interview?: Interview;

    @Column({ name: "turn_id", type: "int", nullable: true })
    turnId!: number | null;

    @Column({ type: "text" })
    question!: string;

    @Column({ type: "text" })
    answer!: string;

    @Column({ name: "factual_accuracy", type: "double precision", nullable: true })
    factualAccuracy!: number | null;

    @Column({ name: "factual_accuracy_explanation", type: "text", nullable: true })
    factualAccuracyExplanation!: string | null;

    @Column({ type: "double precision", nullable: true })
    completeness!: number | null;

    @Column({ name: "completeness_explanation", type: "text", nullable: true })
    completenessExplanation!: string | null;

    @Column({ type: "double precision", nullable: true })
    relevance!: number | null;

    @Column({ name: "relevance_explanation", type: "text", nullable: true })
    relevanceExplanation!: string | null;

    @Column({ type: "double precision", nullable: true })
    coherence!: number | null;

    @Column({ name: "coherence_explanation", type: "text", nullable: true })
    coherenceExplanation!: string | null;

    @Column({ name: "final_evaluation", type: "text", nullable: true })
    finalEvaluation!: string | null;

    @Column({ type: "double precision", nullable: true })
    score!: number | null;

    @Column({ name: "prompt_tokens", type: "int", default: 0 })
    promptTokens!: number;

    @Column({ name: "completion_tokens", type: "int", default: 0 })
    completionTokens!: number;

    @CreateDateColumn({ name: "evaluated_at", type: "timestamptz" })
    evaluatedAt!: Date;
}
