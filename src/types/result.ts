/**
 * Interview Result types
 */

export type PassStatus = 'PASS' | 'FAIL';

export const KNOWLEDGE_LEVELS = ['BEGINNER', 'INTERMEDIATE', 'ADVANCED', 'EXPERT'] as const;

export type KnowledgeLevel = typeof KNOWLEDGE_LEVELS[number];

// Numeric part of a result; everything the narrative is generated from
export interface AggregationStatistics {
    evaluatedCount: number;
    totalQuestions: number;
    averageFactualAccuracy: number;
    averageCompleteness: number;
    averageRelevance: number;
    averageCoherence: number;
    averageScore: number;
    passStatus: PassStatus;
    knowledgeLevel: KnowledgeLevel;
}

export interface Narrative {
    summaryResult: string;
    recommendations: string | null;
}

export interface InterviewResultRecord extends AggregationStatistics, Narrative {
    interviewId: number;
    candidateId: string;
    applicationId: number;
    jobId: string;
    updatedAt: Date;
}

export type AggregationOutcome =
    | { kind: 'AGGREGATED'; result: InterviewResultRecord }
    | { kind: 'NO_QUESTIONS' }
    | { kind: 'NOTHING_TO_AGGREGATE'; totalQuestions: number };
