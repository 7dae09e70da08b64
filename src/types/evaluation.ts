/**
 * Evaluation types
 *
 * One Evaluation is the judged record of a single answered question. The four
 * quality dimensions are normalized to [0, 1]; a dimension the judge could not
 * score is stored as null.
 */

export const DIMENSIONS = ['factualAccuracy', 'completeness', 'relevance', 'coherence'] as const;

export type Dimension = typeof DIMENSIONS[number];

export type DimensionScores = Record<Dimension, number | null>;

export type DimensionExplanations = Partial<Record<Dimension, string | null>>;

export interface TokenCounts {
    promptTokens: number;
    completionTokens: number;
}

export interface EvaluationExtras {
    turnId?: number | null;
    explanations?: DimensionExplanations;
    finalEvaluation?: string | null;
}

export interface EvaluationRecord {
    id: number;
    interviewId: number;
    turnId: number | null;
    question: string;
    answer: string;
    factualAccuracy: number | null;
    factualAccuracyExplanation: string | null;
    completeness: number | null;
    completenessExplanation: string | null;
    relevance: number | null;
    relevanceExplanation: string | null;
    coherence: number | null;
    coherenceExplanation: string | null;
    finalEvaluation: string | null;
    score: number | null; // mean of the four dimensions, null unless all are present
    promptTokens: number;
    completionTokens: number;
    evaluatedAt: Date;
}

export type NewEvaluation = Omit<EvaluationRecord, 'id' | 'evaluatedAt'>;

// Output of the Answer Judge for one question/answer pair
export interface JudgeVerdict {
    scores: DimensionScores;
    explanations: DimensionExplanations;
    finalEvaluation: string | null;
    tokens: TokenCounts;
}
