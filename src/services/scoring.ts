/**
 * Scoring
 *
 * Pure functions behind the Aggregator: validation of dimension scores,
 * per-dimension means, the pass verdict and knowledge-level bucketing.
 * Nothing here touches storage, so the numeric rules are tested directly.
 */
import type { ScoringConfig, KnowledgeLevelCuts } from '../config/env';
import { InvalidScoreError } from '../errors/engine-errors';
import { DIMENSIONS, type Dimension, type DimensionScores, type EvaluationRecord } from '../types/evaluation';
import type { AggregationStatistics, KnowledgeLevel, PassStatus } from '../types/result';

const SCORE_DECIMALS = 4;

export function roundScore(value: number): number {
    const factor = 10 ** SCORE_DECIMALS;
    return Math.round(value * factor) / factor;
}

export function validateDimensionScores(scores: DimensionScores): void {
    for (const dimension of DIMENSIONS) {
        const value = scores[dimension];
        if (value === null) {
            continue;
        }
        if (!Number.isFinite(value) || value < 0 || value > 1) {
            throw new InvalidScoreError(dimension, value, 'a number in [0, 1] or null');
        }
    }
}

/**
 * Aggregate score of one evaluation: the mean of its four dimensions, or
 * null when any dimension is missing.
 */
export function evaluationScore(scores: DimensionScores): number | null {
    let sum = 0;
    for (const dimension of DIMENSIONS) {
        const value = scores[dimension];
        if (value === null) {
            return null;
        }
        sum += value;
    }
    return roundScore(sum / DIMENSIONS.length);
}

export function dimensionScoresOf(evaluation: EvaluationRecord): DimensionScores {
    return {
        factualAccuracy: evaluation.factualAccuracy,
        completeness: evaluation.completeness,
        relevance: evaluation.relevance,
        coherence: evaluation.coherence
    };
}

function isFullyScored(scores: DimensionScores): scores is Record<Dimension, number> {
    return DIMENSIONS.every((dimension) => scores[dimension] !== null);
}

export function decidePass(averageScore: number, passThreshold: number): PassStatus {
    return averageScore >= passThreshold ? 'PASS' : 'FAIL';
}

export function classifyKnowledgeLevel(averageScore: number, cuts: KnowledgeLevelCuts): KnowledgeLevel {
    const [intermediateFrom, advancedFrom, expertFrom] = cuts;
    if (averageScore >= expertFrom) {
        return 'EXPERT';
    }
    if (averageScore >= advancedFrom) {
        return 'ADVANCED';
    }
    if (averageScore >= intermediateFrom) {
        return 'INTERMEDIATE';
    }
    return 'BEGINNER';
}

/**
 * Summary statistics over the evaluations of one interview.
 *
 * Only evaluations with all four dimensions count; partially scored ones are
 * left out of every mean rather than counted as zero. Returns null when no
 * evaluation is fully scored.
 */
export function computeStatistics(
    evaluations: readonly EvaluationRecord[],
    totalQuestions: number,
    scoring: ScoringConfig
): AggregationStatistics | null {
    const scored = evaluations.map(dimensionScoresOf).filter(isFullyScored);
    if (scored.length === 0) {
        return null;
    }

    const mean = (dimension: Dimension): number =>
        roundScore(scored.reduce((sum, scores) => sum + scores[dimension], 0) / scored.length);

    const averageFactualAccuracy = mean('factualAccuracy');
    const averageCompleteness = mean('completeness');
    const averageRelevance = mean('relevance');
    const averageCoherence = mean('coherence');

    // Equal weighting of the four dimensions
    const averageScore = roundScore(
        (averageFactualAccuracy + averageCompleteness + averageRelevance + averageCoherence) / DIMENSIONS.length
    );

    return {
        evaluatedCount: scored.length,
        totalQuestions,
        averageFactualAccuracy,
        averageCompleteness,
        averageRelevance,
        averageCoherence,
        averageScore,
        passStatus: decidePass(averageScore, scoring.passThreshold),
        knowledgeLevel: classifyKnowledgeLevel(averageScore, scoring.knowledgeLevelCuts)
    };
}

export function statisticsEqual(a: AggregationStatistics, b: AggregationStatistics): boolean {
    return a.evaluatedCount === b.evaluatedCount
        && a.totalQuestions === b.totalQuestions
        && a.averageFactualAccuracy === b.averageFactualAccuracy
        && a.averageCompleteness === b.averageCompleteness
        && a.averageRelevance === b.averageRelevance
        && a.averageCoherence === b.averageCoherence
        && a.averageScore === b.averageScore
        && a.passStatus === b.passStatus
        && a.knowledgeLevel === b.knowledgeLevel;
}
