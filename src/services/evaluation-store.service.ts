import { logger, type ILogger } from '../config/logger';
import { TypeOrmEngineStore } from '../db/typeorm-engine-store';
import type { IEngineStore, IStoreScope } from '../db/interfaces';
import { InconsistentError, InvalidScoreError, NotFoundError } from '../errors/engine-errors';
import type {
    DimensionScores,
    EvaluationExtras,
    EvaluationRecord,
    TokenCounts
} from '../types/evaluation';
import { evaluationScore, validateDimensionScores } from './scoring';

export interface IEvaluationStore {
    record(
        interviewId: number,
        question: string,
        answer: string,
        scores: DimensionScores,
        tokens: TokenCounts,
        extras?: EvaluationExtras
    ): Promise<number>;
    recordWithin(
        scope: IStoreScope,
        interviewId: number,
        question: string,
        answer: string,
        scores: DimensionScores,
        tokens: TokenCounts,
        extras?: EvaluationExtras
    ): Promise<number>;
    listByInterview(interviewId: number): Promise<EvaluationRecord[]>;
}

function validateTokenCounts(tokens: TokenCounts): void {
    for (const [field, value] of Object.entries(tokens)) {
        if (!Number.isInteger(value) || value < 0) {
            throw new InvalidScoreError(field, value, 'a non-negative integer');
        }
    }
}

/**
 * Evaluation Store
 *
 * Append-only record of judged answers. Writes only the evaluations table:
 * the interview and its application are read, never touched. A chat turn
 * is evaluated at most once; recording it again returns the first id.
 */
export class EvaluationStoreService implements IEvaluationStore {
    constructor(
        private store: IEngineStore,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): EvaluationStoreService {
        return new EvaluationStoreService(TypeOrmEngineStore.create(), logger);
    }

    record(
        interviewId: number,
        question: string,
        answer: string,
        scores: DimensionScores,
        tokens: TokenCounts,
        extras: EvaluationExtras = {}
    ): Promise<number> {
        return this.store.transaction((scope) =>
            this.recordWithin(scope, interviewId, question, answer, scores, tokens, extras)
        );
    }

    /**
     * Insert inside a caller's transaction. The interview row is locked so
     * the insert orders against aggregations and other inserts of the same
     * interview, which makes the per-turn check below race-free.
     */
    async recordWithin(
        scope: IStoreScope,
        interviewId: number,
        question: string,
        answer: string,
        scores: DimensionScores,
        tokens: TokenCounts,
        extras: EvaluationExtras = {}
    ): Promise<number> {
        validateDimensionScores(scores);
        validateTokenCounts(tokens);

        const interview = await scope.findInterview(interviewId, { lock: true });
        if (!interview) {
            throw new NotFoundError('Interview', interviewId);
        }

        const turnId = extras.turnId ?? null;
        if (turnId !== null) {
            const recorded = await scope.findEvaluationByTurn(turnId);
            if (recorded && recorded.interviewId !== interviewId) {
                throw new InconsistentError(
                    `Chat turn ${turnId} was evaluated for interview ${recorded.interviewId}`,
                    { interviewId, turnId }
                );
            }
            if (recorded) {
                this.logger.info({ interviewId, turnId, evaluationId: recorded.id }, 'Turn already evaluated');
                return recorded.id;
            }
        }

        const explanations = extras.explanations ?? {};
        const evaluation = await scope.insertEvaluation({
            interviewId,
            turnId,
            question,
            answer,
            factualAccuracy: scores.factualAccuracy,
            factualAccuracyExplanation: explanations.factualAccuracy ?? null,
            completeness: scores.completeness,
            completenessExplanation: explanations.completeness ?? null,
            relevance: scores.relevance,
            relevanceExplanation: explanations.relevance ?? null,
            coherence: scores.coherence,
            coherenceExplanation: explanations.coherence ?? null,
            finalEvaluation: extras.finalEvaluation ?? null,
            score: evaluationScore(scores),
            promptTokens: tokens.promptTokens,
            completionTokens: tokens.completionTokens
        });

        this.logger.info({
            interviewId,
            evaluationId: evaluation.id,
            turnId: evaluation.turnId,
            score: evaluation.score
        }, 'Evaluation recorded');

        return evaluation.id;
    }

    listByInterview(interviewId: number): Promise<EvaluationRecord[]> {
        return this.store.transaction((scope) => scope.listEvaluations(interviewId));
    }
}

// Singleton instance
let evaluationStore: EvaluationStoreService | null = null;

export function getEvaluationStore(): EvaluationStoreService {
    if (!evaluationStore) {
        evaluationStore = EvaluationStoreService.create();
    }
    return evaluationStore;
}
