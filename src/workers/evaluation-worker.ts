import { UnrecoverableError } from 'bullmq';
import { errorFields, type ILogger } from '../config/logger';
import { InconsistentError, isEngineError } from '../errors/engine-errors';
import type { EvaluationJob, EvaluationJobResult } from '../queue/queue-config';
import type { IAnswerJudge } from '../services/answer-judge.service';
import type { IChatLedger } from '../services/chat-ledger.service';
import type { IConsistencyGuard } from '../services/consistency-guard.service';
import type { IEvaluationStore } from '../services/evaluation-store.service';

export interface IEvaluationWorker {
    processEvaluation(job: EvaluationJob): Promise<EvaluationJobResult>;
}

/**
 * Evaluation Worker with Dependency Injection
 *
 * Processes one answered chat turn:
 * 1. Judge the answer
 * 2. Record the evaluation
 * 3. Re-aggregate the interview through the consistency guard
 *
 * A retried job whose evaluation was already recorded goes straight to
 * step 3. Two runs of one job that overlap may both judge, but the store
 * keeps the first evaluation of a turn and hands its id to both. Only judge outages are retried; every other engine error fails
 * the job for good.
 */
export class EvaluationWorker implements IEvaluationWorker {
    constructor(
        private ledger: IChatLedger,
        private judge: IAnswerJudge,
        private evaluations: IEvaluationStore,
        private guard: IConsistencyGuard,
        private logger: ILogger
    ) { }

    async processEvaluation(job: EvaluationJob): Promise<EvaluationJobResult> {
        const { interviewId, turnId } = job.data;

        this.logger.info({
            interviewId,
            turnId,
            workerJobId: job.id,
            attempt: job.attemptsMade + 1
        }, 'Starting turn evaluation');

        try {
            const evaluationId = await this.ensureEvaluation(interviewId, turnId);
            const outcome = await this.guard.aggregate(interviewId);

            this.logger.info({ interviewId, turnId, evaluationId, outcome: outcome.kind }, 'Turn evaluation completed');
            return { evaluationId, outcome: outcome.kind };
        } catch (error) {
            this.logger.error({ interviewId, turnId, ...errorFields(error) }, 'Turn evaluation failed');

            if (isEngineError(error) && error.kind !== 'DependencyUnavailable') {
                // Retrying cannot fix a missing row or a broken invariant
                throw new UnrecoverableError(error.message);
            }
            throw error;
        }
    }

    private async ensureEvaluation(interviewId: number, turnId: number): Promise<number> {
        const recorded = await this.evaluations.listByInterview(interviewId);
        const existing = recorded.find((evaluation) => evaluation.turnId === turnId);
        if (existing) {
            this.logger.info({ interviewId, turnId, evaluationId: existing.id }, 'Turn already evaluated, skipping judge');
            return existing.id;
        }

        const turn = await this.ledger.getTurn(turnId);
        if (turn.interviewId !== interviewId) {
            throw new InconsistentError(`Chat turn ${turnId} belongs to interview ${turn.interviewId}`, { interviewId, turnId });
        }
        if (turn.answer === null) {
            throw new InconsistentError(`Chat turn ${turnId} has no answer to evaluate`, { interviewId, turnId });
        }

        const verdict = await this.judge.score(turn.question, turn.answer);

        return this.evaluations.record(interviewId, turn.question, turn.answer, verdict.scores, verdict.tokens, {
            turnId,
            explanations: verdict.explanations,
            finalEvaluation: verdict.finalEvaluation
        });
    }
}
