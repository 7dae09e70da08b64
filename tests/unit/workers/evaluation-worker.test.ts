import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { UnrecoverableError } from 'bullmq';
import { EvaluationWorker } from '../../../src/workers/evaluation-worker';
import type { EvaluationJob } from '../../../src/queue/queue-config';
import type { IAnswerJudge } from '../../../src/services/answer-judge.service';
import type { IChatLedger } from '../../../src/services/chat-ledger.service';
import type { IConsistencyGuard } from '../../../src/services/consistency-guard.service';
import type { IEvaluationStore } from '../../../src/services/evaluation-store.service';
import type { ILogger } from '../../../src/config/logger';
import {
    DependencyUnavailableError,
    InconsistentError,
    NotFoundError
} from '../../../src/errors/engine-errors';
import type { EvaluationRecord, JudgeVerdict } from '../../../src/types/evaluation';
import type { ChatTurnRecord } from '../../../src/types/interview';
import { AggregatorService } from '../../../src/services/aggregator.service';
import { ChatLedgerService } from '../../../src/services/chat-ledger.service';
import { ConsistencyGuardService } from '../../../src/services/consistency-guard.service';
import { EvaluationStoreService } from '../../../src/services/evaluation-store.service';
import { LifecycleCoordinatorService } from '../../../src/services/lifecycle-coordinator.service';
import { InMemoryEngineStore } from '../../support/in-memory-store';
import { TOKENS, createMockLogger, scores, seedInterview, seedTurns } from '../../support/fixtures';

const turn: ChatTurnRecord = {
    id: 11,
    interviewId: 5,
    question: 'What is a mutex?',
    answer: 'A lock only one holder can take at a time',
    score: 4,
    level: 1,
    askedAt: new Date('2026-03-01T10:00:00.000Z'),
    answeredAt: new Date('2026-03-01T10:01:00.000Z')
};

const verdict: JudgeVerdict = {
    scores: scores(0.75, 0.5, 0.75, 0.75),
    explanations: { factualAccuracy: 'Correct', completeness: 'No mention of fairness' },
    finalEvaluation: 'Solid answer',
    tokens: TOKENS
};

function recordedEvaluation(id: number, turnId: number | null): EvaluationRecord {
    return {
        id,
        interviewId: 5,
        turnId,
        question: turn.question,
        answer: 'A lock',
        factualAccuracy: 0.75,
        factualAccuracyExplanation: null,
        completeness: 0.5,
        completenessExplanation: null,
        relevance: 0.75,
        relevanceExplanation: null,
        coherence: 0.75,
        coherenceExplanation: null,
        finalEvaluation: null,
        score: 0.6875,
        promptTokens: 120,
        completionTokens: 40,
        evaluatedAt: new Date('2026-03-01T10:02:00.000Z')
    };
}

describe('EvaluationWorker', () => {
    let getTurn: Mock<IChatLedger['getTurn']>;
    let score: Mock<IAnswerJudge['score']>;
    let record: Mock<IEvaluationStore['record']>;
    let listByInterview: Mock<IEvaluationStore['listByInterview']>;
    let aggregate: Mock<IConsistencyGuard['aggregate']>;
    let mockLogger: ILogger;
    let worker: EvaluationWorker;

    const job: EvaluationJob = { id: 'turn-11', data: { interviewId: 5, turnId: 11 }, attemptsMade: 0 };

    beforeEach(() => {
        getTurn = vi.fn<IChatLedger['getTurn']>().mockResolvedValue(turn);
        score = vi.fn<IAnswerJudge['score']>().mockResolvedValue(verdict);
        record = vi.fn<IEvaluationStore['record']>().mockResolvedValue(101);
        listByInterview = vi.fn<IEvaluationStore['listByInterview']>().mockResolvedValue([]);
        aggregate = vi.fn<IConsistencyGuard['aggregate']>().mockResolvedValue({
            kind: 'NOTHING_TO_AGGREGATE',
            totalQuestions: 2
        });
        mockLogger = createMockLogger();

        worker = new EvaluationWorker(
            {
                openSession: vi.fn(),
                appendTurn: vi.fn(),
                recordAnswer: vi.fn(),
                listTurns: vi.fn(),
                getTurn
            },
            { score },
            { record, recordWithin: vi.fn(), listByInterview },
            { aggregate, aggregateAndComplete: vi.fn() },
            mockLogger
        );
    });

    describe('processEvaluation', () => {
        it('should judge the answer, record it and re-aggregate', async () => {
            const result = await worker.processEvaluation(job);

            expect(result).toEqual({ evaluationId: 101, outcome: 'NOTHING_TO_AGGREGATE' });
            expect(score).toHaveBeenCalledWith('What is a mutex?', 'A lock only one holder can take at a time');
            expect(record).toHaveBeenCalledWith(
                5,
                'What is a mutex?',
                'A lock only one holder can take at a time',
                verdict.scores,
                TOKENS,
                {
                    turnId: 11,
                    explanations: verdict.explanations,
                    finalEvaluation: 'Solid answer'
                }
            );
            expect(aggregate).toHaveBeenCalledWith(5);
            expect(mockLogger.info).toHaveBeenCalledWith(
                { interviewId: 5, turnId: 11, evaluationId: 101, outcome: 'NOTHING_TO_AGGREGATE' },
                'Turn evaluation completed'
            );
        });

        it('should skip the judge when the turn was already evaluated', async () => {
            listByInterview.mockResolvedValue([recordedEvaluation(70, 10), recordedEvaluation(77, 11)]);
            aggregate.mockResolvedValue({ kind: 'NO_QUESTIONS' });

            const result = await worker.processEvaluation({ ...job, attemptsMade: 1 });

            expect(result).toEqual({ evaluationId: 77, outcome: 'NO_QUESTIONS' });
            expect(getTurn).not.toHaveBeenCalled();
            expect(score).not.toHaveBeenCalled();
            expect(record).not.toHaveBeenCalled();
            expect(aggregate).toHaveBeenCalledWith(5);
        });

        it('should rethrow a judge outage so the job is retried', async () => {
            score.mockRejectedValue(new DependencyUnavailableError('Answer judge', new Error('rate limited')));

            const failure = worker.processEvaluation(job);

            await expect(failure).rejects.toBeInstanceOf(DependencyUnavailableError);
            await expect(failure).rejects.not.toBeInstanceOf(UnrecoverableError);
            expect(record).not.toHaveBeenCalled();
            expect(aggregate).not.toHaveBeenCalled();
            expect(mockLogger.error).toHaveBeenCalledWith(
                { interviewId: 5, turnId: 11, error: 'Answer judge unavailable: rate limited', kind: 'DependencyUnavailable' },
                'Turn evaluation failed'
            );
        });

        it('should fail for good when the turn is missing', async () => {
            getTurn.mockRejectedValue(new NotFoundError('ChatTurn', 11));

            const failure = worker.processEvaluation(job);

            await expect(failure).rejects.toBeInstanceOf(UnrecoverableError);
            await expect(failure).rejects.toThrow('ChatTurn 11 not found');
            expect(score).not.toHaveBeenCalled();
        });

        it('should fail for good when the turn belongs to another interview', async () => {
            getTurn.mockResolvedValue({ ...turn, interviewId: 9 });

            await expect(worker.processEvaluation(job)).rejects.toThrow(
                new UnrecoverableError('Chat turn 11 belongs to interview 9')
            );
            expect(score).not.toHaveBeenCalled();
        });

        it('should fail for good when the turn has no answer', async () => {
            getTurn.mockResolvedValue({ ...turn, answer: null, score: null, answeredAt: null });

            await expect(worker.processEvaluation(job)).rejects.toThrow(
                new UnrecoverableError('Chat turn 11 has no answer to evaluate')
            );
        });

        it('should fail for good on an integrity error from aggregation', async () => {
            aggregate.mockRejectedValue(new InconsistentError('Application 3 already has a result from interview 4'));

            await expect(worker.processEvaluation(job)).rejects.toBeInstanceOf(UnrecoverableError);
        });

        it('should rethrow infrastructure errors unchanged', async () => {
            const connectionError = new Error('Connection terminated unexpectedly');
            aggregate.mockRejectedValue(connectionError);

            await expect(worker.processEvaluation(job)).rejects.toBe(connectionError);
        });
    });

    describe('overlapping runs of one job', () => {
        it('should record a single evaluation for the turn', async () => {
            const store = new InMemoryEngineStore();
            const logger = createMockLogger();
            const aggregator = new AggregatorService(store, logger);
            const coordinator = new LifecycleCoordinatorService(store, logger);
            const evaluations = new EvaluationStoreService(store, logger);
            const realWorker = new EvaluationWorker(
                new ChatLedgerService(store, logger),
                { score },
                evaluations,
                new ConsistencyGuardService(store, aggregator, coordinator, logger),
                logger
            );
            const interview = await seedInterview(store);
            const [answeredTurn] = await seedTurns(store, interview.id, 2, 1);
            const stalled: EvaluationJob = { id: `turn-${answeredTurn}`, data: { interviewId: interview.id, turnId: answeredTurn }, attemptsMade: 0 };

            const [first, second] = await Promise.all([
                realWorker.processEvaluation(stalled),
                realWorker.processEvaluation({ ...stalled, attemptsMade: 1 })
            ]);

            expect(second.evaluationId).toBe(first.evaluationId);
            expect([...store.evaluations.values()].filter((e) => e.turnId === answeredTurn)).toHaveLength(1);
            expect(store.results.get(interview.id)).toMatchObject({ evaluatedCount: 1, totalQuestions: 2 });
        });
    });
});
