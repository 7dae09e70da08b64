import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { AggregatorService, type INarrativeGenerator } from '../../../src/services/aggregator.service';
import { EvaluationStoreService } from '../../../src/services/evaluation-store.service';
import { DEFAULT_SCORING } from '../../../src/config/env';
import { InconsistentError, NotFoundError } from '../../../src/errors/engine-errors';
import type { ILogger } from '../../../src/config/logger';
import type { Narrative } from '../../../src/types/result';
import { InMemoryEngineStore } from '../../support/in-memory-store';
import { TOKENS, createMockLogger, scores, seedInterview, seedTurns } from '../../support/fixtures';

describe('AggregatorService', () => {
    let store: InMemoryEngineStore;
    let mockLogger: ILogger;
    let summarize: Mock<INarrativeGenerator['summarize']>;
    let aggregator: AggregatorService;
    let evaluations: EvaluationStoreService;

    beforeEach(() => {
        store = new InMemoryEngineStore();
        mockLogger = createMockLogger();
        summarize = vi.fn<INarrativeGenerator['summarize']>().mockResolvedValue({
            summaryResult: 'Strong fundamentals',
            recommendations: 'Practice system design'
        });
        aggregator = new AggregatorService(store, mockLogger, DEFAULT_SCORING, { summarize }, 50);
        evaluations = new EvaluationStoreService(store, mockLogger);
    });

    // Four questions asked, the first three answered and scored 0.8/0.9/0.7/0.85
    async function seedScenario(): Promise<number> {
        const interview = await seedInterview(store);
        const turnIds = await seedTurns(store, interview.id, 4, 3);
        for (const turnId of turnIds.slice(0, 3)) {
            await evaluations.record(interview.id, 'Q', 'A', scores(0.8, 0.9, 0.7, 0.85), TOKENS, { turnId });
        }
        return interview.id;
    }

    describe('aggregate', () => {
        it('should aggregate three scored answers out of four questions', async () => {
            const interviewId = await seedScenario();

            const outcome = await aggregator.aggregate(interviewId);

            expect(outcome.kind).toBe('AGGREGATED');
            expect(outcome.kind === 'AGGREGATED' && outcome.result).toMatchObject({
                interviewId,
                candidateId: store.interviews.get(interviewId)?.candidateId,
                jobId: 'job-1',
                evaluatedCount: 3,
                totalQuestions: 4,
                averageFactualAccuracy: 0.8,
                averageCompleteness: 0.9,
                averageRelevance: 0.7,
                averageCoherence: 0.85,
                averageScore: 0.8125,
                passStatus: 'PASS',
                knowledgeLevel: 'ADVANCED',
                summaryResult: 'Strong fundamentals',
                recommendations: 'Practice system design'
            });
            expect(store.results.size).toBe(1);
            expect(store.interviews.get(interviewId)?.aggregationOutcome).toBe('AGGREGATED');
            expect(summarize).toHaveBeenCalledWith(expect.objectContaining({ averageScore: 0.8125, evaluatedCount: 3 }));
        });

        it('should be idempotent without new evaluations', async () => {
            const interviewId = await seedScenario();

            const first = await aggregator.aggregate(interviewId);
            const second = await aggregator.aggregate(interviewId);

            expect(second).toEqual(first);
            expect(summarize).toHaveBeenCalledTimes(1);
        });

        it('should replace the result when a new evaluation arrives', async () => {
            const interviewId = await seedScenario();
            await aggregator.aggregate(interviewId);
            const lastTurn = (await store.transaction((scope) => scope.listTurns(interviewId)))[3];
            await evaluations.record(interviewId, 'Q', 'A', scores(0, 0, 0, 0), TOKENS, { turnId: lastTurn.id });

            const outcome = await aggregator.aggregate(interviewId);

            expect(outcome.kind === 'AGGREGATED' && outcome.result).toMatchObject({
                evaluatedCount: 4,
                totalQuestions: 4,
                averageFactualAccuracy: 0.6,
                averageScore: 0.6094,
                passStatus: 'FAIL',
                knowledgeLevel: 'INTERMEDIATE'
            });
            expect(store.results.size).toBe(1);
            expect(summarize).toHaveBeenCalledTimes(2);
        });

        it('should store an empty narrative when the generator fails', async () => {
            summarize.mockRejectedValueOnce(new Error('model overloaded'));
            const interviewId = await seedScenario();

            const outcome = await aggregator.aggregate(interviewId);

            expect(outcome.kind === 'AGGREGATED' && outcome.result.summaryResult).toBe('');
            expect(outcome.kind === 'AGGREGATED' && outcome.result.recommendations).toBeNull();
            expect(outcome.kind === 'AGGREGATED' && outcome.result.averageScore).toBe(0.8125);
            expect(mockLogger.warn).toHaveBeenCalledWith(
                expect.objectContaining({ interviewId, error: 'model overloaded' }),
                'Narrative generation failed, storing empty narrative'
            );
        });

        it('should store an empty narrative when the generator times out', async () => {
            summarize.mockReturnValueOnce(new Promise<Narrative>(() => undefined));
            const interviewId = await seedScenario();

            const outcome = await aggregator.aggregate(interviewId);

            expect(outcome.kind === 'AGGREGATED' && outcome.result.summaryResult).toBe('');
            expect(mockLogger.warn).toHaveBeenCalledWith(
                expect.objectContaining({ error: 'Narrative generation timeout after 50ms' }),
                'Narrative generation failed, storing empty narrative'
            );
        });

        it('should work without a narrative generator', async () => {
            const plain = new AggregatorService(store, mockLogger);
            const interviewId = await seedScenario();

            const outcome = await plain.aggregate(interviewId);

            expect(outcome.kind === 'AGGREGATED' && outcome.result.summaryResult).toBe('');
            expect(summarize).not.toHaveBeenCalled();
        });

        it('should report nothing to aggregate when questions have no evaluations', async () => {
            const interview = await seedInterview(store);
            await seedTurns(store, interview.id, 2, 0);

            const outcome = await aggregator.aggregate(interview.id);

            expect(outcome).toEqual({ kind: 'NOTHING_TO_AGGREGATE', totalQuestions: 2 });
            expect(store.results.size).toBe(0);
            expect(store.interviews.get(interview.id)?.aggregationOutcome).toBe('NOTHING_TO_AGGREGATE');
        });

        it('should record the zero-questions sentinel when nothing was asked', async () => {
            const interview = await seedInterview(store);

            const outcome = await aggregator.aggregate(interview.id);

            expect(outcome).toEqual({ kind: 'NO_QUESTIONS' });
            expect(store.results.size).toBe(0);
            expect(store.interviews.get(interview.id)?.aggregationOutcome).toBe('NO_QUESTIONS');
        });

        it('should ignore partially scored evaluations', async () => {
            const interview = await seedInterview(store);
            await seedTurns(store, interview.id, 2);
            await evaluations.record(interview.id, 'Q', 'A', scores(null, 0.5, 0.5, 0.5), TOKENS);

            const outcome = await aggregator.aggregate(interview.id);

            expect(outcome).toEqual({ kind: 'NOTHING_TO_AGGREGATE', totalQuestions: 2 });
        });

        it('should fail Inconsistent when scored evaluations outnumber questions', async () => {
            const interview = await seedInterview(store);
            await seedTurns(store, interview.id, 1);
            await evaluations.record(interview.id, 'Q', 'A', scores(1, 1, 1, 1), TOKENS);
            await evaluations.record(interview.id, 'Q', 'A', scores(1, 1, 1, 1), TOKENS);

            await expect(aggregator.aggregate(interview.id)).rejects.toBeInstanceOf(InconsistentError);
            expect(store.results.size).toBe(0);
            expect(store.interviews.get(interview.id)?.aggregationOutcome).toBeNull();
        });

        it('should fail NotFound for an unknown interview', async () => {
            await expect(aggregator.aggregate(41)).rejects.toBeInstanceOf(NotFoundError);
        });

        it('should serialize concurrent aggregations of one interview', async () => {
            const interviewId = await seedScenario();

            const [first, second] = await Promise.all([
                aggregator.aggregate(interviewId),
                aggregator.aggregate(interviewId)
            ]);

            expect(first).toEqual(second);
            expect(store.results.size).toBe(1);
            expect(store.results.get(interviewId)?.evaluatedCount).toBe(3);
        });

        it('should generate the narrative without holding the interview lock', async () => {
            const interviewId = await seedScenario();
            const lockHeld: boolean[] = [];
            summarize.mockImplementation(async () => {
                lockHeld.push(store.locks.isLocked(`interview:${interviewId}`));
                return { summaryResult: 'Written unlocked', recommendations: null };
            });

            const outcome = await aggregator.aggregate(interviewId);

            expect(lockHeld).toEqual([false]);
            expect(outcome.kind === 'AGGREGATED' && outcome.result.summaryResult).toBe('Written unlocked');
        });
    });

    describe('aggregateWithin', () => {
        it('should use a prepared narrative written for the same statistics', async () => {
            const interviewId = await seedScenario();
            const prepared = await aggregator.prepareNarrative(interviewId);
            summarize.mockClear();

            const outcome = await store.transaction((scope) => aggregator.aggregateWithin(scope, interviewId, prepared));

            expect(summarize).not.toHaveBeenCalled();
            expect(outcome.kind === 'AGGREGATED' && outcome.result.summaryResult).toBe('Strong fundamentals');
        });

        it('should regenerate a narrative prepared for stale statistics', async () => {
            const interviewId = await seedScenario();
            const prepared = await aggregator.prepareNarrative(interviewId);
            const lastTurn = (await store.transaction((scope) => scope.listTurns(interviewId)))[3];
            await evaluations.record(interviewId, 'Q', 'A', scores(0, 0, 0, 0), TOKENS, { turnId: lastTurn.id });
            summarize.mockClear();
            summarize.mockResolvedValueOnce({ summaryResult: 'Four answers in', recommendations: null });

            const outcome = await store.transaction((scope) => aggregator.aggregateWithin(scope, interviewId, prepared));

            expect(summarize).toHaveBeenCalledTimes(1);
            expect(outcome.kind === 'AGGREGATED' && outcome.result).toMatchObject({
                evaluatedCount: 4,
                summaryResult: 'Four answers in'
            });
        });
    });

    describe('prepareNarrative', () => {
        it('should prepare nothing when the stored result is current', async () => {
            const interviewId = await seedScenario();
            await aggregator.aggregate(interviewId);

            await expect(aggregator.prepareNarrative(interviewId)).resolves.toBeNull();
            expect(summarize).toHaveBeenCalledTimes(1);
        });

        it('should prepare nothing without scored evaluations', async () => {
            const interview = await seedInterview(store);

            await expect(aggregator.prepareNarrative(interview.id)).resolves.toBeNull();
            expect(summarize).not.toHaveBeenCalled();
        });
    });

    describe('latestOutcome', () => {
        it('should read the recorded outcome without recomputing', async () => {
            const interviewId = await seedScenario();
            expect(await aggregator.latestOutcome(interviewId)).toBeNull();

            await aggregator.aggregate(interviewId);

            expect(await aggregator.latestOutcome(interviewId)).toBe('AGGREGATED');
            expect(summarize).toHaveBeenCalledTimes(1);
        });

        it('should fail NotFound for an unknown interview', async () => {
            await expect(aggregator.latestOutcome(8)).rejects.toBeInstanceOf(NotFoundError);
        });
    });

    describe('getResult', () => {
        it('should return the stored result', async () => {
            const interviewId = await seedScenario();
            await aggregator.aggregate(interviewId);

            const result = await aggregator.getResult(interviewId);

            expect(result.averageScore).toBe(0.8125);
        });

        it('should fail NotFound before the first aggregation', async () => {
            const interview = await seedInterview(store);

            await expect(aggregator.getResult(interview.id)).rejects.toBeInstanceOf(NotFoundError);
        });
    });
});
