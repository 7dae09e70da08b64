import { describe, it, expect, beforeEach, vi } from 'vitest';
import { QueryFailedError } from 'typeorm';
import {
    TypeOrmEngineStore,
    type EngineManager,
    type TransactionRunner
} from '../../../src/db/typeorm-engine-store';
import type { ResultRow } from '../../../src/db/interfaces';
import { DuplicateSessionError, InconsistentError } from '../../../src/errors/engine-errors';
import type { ILogger } from '../../../src/config/logger';
import { TOKENS, createMockLogger } from '../../support/fixtures';

function driverFailure(code: string, message: string): QueryFailedError {
    return new QueryFailedError('INSERT', [], Object.assign(new Error(message), { code }));
}

const row: ResultRow = {
    interviewId: 7,
    candidateId: 'candidate-1',
    applicationId: 3,
    jobId: 'job-1',
    evaluatedCount: 1,
    totalQuestions: 1,
    averageFactualAccuracy: 1,
    averageCompleteness: 1,
    averageRelevance: 1,
    averageCoherence: 1,
    averageScore: 1,
    passStatus: 'PASS',
    knowledgeLevel: 'EXPERT',
    summaryResult: '',
    recommendations: null
};

describe('TypeOrmEngineStore', () => {
    let manager: EngineManager;
    let runner: TransactionRunner;
    let mockLogger: ILogger;
    let store: TypeOrmEngineStore;

    beforeEach(() => {
        manager = {
            findOne: vi.fn(),
            find: vi.fn(),
            findOneByOrFail: vi.fn(),
            create: vi.fn().mockImplementation((_entity: unknown, data: unknown) => data),
            save: vi.fn(),
            insert: vi.fn(),
            upsert: vi.fn(),
            delete: vi.fn()
        };
        runner = {
            manager,
            isTransactionActive: false,
            connect: vi.fn().mockResolvedValue(undefined),
            startTransaction: vi.fn(async () => {
                runner.isTransactionActive = true;
            }),
            commitTransaction: vi.fn(async () => {
                runner.isTransactionActive = false;
            }),
            rollbackTransaction: vi.fn(async () => {
                runner.isTransactionActive = false;
            }),
            release: vi.fn().mockResolvedValue(undefined)
        };
        mockLogger = createMockLogger();
        store = new TypeOrmEngineStore({ createQueryRunner: () => runner }, mockLogger);
    });

    describe('transaction', () => {
        it('should commit and then run after-commit hooks', async () => {
            const order: string[] = [];
            vi.mocked(runner.commitTransaction).mockImplementation(async () => {
                order.push('commit');
            });

            const value = await store.transaction(async (scope) => {
                scope.afterCommit(() => order.push('hook'));
                return 'done';
            });

            expect(value).toBe('done');
            expect(order).toEqual(['commit', 'hook']);
            expect(runner.release).toHaveBeenCalledTimes(1);
        });

        it('should roll back, drop hooks and rethrow when the work fails', async () => {
            const hook = vi.fn();
            const failure = new Error('boom');

            await expect(store.transaction(async (scope) => {
                scope.afterCommit(hook);
                throw failure;
            })).rejects.toBe(failure);

            expect(runner.rollbackTransaction).toHaveBeenCalledTimes(1);
            expect(runner.commitTransaction).not.toHaveBeenCalled();
            expect(hook).not.toHaveBeenCalled();
            expect(runner.release).toHaveBeenCalledTimes(1);
        });

        it('should log a failing hook without failing the commit', async () => {
            await store.transaction(async (scope) => {
                scope.afterCommit(() => {
                    throw new Error('listener gone');
                });
            });

            expect(mockLogger.warn).toHaveBeenCalledWith({ error: 'listener gone' }, 'After-commit hook failed');
        });
    });

    describe('replaceResult', () => {
        it('should report a result already held by another interview as Inconsistent', async () => {
            vi.mocked(manager.upsert).mockRejectedValue(
                driverFailure('23505', 'duplicate key value violates unique constraint "UQ_interview_results_application"')
            );

            const failure = store.transaction((scope) => scope.replaceResult(row));

            await expect(failure).rejects.toBeInstanceOf(InconsistentError);
            await expect(failure).rejects.toThrow('Application 3 already has a result from another interview');
            expect(runner.rollbackTransaction).toHaveBeenCalledTimes(1);
        });

        it('should pass other driver errors through', async () => {
            const foreignKey = driverFailure('23503', 'insert or update violates foreign key constraint');
            vi.mocked(manager.upsert).mockRejectedValue(foreignKey);

            await expect(store.transaction((scope) => scope.replaceResult(row))).rejects.toBe(foreignKey);
        });
    });

    describe('insertEvaluation', () => {
        it('should report a second evaluation of a turn as Inconsistent', async () => {
            vi.mocked(manager.save).mockRejectedValue(
                driverFailure('23505', 'duplicate key value violates unique constraint "UQ_evaluations_turn"')
            );

            await expect(store.transaction((scope) => scope.insertEvaluation({
                interviewId: 7,
                turnId: 11,
                question: 'Q',
                answer: 'A',
                factualAccuracy: 1,
                factualAccuracyExplanation: null,
                completeness: 1,
                completenessExplanation: null,
                relevance: 1,
                relevanceExplanation: null,
                coherence: 1,
                coherenceExplanation: null,
                finalEvaluation: null,
                score: 1,
                promptTokens: TOKENS.promptTokens,
                completionTokens: TOKENS.completionTokens
            }))).rejects.toThrow(new InconsistentError('Chat turn 11 already has an evaluation'));
        });
    });

    describe('insertSession', () => {
        it('should report a second session as DuplicateSession', async () => {
            vi.mocked(manager.insert).mockRejectedValue(
                driverFailure('23505', 'duplicate key value violates unique constraint "PK_chat_sessions"')
            );

            await expect(store.transaction((scope) => scope.insertSession(7))).rejects.toBeInstanceOf(DuplicateSessionError);
        });
    });
});
