import { vi } from 'vitest';
import type { ILogger } from '../../src/config/logger';
import type { DimensionScores, TokenCounts } from '../../src/types/evaluation';
import type { InterviewRecord } from '../../src/types/interview';
import type { InMemoryEngineStore } from './in-memory-store';

export const TOKENS: TokenCounts = { promptTokens: 120, completionTokens: 40 };

export function createMockLogger(): ILogger {
    return {
        info: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        debug: vi.fn()
    };
}

export function scores(
    factualAccuracy: number | null,
    completeness: number | null,
    relevance: number | null,
    coherence: number | null
): DimensionScores {
    return { factualAccuracy, completeness, relevance, coherence };
}

/**
 * A clock that returns `start` until moved with `advance`.
 */
export function manualClock(start: string): { now: () => Date; advance: (ms: number) => void } {
    let current = new Date(start).getTime();
    return {
        now: () => new Date(current),
        advance: (ms: number) => {
            current += ms;
        }
    };
}

let candidateSequence = 0;

/**
 * Insert an application and one interview for it, then apply `overrides`
 * to the interview row.
 */
export async function seedInterview(
    store: InMemoryEngineStore,
    overrides: Partial<Omit<InterviewRecord, 'id' | 'applicationId'>> = {}
): Promise<InterviewRecord> {
    candidateSequence++;
    return store.transaction(async (scope) => {
        const application = await scope.insertApplication({
            jobId: 'job-1',
            candidateId: `candidate-${candidateSequence}`
        });
        const interview = await scope.insertInterview({
            candidateId: application.candidateId,
            applicationId: application.id,
            jobId: application.jobId,
            scheduledById: 'recruiter-1',
            type: 'TECHNICAL'
        });
        return scope.saveInterview({ ...interview, ...overrides });
    });
}

/**
 * Open a ledger on the interview and append `count` questions, the first
 * `answered` of them answered.
 */
export async function seedTurns(
    store: InMemoryEngineStore,
    interviewId: number,
    count: number,
    answered: number = count
): Promise<number[]> {
    return store.transaction(async (scope) => {
        await scope.insertSession(interviewId);
        const ids: number[] = [];
        for (let level = 1; level <= count; level++) {
            const turn = await scope.insertTurn({ interviewId, question: `Question ${level}`, level });
            if (level <= answered) {
                await scope.saveTurn({ ...turn, answer: `Answer ${level}`, score: 4, answeredAt: new Date() });
            }
            ids.push(turn.id);
        }
        const session = await scope.findSession(interviewId);
        if (session) {
            await scope.saveSession({ ...session, lastLevel: count });
        }
        return ids;
    });
}
